/**
 * Thread buffer commands: replying to, forwarding, bouncing and folding
 * the selected message.
 */

import { z } from "zod";
import type { Message, UiContext } from "../../context/types.js";
import { CommandError, DISPATCH_ERROR_CODES } from "../../errors.js";
import { Draft, type MailMessage } from "../../mail/draft.js";
import {
  buildReferences,
  clearOwnAddresses,
  formatAddress,
  forwardSubject,
  matchOwnAddress,
  quoteBody,
  replySubject,
} from "../../mail/reply.js";
import { Command, type CommandBindings } from "../command.js";
import { ComposeCommand } from "./compose.js";
import { FlushCommand } from "./store.js";
import { requireView } from "./support.js";

function selectedMessage(ui: UiContext, command: string): Message {
  const message = requireView(ui, "thread", command).getSelectedMessage();
  if (!message) {
    throw new CommandError(DISPATCH_ERROR_CODES.APPLY_FAILED, "no message selected");
  }
  return message;
}

/**
 * `Realname <address>` of the account the original was sent to, if any
 */
function ownFromHeader(ui: UiContext, mail: MailMessage): string | undefined {
  const matched = matchOwnAddress(ui.accounts.getAccountAddresses(), mail);
  if (!matched) return undefined;
  const account = ui.accounts.getAccountByAddress(matched);
  return account ? formatAddress(account.realname, account.address) : undefined;
}

// ============================================================================
// REPLY
// ============================================================================

export const replyParamsSchema = z.object({
  /** Also address the original recipients */
  groupReply: z.boolean().default(false),
});
export type ReplyParams = z.input<typeof replyParamsSchema>;

export class ReplyCommand extends Command<z.output<typeof replyParamsSchema>> {
  readonly help = "reply to the selected message";

  constructor(params: ReplyParams = {}, bindings?: CommandBindings) {
    super("reply", replyParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const message = selectedMessage(ui, this.name);
    await ui.applyCommand(new ComposeCommand({ mail: this.buildReply(ui, message) }));
  }

  buildReply(ui: UiContext, message: Message): Draft {
    const mail = message.getMail();
    const intro = `\nOn ${message.getDateString()}, ${message.getAuthor().name} wrote:\n`;
    const reply = new Draft({ body: quoteBody(intro, message.getBody()) });

    reply.set("Subject", replySubject(mail.get("Subject")));

    const from = ownFromHeader(ui, mail);
    if (from) {
      reply.set("From", from);
    }

    const own = ui.accounts.getAccountAddresses();
    const sender = mail.get("From") ?? "";
    if (this.params.groupReply) {
      const others = clearOwnAddresses(own, mail.get("To") ?? "");
      reply.set("To", others ? `${sender}, ${others}` : sender);
      for (const key of ["Cc", "Bcc"]) {
        const value = mail.get(key);
        if (value !== undefined) {
          reply.set(key, clearOwnAddresses(own, value));
        }
      }
    } else {
      reply.set("To", sender);
    }

    const id = message.getMessageId();
    reply.set("In-Reply-To", `<${id}>`);
    reply.set("References", buildReferences(mail.get("References"), id));
    return reply;
  }
}

// ============================================================================
// FORWARD / BOUNCE
// ============================================================================

export const forwardParamsSchema = z.object({
  /** Quote the original instead of attaching it */
  inline: z.boolean().default(false),
});
export type ForwardParams = z.input<typeof forwardParamsSchema>;

export class ForwardCommand extends Command<z.output<typeof forwardParamsSchema>> {
  readonly help = "forward the selected message";

  constructor(params: ForwardParams = {}, bindings?: CommandBindings) {
    super("forward", forwardParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const message = selectedMessage(ui, this.name);
    await ui.applyCommand(new ComposeCommand({ mail: this.buildForward(ui, message) }));
  }

  buildForward(ui: UiContext, message: Message): Draft {
    const mail = message.getMail();
    const forward = this.params.inline
      ? new Draft({
          body: quoteBody(`\nForwarded message from ${message.getAuthor().name}:\n`, message.getBody()),
        })
      : new Draft({ attachments: [mail] });

    forward.set("Subject", forwardSubject(mail.get("Subject")));
    const from = ownFromHeader(ui, mail);
    if (from) {
      forward.set("From", from);
    }
    return forward;
  }
}

export const bounceParamsSchema = z.object({});

export class BounceCommand extends Command<z.output<typeof bounceParamsSchema>> {
  readonly help = "redirect the selected message to new recipients";

  constructor(params: z.input<typeof bounceParamsSchema> = {}, bindings?: CommandBindings) {
    super("bounce", bounceParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const mail = Draft.from(selectedMessage(ui, this.name).getMail());
    mail.delete("To");
    await ui.applyCommand(new ComposeCommand({ mail }));
  }
}

// ============================================================================
// FOLD
// ============================================================================

export const foldParamsSchema = z.object({
  all: z.boolean().default(false),
  visible: z.boolean().default(true),
});
export type FoldParams = z.input<typeof foldParamsSchema>;

export class FoldCommand extends Command<z.output<typeof foldParamsSchema>> {
  readonly help = "fold or unfold messages";

  constructor(params: FoldParams = {}, bindings?: CommandBindings) {
    super("fold", foldParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const view = requireView(ui, "thread", this.name);
    const selection = view.getSelection();
    const widgets = this.params.all ? view.getMessageWidgets() : selection ? [selection] : [];

    for (const widget of widgets) {
      const message = widget.getMessage();
      if (message.getTags().includes("unread")) {
        message.removeTags(["unread"]);
        await ui.applyCommand(new FlushCommand());
        widget.rebuild();
      }
      widget.fold(this.params.visible);
    }
  }
}
