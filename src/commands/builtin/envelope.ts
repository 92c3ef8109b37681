/**
 * Envelope buffer commands: opening a draft, editing it in the external
 * editor, setting headers and sending.
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import type { SendResult, UiContext } from "../../context/types.js";
import { applyEditedText, renderEditableDraft } from "../../mail/envelope-file.js";
import { parseAddress } from "../../mail/reply.js";
import { Command, type CommandBindings } from "../command.js";
import { EditCommand } from "./external.js";
import { draftSchema, requireView } from "./support.js";
import { BufferCloseCommand } from "./views.js";

export const envelopeOpenParamsSchema = z.object({
  mail: draftSchema.optional(),
});
export type EnvelopeOpenParams = z.input<typeof envelopeOpenParamsSchema>;

export class EnvelopeOpenCommand extends Command<z.output<typeof envelopeOpenParamsSchema>> {
  readonly help = "open a draft in an envelope buffer";

  constructor(params: EnvelopeOpenParams = {}, bindings?: CommandBindings) {
    super("envelopeopen", envelopeOpenParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    ui.open({ type: "envelope", draft: this.params.mail });
  }
}

// ============================================================================
// EDIT
// ============================================================================

export const envelopeEditParamsSchema = z.object({
  /** Draft to edit; the current envelope's draft when absent */
  mail: draftSchema.optional(),
});
export type EnvelopeEditParams = z.input<typeof envelopeEditParamsSchema>;

/**
 * Edit a draft's Subject, To, From and body in the external editor.
 *
 * A draft passed in opens a new envelope buffer once the editor exits
 * successfully; otherwise the current envelope is updated in place. The
 * temporary draft file is removed once the editor is done, however it
 * exited.
 */
export class EnvelopeEditCommand extends Command<z.output<typeof envelopeEditParamsSchema>> {
  readonly help = "edit the draft in the external editor";

  constructor(params: EnvelopeEditParams = {}, bindings?: CommandBindings) {
    super("reedit", envelopeEditParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const given = this.params.mail;
    const envelope = given ? undefined : requireView(ui, "envelope", this.name);
    const draft = given ?? envelope?.getDraft();
    if (!draft) return;

    const dir = mkdtempSync(join(tmpdir(), "mua-dispatch-"));
    const path = join(dir, "draft.eml");
    writeFileSync(path, renderEditableDraft(draft), "utf8");

    const reopen = async (): Promise<void> => {
      const text = readFileSync(path, "utf8");
      applyEditedText(draft, text);
      if (envelope) {
        envelope.setDraft(draft);
        envelope.rebuild();
      } else {
        await ui.applyCommand(new EnvelopeOpenCommand({ mail: draft }));
      }
    };

    const edit = new EditCommand({ path, onSuccess: reopen, refocus: false });
    try {
      await ui.applyCommand(edit);
      await edit.completion;
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  }
}

// ============================================================================
// HEADERS / SEND
// ============================================================================

export const envelopeSetParamsSchema = z.object({
  key: z.string().min(1),
  value: z.string().default(""),
  /** Replace existing values instead of appending another header */
  replace: z.boolean().default(true),
});
export type EnvelopeSetParams = z.input<typeof envelopeSetParamsSchema>;

export class EnvelopeSetCommand extends Command<z.output<typeof envelopeSetParamsSchema>> {
  readonly help = "set a header of the draft";

  constructor(params: EnvelopeSetParams, bindings?: CommandBindings) {
    super("envelopeset", envelopeSetParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const envelope = requireView(ui, "envelope", this.name);
    const draft = envelope.getDraft();
    const { key, value, replace } = this.params;
    if (replace) {
      draft.set(key, value);
    } else {
      draft.add(key, value);
    }
    envelope.rebuild();
  }
}

export const envelopeSendParamsSchema = z.object({});

export class EnvelopeSendCommand extends Command<z.output<typeof envelopeSendParamsSchema>> {
  readonly help = "send the draft";

  constructor(params: z.input<typeof envelopeSendParamsSchema> = {}, bindings?: CommandBindings) {
    super("send", envelopeSendParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const envelope = requireView(ui, "envelope", this.name);
    const draft = envelope.getDraft();
    const { address } = parseAddress(draft.get("From") ?? "");
    const account = ui.accounts.getAccountByAddress(address);
    if (!account) {
      ui.notify(`failed to send: no account set up for ${address}`, { priority: "error" });
      return;
    }

    const pending = ui.notify("sending..", { timeout: -1, block: false });
    let result: SendResult;
    try {
      result = await account.sender.sendMail(draft);
    } finally {
      ui.clearNotify([pending]);
    }

    if (result.success) {
      await ui.applyCommand(new BufferCloseCommand({ buffer: envelope }));
      ui.notify("mail send successful");
    } else {
      ui.notify(`failed to send: ${result.reason ?? "unknown reason"}`, { priority: "error" });
    }
  }
}
