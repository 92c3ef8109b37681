/**
 * Compose a new message: fill in the missing From, To and Subject
 * headers interactively, then hand the draft to the editor.
 */

import { z } from "zod";
import type { Account, AccountManager, Completer, UiContext } from "../../context/types.js";
import { Draft } from "../../mail/draft.js";
import { formatAddress } from "../../mail/reply.js";
import { Command, type CommandBindings } from "../command.js";
import { EnvelopeEditCommand } from "./envelope.js";
import { draftSchema } from "./support.js";

/**
 * Completes From prompts with configured account addresses
 */
export function createAccountCompleter(accounts: AccountManager): Completer {
  return {
    complete(original: string): string[] {
      return accounts.getAccountAddresses().filter((address) => address.startsWith(original));
    },
  };
}

export const composeParamsSchema = z.object({
  mail: draftSchema.optional(),
  /** Headers set on the draft before prompting */
  headers: z.record(z.string()).optional(),
});
export type ComposeParams = z.input<typeof composeParamsSchema>;

export class ComposeCommand extends Command<z.output<typeof composeParamsSchema>> {
  readonly help = "compose a new message";

  constructor(params: ComposeParams = {}, bindings?: CommandBindings) {
    super("compose", composeParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const draft = this.params.mail ?? new Draft();
    for (const [key, value] of Object.entries(this.params.headers ?? {})) {
      draft.set(key, value);
    }

    if (!draft.has("From")) {
      const account = await this.chooseAccount(ui);
      if (!account) return;
      draft.set("From", formatAddress(account.realname, account.address));
    }

    if (!draft.has("To")) {
      const to = await ui.prompt({ prefix: "To>", completer: ui.contacts });
      if (to === null) {
        ui.notify("canceled");
        return;
      }
      draft.set("To", to);
    }

    if (ui.settings.general.askSubject && !draft.has("Subject")) {
      const subject = await ui.prompt({ prefix: "Subject>" });
      if (subject === null) {
        ui.notify("canceled");
        return;
      }
      draft.set("Subject", subject);
    }

    await ui.applyCommand(new EnvelopeEditCommand({ mail: draft }));
  }

  /**
   * The only account, or the one whose address the user types in. Keeps
   * asking until a configured address is given or the prompt is cancelled.
   */
  private async chooseAccount(ui: UiContext): Promise<Account | undefined> {
    const accounts = ui.accounts.getAccounts();
    if (accounts.length === 0) {
      ui.notify("no accounts set");
      return undefined;
    }
    if (accounts.length === 1) {
      return accounts[0];
    }

    const completer = createAccountCompleter(ui.accounts);
    let address = await ui.prompt({ prefix: "From>", completer, tab: 1 });
    let account = accounts.find((candidate) => candidate.address === address);
    while (address !== null && !account) {
      ui.notify("no account for this address. (<esc> cancels)");
      address = await ui.prompt({ prefix: "From>", completer });
      account = accounts.find((candidate) => candidate.address === address);
    }
    if (!account) {
      ui.notify("canceled");
    }
    return account;
  }
}
