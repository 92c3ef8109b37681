/**
 * Application-level commands: shutdown, prompts, refresh and the
 * introspection shell.
 */

import { z } from "zod";
import type { UiContext } from "../../context/types.js";
import { Command, type CommandBindings } from "../command.js";

export const noParamsSchema = z.object({});
export type NoParams = z.input<typeof noParamsSchema>;

export class ExitCommand extends Command<NoParams> {
  readonly help = "shut the MUA down cleanly";

  constructor(params: NoParams = {}, bindings?: CommandBindings) {
    super("exit", noParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    ui.shutdown();
  }
}

export const promptParamsSchema = z.object({
  startString: z.string().default(""),
});
export type PromptParams = z.input<typeof promptParamsSchema>;

export class PromptCommand extends Command<z.output<typeof promptParamsSchema>> {
  readonly help = "open the command prompt with a prefilled line";

  constructor(params: PromptParams = {}, bindings?: CommandBindings) {
    super("prompt", promptParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    await ui.commandPrompt(this.params.startString);
  }
}

export class CommandPromptCommand extends Command<NoParams> {
  readonly help = "open an empty command prompt";

  constructor(params: NoParams = {}, bindings?: CommandBindings) {
    super("commandprompt", noParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    await ui.commandPrompt("");
  }
}

export class RefreshCommand extends Command<NoParams> {
  readonly help = "refresh the current buffer";

  constructor(params: NoParams = {}, bindings?: CommandBindings) {
    super("refresh", noParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    ui.currentView?.rebuild();
    ui.update();
  }
}

export class ReplCommand extends Command<NoParams> {
  readonly help = "open an interactive shell for introspection";

  constructor(params: NoParams = {}, bindings?: CommandBindings) {
    super("repl", noParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    ui.screen.stop();
    try {
      await ui.repl();
    } finally {
      ui.screen.start();
    }
  }
}
