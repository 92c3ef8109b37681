/**
 * External Processes
 *
 * Runs a shell command either in the foreground, with the terminal handed
 * over to the child, or in the background. Both paths end in the same
 * continuation: `onSuccess` on exit status 0, then refocusing the buffer
 * the command was started from.
 *
 * @example
 * ```typescript
 * const cmd = new ExternalCommand({ commandString: 'mbsync -a', inBackground: true });
 * await dispatcher.apply(cmd, ui);
 * await cmd.completion;
 * ```
 */

import { z } from "zod";
import type { UiContext, View } from "../../context/types.js";
import { Command, type CommandBindings } from "../command.js";
import { continuationSchema } from "./support.js";

export const externalParamsSchema = z.object({
  commandString: z.string().min(1),
  /** Run inside a new terminal (`general.terminalCmd`) */
  spawn: z.boolean().default(false),
  /** Focus the calling buffer again once the process is done */
  refocus: z.boolean().default(true),
  inBackground: z.boolean().default(false),
  onSuccess: continuationSchema.optional(),
});
export type ExternalParams = z.input<typeof externalParamsSchema>;

export class ExternalCommand extends Command<z.output<typeof externalParamsSchema>> {
  readonly help = "call an external command";

  /** Settles after the continuation of a background run; undefined otherwise */
  completion: Promise<void> | undefined;

  constructor(params: ExternalParams, bindings?: CommandBindings) {
    super("shellescape", externalParamsSchema, params, bindings);
  }

  async apply(ui: UiContext): Promise<void> {
    const caller = ui.currentView;
    const command = this.params.spawn
      ? `${ui.settings.general.terminalCmd} ${this.params.commandString}`
      : this.params.commandString;
    ui.logger.info(`calling external command: ${command}`, { type: "apply", command: this.name });

    if (this.params.inBackground) {
      this.completion = ui.processes
        .runInBackground(command)
        .then((status) => this.afterwards(ui, caller, status))
        .catch((error: unknown) => {
          const err = error instanceof Error ? error : new Error(String(error));
          ui.logger.error(err, { type: "apply", command: this.name });
          ui.notify(err.message, { priority: "error" });
        });
      return;
    }

    ui.screen.stop();
    let status: number;
    try {
      status = ui.processes.runBlocking(command);
    } finally {
      ui.screen.start();
    }
    await this.afterwards(ui, caller, status);
  }

  private async afterwards(ui: UiContext, caller: View | undefined, status: number): Promise<void> {
    ui.logger.debug(`external command exited with ${status}`, { type: "apply", command: this.name });
    if (status === 0 && this.params.onSuccess) {
      await this.params.onSuccess();
    }
    if (this.params.refocus && caller && ui.views.includes(caller)) {
      ui.focus(caller);
    }
  }
}

export const editParamsSchema = z.object({
  path: z.string().min(1),
  /** Defaults to `general.spawnEditor` */
  spawn: z.boolean().optional(),
  refocus: z.boolean().default(true),
  onSuccess: continuationSchema.optional(),
});
export type EditParams = z.input<typeof editParamsSchema>;

/**
 * Open a file in the configured editor. A spawned editor runs in the
 * background.
 */
export class EditCommand extends Command<z.output<typeof editParamsSchema>> {
  readonly help = "edit a file in the configured editor";

  private external: ExternalCommand | undefined;

  constructor(params: EditParams, bindings?: CommandBindings) {
    super("edit", editParamsSchema, params, bindings);
  }

  get completion(): Promise<void> | undefined {
    return this.external?.completion;
  }

  async apply(ui: UiContext): Promise<void> {
    const { editorCmd, spawnEditor } = ui.settings.general;
    const spawn = this.params.spawn ?? spawnEditor;
    this.external = new ExternalCommand(
      {
        commandString: `${editorCmd} ${this.params.path}`,
        spawn,
        inBackground: spawn,
        refocus: this.params.refocus,
        onSuccess: this.params.onSuccess,
      },
      { name: this.name }
    );
    await this.external.apply(ui);
  }
}
