/**
 * Command Dispatcher
 *
 * The boundary between the UI and the command layer. Every application
 * runs prehook, `apply` and posthook under one invocation id; whatever
 * goes wrong is logged and shown as an error notification, never thrown
 * back at the UI.
 *
 * @example
 * ```typescript
 * const dispatcher = new CommandDispatcher({ factory, interpreter, logger });
 *
 * // from the command prompt
 * await dispatcher.dispatch('search tag:inbox', 'global', ui);
 *
 * // from a keybinding
 * await dispatcher.execute('toggletag', 'search', ui, { tag: 'todo' });
 * ```
 */

import { nanoid } from "nanoid";
import type { UiContext } from "../context/types.js";
import { CommandError, HOOK_ERROR_CODES, HookBlockedError } from "../errors.js";
import type { HookPhase, HookResult } from "../hooks/types.js";
import { NullLogReporter, type LogFields, type LogReporter } from "../logging/log-reporter.js";
import type { Command } from "./command.js";
import type { CommandFactory, ResolveResult } from "./factory.js";
import type { CommandInterpreter } from "./interpreter.js";
import type { CallsiteParams, Mode } from "./types.js";

export type ApplyOutcome =
  | { success: true; invocationId: string }
  | { success: false; invocationId?: string; error: Error };

export interface CommandDispatcherOptions {
  factory: CommandFactory;
  interpreter: CommandInterpreter;
  logger?: LogReporter;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class CommandDispatcher {
  readonly factory: CommandFactory;
  readonly interpreter: CommandInterpreter;
  private logger: LogReporter;

  constructor(options: CommandDispatcherOptions) {
    this.factory = options.factory;
    this.interpreter = options.interpreter;
    this.logger = options.logger ?? new NullLogReporter();
  }

  interpret(line: string, mode: Mode): Command | null {
    return this.interpreter.interpret(line, mode);
  }

  resolve(name: string, mode: Mode, params: CallsiteParams = {}): ResolveResult {
    return this.factory.resolve(name, mode, params);
  }

  /**
   * Run a command against the UI: prehook, apply, posthook
   */
  async apply(command: Command, ui: UiContext): Promise<ApplyOutcome> {
    const invocationId = `cmd_${nanoid(12)}`;
    const fields: LogFields = { type: "apply", invocationId, command: command.name };
    this.logger.debug(`applying ${command.name}`, { ...fields, params: { ...command.params } });

    try {
      const verdict = await this.runHook("pre", command, ui, invocationId);
      if (verdict && !verdict.proceed) {
        throw new HookBlockedError(command.name, verdict.reason);
      }

      await command.apply(ui);
      await this.runHook("post", command, ui, invocationId);

      this.logger.debug(`applied ${command.name}`, fields);
      return { success: true, invocationId };
    } catch (error) {
      const err = toError(error);
      this.logger.error(err, fields);
      ui.notify(err.message, { priority: "error" });
      return { success: false, invocationId, error: err };
    }
  }

  /**
   * Interpret a command line and apply the result. Resolves with null when
   * the line yields no command.
   */
  async dispatch(line: string, mode: Mode, ui: UiContext): Promise<ApplyOutcome | null> {
    const command = this.interpret(line, mode);
    if (!command) {
      return null;
    }
    return this.apply(command, ui);
  }

  /**
   * Resolve a command by name (keybindings, scripted calls) and apply it
   */
  async execute(name: string, mode: Mode, ui: UiContext, params: CallsiteParams = {}): Promise<ApplyOutcome> {
    const result = this.resolve(name, mode, params);
    if (!result.success) {
      ui.notify(result.error.message, { priority: "error" });
      return { success: false, error: result.error };
    }
    return this.apply(result.command, ui);
  }

  /**
   * Handler errors are logged and do not block the command
   */
  private async runHook(
    phase: HookPhase,
    command: Command,
    ui: UiContext,
    invocationId: string
  ): Promise<HookResult | undefined> {
    const hook = phase === "pre" ? command.prehook : command.posthook;
    try {
      const result = await hook({ phase, command: command.name, ui, timestamp: Date.now() });
      return result ? result : undefined;
    } catch (error) {
      const failure = new CommandError(
        HOOK_ERROR_CODES.HOOK_FAILED,
        `${phase}hook for ${command.name} failed: ${toError(error).message}`,
        { cause: error }
      );
      this.logger.error(failure, { type: "hook", invocationId, command: command.name });
      return undefined;
    }
  }
}
