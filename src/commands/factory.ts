/**
 * Command Factory
 *
 * Turns a command name, the active mode and call-site parameters into a
 * parameter-bound command:
 *
 * 1. look the name up in the mode, then in `global`
 * 2. overlay call-site parameters on the registry defaults
 * 3. evaluate deferred values
 * 4. bind the `pre_<name>` / `post_<name>` hooks
 * 5. validate against the kind's schema and construct
 *
 * Failures come back as a result value and are logged; `resolve` does not
 * throw.
 *
 * @example
 * ```typescript
 * const factory = new CommandFactory({ registry, hooks, logger });
 * const result = factory.resolve('toggletag', 'search', { tag: 'urgent' });
 * if (result.success) {
 *   await dispatcher.apply(result.command, ui);
 * }
 * ```
 */

import { ZodError } from "zod";
import {
  CommandError,
  formatIssues,
  MalformedParameterError,
  UnknownCommandError,
} from "../errors.js";
import { CommandHookTable } from "../hooks/table.js";
import { NullLogReporter, type LogReporter } from "../logging/log-reporter.js";
import type { Command, CommandBindings } from "./command.js";
import { COMMAND_KINDS } from "./kinds.js";
import { isDeferred } from "./params.js";
import type { CommandRegistry } from "./registry.js";
import type { CallsiteParams, Mode } from "./types.js";

export type ResolveResult =
  | { success: true; command: Command }
  | { success: false; error: CommandError };

export interface CommandFactoryOptions {
  registry: CommandRegistry;
  hooks?: CommandHookTable;
  logger?: LogReporter;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CommandFactory {
  readonly registry: CommandRegistry;
  readonly hooks: CommandHookTable;
  private logger: LogReporter;

  constructor(options: CommandFactoryOptions) {
    this.registry = options.registry;
    this.hooks = options.hooks ?? new CommandHookTable();
    this.logger = options.logger ?? new NullLogReporter();
  }

  resolve(name: string, mode: Mode, params: CallsiteParams = {}): ResolveResult {
    const registered = this.registry.get(mode, name);
    if (!registered) {
      return this.fail(new UnknownCommandError(name, mode), name, mode);
    }

    const merged: Record<string, unknown> = { ...registered.defaults, ...params };
    for (const [key, value] of Object.entries(merged)) {
      if (!isDeferred(value)) continue;
      try {
        merged[key] = value.evaluate();
      } catch (error) {
        return this.fail(
          new MalformedParameterError(name, [`${key}: ${errorMessage(error)}`], { cause: error }),
          name,
          mode
        );
      }
    }

    const bindings: CommandBindings = {
      name,
      prehook: this.hooks.get("pre", name),
      posthook: this.hooks.get("post", name),
    };

    let command: Command;
    try {
      command = COMMAND_KINDS[registered.kind].build(merged, bindings);
    } catch (error) {
      const issues = error instanceof ZodError ? formatIssues(error.issues) : [errorMessage(error)];
      return this.fail(new MalformedParameterError(name, issues, { cause: error }), name, mode);
    }

    this.logger.debug(`resolved ${name} to ${registered.kind}`, {
      type: "resolve",
      command: name,
      mode,
      params: merged,
    });
    return { success: true, command };
  }

  private fail(error: CommandError, command: string, mode: Mode): ResolveResult {
    this.logger.error(error, { type: "resolve", command, mode });
    return { success: false, error };
  }
}
