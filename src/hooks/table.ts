/**
 * Command Hook Table
 *
 * Explicit lookup of hooks by (phase, command name). The conventional
 * configuration keys `pre_<name>` / `post_<name>` are parsed once when the
 * table is built, never at dispatch time.
 *
 * @example
 * ```typescript
 * const hooks = CommandHookTable.fromRecord({
 *   pre_search: ({ ui }) => ui.notify("searching"),
 *   post_flush: ({ ui }) => ui.update(),
 * });
 *
 * hooks.get("pre", "search"); // the handler above
 * hooks.get("post", "search"); // undefined
 * ```
 */

import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { CommandHook, HookPhase } from "./types.js";

const HOOK_KEY_PATTERN = /^(pre|post)_(.+)$/;

const commandHookSchema = z.custom<CommandHook>((value) => typeof value === "function");

export function hookKey(phase: HookPhase, command: string): string {
  return `${phase}_${command}`;
}

/**
 * Split a `pre_<name>` / `post_<name>` key; undefined for other keys
 */
export function parseHookKey(key: string): { phase: HookPhase; command: string } | undefined {
  const match = key.match(HOOK_KEY_PATTERN);
  if (!match) return undefined;
  const [, phase, command] = match;
  return { phase: phase === "pre" ? "pre" : "post", command };
}

export class CommandHookTable {
  private handlers = new Map<string, CommandHook>();

  /**
   * Build a table from `pre_<name>` / `post_<name>` entries. Other keys are
   * ignored; a matching key whose value is not a function is an error.
   */
  static fromRecord(record: Record<string, unknown>, source = "hooks"): CommandHookTable {
    const table = new CommandHookTable();
    for (const [key, value] of Object.entries(record)) {
      const parsed = parseHookKey(key);
      if (!parsed) continue;

      const result = commandHookSchema.safeParse(value);
      if (!result.success) {
        throw new ConfigurationError(`${source}: ${key} must be a function`);
      }
      table.register(parsed.phase, parsed.command, result.data);
    }
    return table;
  }

  /**
   * Register a hook
   * @returns Unregister function
   */
  register(phase: HookPhase, command: string, handler: CommandHook): () => void {
    const key = hookKey(phase, command);
    if (this.handlers.has(key)) {
      throw new ConfigurationError(`duplicate hook: ${key}`);
    }
    this.handlers.set(key, handler);

    return () => {
      if (this.handlers.get(key) === handler) {
        this.handlers.delete(key);
      }
    };
  }

  get(phase: HookPhase, command: string): CommandHook | undefined {
    return this.handlers.get(hookKey(phase, command));
  }

  has(phase: HookPhase, command: string): boolean {
    return this.handlers.has(hookKey(phase, command));
  }

  /** Configured keys, e.g. `pre_search` */
  names(): string[] {
    return Array.from(this.handlers.keys()).sort();
  }

  get size(): number {
    return this.handlers.size;
  }
}
