/**
 * mua-dispatch
 *
 * Command registry, factory, commandline interpreter and dispatcher for a
 * terminal mail user agent.
 *
 * @example
 * ```typescript
 * import { createDispatcher, loadSettings } from 'mua-dispatch';
 *
 * const dispatcher = await createDispatcher({ settings: loadSettings() });
 *
 * // colon prompt
 * await dispatcher.dispatch('search tag:inbox', 'global', ui);
 *
 * // keybinding
 * await dispatcher.execute('toggletag', 'search', ui, { tag: 'todo' });
 * ```
 */

import { createAliasTable } from "./aliases/table.js";
import { CommandDispatcher } from "./commands/dispatcher.js";
import { CommandFactory } from "./commands/factory.js";
import { CommandInterpreter } from "./commands/interpreter.js";
import { createCommandRegistry, type CommandTable } from "./commands/registry.js";
import { DEFAULT_COMMAND_TABLE } from "./commands/table.js";
import { parseSettings } from "./config/loader.js";
import type { Settings } from "./config/schema.js";
import { loadHookModule } from "./hooks/loader.js";
import { CommandHookTable } from "./hooks/table.js";
import { createLogReporter, type LogReporter } from "./logging/log-reporter.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export * from "./commands/index.js";
export * from "./context/index.js";
export * from "./config/index.js";
export * from "./errors.js";
export * from "./hooks/index.js";
export * from "./aliases/index.js";
export * from "./logging/index.js";
export * from "./mail/index.js";

// =============================================================================
// WIRING
// =============================================================================

export interface CreateDispatcherOptions {
  /** Validated settings; defaults when omitted */
  settings?: Settings;
  /** Command table; the built-in table when omitted */
  table?: CommandTable;
  /** Hook table; loaded from `settings.hooksFile` when omitted */
  hooks?: CommandHookTable;
  /** Log destination; stderr at `settings.general.logLevel` when omitted */
  logger?: LogReporter;
}

/**
 * Wire registry, aliases, hooks and logger into a dispatcher
 *
 * @throws ConfigurationError for registry collisions or a bad hooks file
 */
export async function createDispatcher(options: CreateDispatcherOptions = {}): Promise<CommandDispatcher> {
  const settings = options.settings ?? parseSettings({});
  const logger = options.logger ?? createLogReporter({ console: { minLevel: settings.general.logLevel } });

  const registry = createCommandRegistry(options.table ?? DEFAULT_COMMAND_TABLE);
  const hooks = options.hooks ?? (settings.hooksFile ? await loadHookModule(settings.hooksFile) : new CommandHookTable());
  const aliases = createAliasTable(settings.commandAliases);

  logger.debug(`loaded ${hooks.size} hooks and ${aliases.size} aliases`, { type: "config" });

  const factory = new CommandFactory({ registry, hooks, logger });
  const interpreter = new CommandInterpreter({ factory, aliases, logger });
  return new CommandDispatcher({ factory, interpreter, logger });
}
