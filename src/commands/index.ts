/**
 * Command System
 *
 * Registry, factory, commandline interpreter and dispatcher for the
 * built-in commands.
 *
 * @example
 * ```typescript
 * import {
 *   CommandFactory,
 *   CommandInterpreter,
 *   createCommandRegistry,
 *   DEFAULT_COMMAND_TABLE,
 * } from 'mua-dispatch/commands';
 *
 * const registry = createCommandRegistry(DEFAULT_COMMAND_TABLE);
 * const factory = new CommandFactory({ registry });
 * const interpreter = new CommandInterpreter({ factory });
 *
 * interpreter.interpret('search tag:inbox', 'global');
 * ```
 */

export { Command, noopHook, type CommandBindings } from "./command.js";
export { Deferred, deferred, isDeferred, type ParamDefaults } from "./params.js";
export { MODES, isMode, type Mode, type CallsiteParams } from "./types.js";
export {
  COMMAND_KINDS,
  COMMAND_KIND_NAMES,
  isCommandKind,
  type CommandKind,
  type CommandKindSpec,
  type ParamsOf,
} from "./kinds.js";
export {
  CommandRegistry,
  CommandRegistryBuilder,
  createCommandRegistry,
  entry,
  type CommandTable,
  type RegistryEntry,
} from "./registry.js";
export { DEFAULT_COMMAND_TABLE } from "./table.js";
export { CommandFactory, type CommandFactoryOptions, type ResolveResult } from "./factory.js";
export { CommandInterpreter, expandHome, type CommandInterpreterOptions } from "./interpreter.js";
export { CommandDispatcher, type ApplyOutcome, type CommandDispatcherOptions } from "./dispatcher.js";
export * from "./builtin/index.js";
