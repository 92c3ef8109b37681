/**
 * Command Aliases
 *
 * @example
 * ```typescript
 * import { createAliasTable } from 'mua-dispatch/aliases';
 *
 * const aliases = createAliasTable(settings.commandAliases);
 * ```
 */

export type { AliasDefinition, AliasExpansion } from "./types.js";
export { CommandAliasTable, createAliasTable } from "./table.js";
