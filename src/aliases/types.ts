/**
 * Alias System Types
 */

/**
 * Alias definition
 *
 * @example
 * ```typescript
 * const quit: AliasDefinition = { name: 'quit', expansion: 'exit' };
 * ```
 */
export interface AliasDefinition {
  /** Name typed on the command line */
  name: string;
  /** Command line it stands for */
  expansion: string;
}

/**
 * Result of expanding an alias once
 */
export interface AliasExpansion {
  /** Command name */
  name: string;
  /** Leading arguments carried by the expansion (may be empty) */
  args: string;
}
