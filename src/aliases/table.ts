/**
 * Command Alias Table
 *
 * Maps user-defined alias names to the command line they stand for.
 * Names are matched case-insensitively and expanded exactly once: an
 * alias whose expansion names another alias is not followed further.
 *
 * @example
 * ```typescript
 * const aliases = createAliasTable({ q: 'exit', inbox: 'search tag:inbox' });
 *
 * aliases.expand('Q');      // => { name: 'exit', args: '' }
 * aliases.expand('inbox');  // => { name: 'search', args: 'tag:inbox' }
 * aliases.expand('search'); // => undefined
 * ```
 */

import type { AliasDefinition, AliasExpansion } from "./types.js";

export class CommandAliasTable {
  private aliases: Map<string, AliasDefinition> = new Map();

  constructor(initialAliases: AliasDefinition[] = []) {
    for (const alias of initialAliases) {
      this.register(alias);
    }
  }

  register(definition: AliasDefinition): void {
    const name = definition.name.toLowerCase();
    this.aliases.set(name, { ...definition, expansion: definition.expansion.trim() });
  }

  get(name: string): AliasDefinition | undefined {
    return this.aliases.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.aliases.has(name.toLowerCase());
  }

  getNames(): string[] {
    return Array.from(this.aliases.keys()).sort();
  }

  getAll(): AliasDefinition[] {
    return Array.from(this.aliases.values());
  }

  /**
   * One expansion step. The first word of the expansion is the command
   * name, the rest are leading arguments.
   */
  expand(name: string): AliasExpansion | undefined {
    const definition = this.get(name);
    if (!definition) return undefined;

    const match = definition.expansion.match(/^(\S+)(?:\s+([\s\S]*))?$/);
    if (!match) return undefined;
    return { name: match[1], args: match[2] ?? "" };
  }

  get size(): number {
    return this.aliases.size;
  }
}

/**
 * Build an alias table from the `commandAliases` settings record
 */
export function createAliasTable(record: Record<string, string> = {}): CommandAliasTable {
  return new CommandAliasTable(
    Object.entries(record).map(([name, expansion]) => ({ name, expansion }))
  );
}
