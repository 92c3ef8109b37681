/**
 * Command Registry
 *
 * Read-only mapping (mode, name) -> (kind, default parameters), built once
 * at startup. Names registered under `global` are visible from every mode.
 *
 * @example
 * ```typescript
 * const registry = new CommandRegistryBuilder()
 *   .add('global', 'exit', entry('exit'))
 *   .add('search', 'toggletag', entry('toggleTag', { tag: 'inbox' }))
 *   .build();
 *
 * registry.get('search', 'exit');   // => { kind: 'exit', defaults: {} }
 * registry.get('thread', 'toggletag'); // => undefined
 * ```
 */

import { ConfigurationError } from "../errors.js";
import type { CommandKind, ParamsOf } from "./kinds.js";
import type { ParamDefaults } from "./params.js";
import { MODES, type Mode } from "./types.js";

export interface RegistryEntry {
  readonly kind: CommandKind;
  /** Literal or deferred values; call-site parameters override them */
  readonly defaults: Readonly<Record<string, unknown>>;
}

/**
 * Registry entry with defaults checked against the kind's parameters
 */
export function entry<K extends CommandKind>(kind: K, defaults: ParamDefaults<ParamsOf<K>> = {}): RegistryEntry {
  const copy: Readonly<Record<string, unknown>> = Object.freeze(Object.fromEntries(Object.entries(defaults)));
  return Object.freeze({ kind, defaults: copy });
}

export type CommandTable = Partial<Record<Mode, Readonly<Record<string, RegistryEntry>>>>;

function sameDefaults(a: Readonly<Record<string, unknown>>, b: Readonly<Record<string, unknown>>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && Object.is(a[key], b[key]));
}

function sameMeaning(a: RegistryEntry, b: RegistryEntry): boolean {
  return a.kind === b.kind && sameDefaults(a.defaults, b.defaults);
}

// ============================================================================
// REGISTRY
// ============================================================================

export class CommandRegistry {
  private readonly modes: ReadonlyMap<Mode, ReadonlyMap<string, RegistryEntry>>;

  /**
   * Prefer `CommandRegistryBuilder` or `createCommandRegistry`.
   * @throws ConfigurationError when a mode-specific name shadows a global
   *   one with a different kind or defaults
   */
  constructor(modes: ReadonlyMap<Mode, ReadonlyMap<string, RegistryEntry>>) {
    const copy = new Map<Mode, ReadonlyMap<string, RegistryEntry>>();
    for (const [mode, names] of modes) {
      copy.set(mode, new Map(names));
    }
    const global = copy.get("global");
    for (const [mode, names] of copy) {
      if (mode === "global" || !global) continue;
      for (const [name, candidate] of names) {
        const shadowed = global.get(name);
        if (shadowed && !sameMeaning(shadowed, candidate)) {
          throw new ConfigurationError(
            `command ${name} in mode ${mode} collides with the global command of that name`
          );
        }
      }
    }
    this.modes = copy;
  }

  /**
   * Entry visible under `name` in `mode`: the mode's own, else the global one
   */
  get(mode: Mode, name: string): RegistryEntry | undefined {
    return this.modes.get(mode)?.get(name) ?? this.modes.get("global")?.get(name);
  }

  has(mode: Mode, name: string): boolean {
    return this.get(mode, name) !== undefined;
  }

  /**
   * Names visible in `mode`, sorted (for completion)
   */
  names(mode: Mode): string[] {
    return this.entries(mode).map(([name]) => name);
  }

  /** Visible entries in `mode`, sorted by name */
  entries(mode: Mode): Array<[string, RegistryEntry]> {
    const visible = new Map(this.modes.get("global"));
    for (const [name, value] of this.modes.get(mode) ?? []) {
      visible.set(name, value);
    }
    return Array.from(visible.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }
}

// ============================================================================
// BUILDER
// ============================================================================

export class CommandRegistryBuilder {
  private modes = new Map<Mode, Map<string, RegistryEntry>>();

  /**
   * @throws ConfigurationError on a duplicate name within the mode
   */
  add(mode: Mode, name: string, value: RegistryEntry): this {
    let names = this.modes.get(mode);
    if (!names) {
      names = new Map();
      this.modes.set(mode, names);
    }
    if (names.has(name)) {
      throw new ConfigurationError(`duplicate command ${name} in mode ${mode}`);
    }
    names.set(name, value);
    return this;
  }

  addTable(table: CommandTable): this {
    for (const [mode, names] of tableModes(table)) {
      for (const [name, value] of Object.entries(names)) {
        this.add(mode, name, value);
      }
    }
    return this;
  }

  build(): CommandRegistry {
    return new CommandRegistry(this.modes);
  }
}

function tableModes(table: CommandTable): Array<[Mode, Readonly<Record<string, RegistryEntry>>]> {
  const modes: Array<[Mode, Readonly<Record<string, RegistryEntry>>]> = [];
  for (const mode of MODES) {
    const names = table[mode];
    if (names) modes.push([mode, names]);
  }
  return modes;
}

/**
 * Build a registry from a mode -> name -> entry table
 */
export function createCommandRegistry(table: CommandTable): CommandRegistry {
  return new CommandRegistryBuilder().addTable(table).build();
}
