/**
 * Deferred Parameters
 *
 * A parameter value that is computed when the command is resolved rather
 * than when the registry is built, e.g. "the thread selected right now".
 *
 * @example
 * ```typescript
 * const selected = deferred(() => ui.viewsOfType('search')[0]?.getSelectedThread());
 * factory.resolve('toggletag', 'search', { tag: 'todo', thread: selected });
 * ```
 */

export class Deferred<T = unknown> {
  readonly type = "deferred" as const;

  constructor(private readonly producer: () => T) {}

  evaluate(): T {
    return this.producer();
  }
}

export function deferred<T>(producer: () => T): Deferred<T> {
  return new Deferred(producer);
}

export function isDeferred(value: unknown): value is Deferred {
  return value instanceof Deferred;
}

/**
 * Registry defaults for a parameter struct: each value a literal or a
 * deferred producer of one
 */
export type ParamDefaults<P> = {
  [K in keyof P]?: P[K] | Deferred<P[K]>;
};
