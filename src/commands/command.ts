/**
 * Command Base Class
 *
 * Every command validates its named parameters on construction (unknown
 * keys are dropped) and does its work in `apply`. Instances are built
 * fresh for each invocation.
 */

import type { z } from "zod";
import type { UiContext } from "../context/types.js";
import type { CommandHook, HookBindings } from "../hooks/types.js";

export const noopHook: CommandHook = () => {};

/**
 * Name and hooks the factory binds into a command
 */
export interface CommandBindings extends HookBindings {
  /** Name the command was resolved under; defaults to its canonical name */
  name?: string;
}

export abstract class Command<TParams extends object = object> {
  /** Reserved; no command supports undo yet */
  readonly undoable = false;
  /** One-line description shown in help */
  abstract readonly help: string;
  readonly name: string;
  readonly prehook: CommandHook;
  readonly posthook: CommandHook;
  readonly params: Readonly<TParams>;

  protected constructor(
    canonicalName: string,
    schema: z.ZodType<TParams, z.ZodTypeDef, unknown>,
    params: unknown,
    bindings: CommandBindings = {}
  ) {
    this.params = schema.parse(params);
    this.name = bindings.name ?? canonicalName;
    this.prehook = bindings.prehook ?? noopHook;
    this.posthook = bindings.posthook ?? noopHook;
  }

  abstract apply(ui: UiContext): Promise<void>;
}
