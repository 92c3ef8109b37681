/**
 * Hook Types
 *
 * Pre/post hooks run around a command's `apply`. They are configured per
 * command name, e.g. `pre_search` runs before every `search`.
 */

import type { UiContext } from "../context/types.js";

export type HookPhase = "pre" | "post";

export const HOOK_PHASES: readonly HookPhase[] = ["pre", "post"];

/**
 * Context passed to hook handlers
 */
export interface HookContext {
  phase: HookPhase;
  /** Command name the hook was bound under */
  command: string;
  ui: UiContext;
  /** Timestamp of event */
  timestamp: number;
}

/**
 * Returned by a prehook to cancel the command
 */
export interface HookResult {
  proceed: boolean;
  reason?: string;
}

export type CommandHook = (context: HookContext) => Promise<HookResult | void> | HookResult | void;

/**
 * Hooks bound into a command instance
 */
export interface HookBindings {
  prehook?: CommandHook;
  posthook?: CommandHook;
}
