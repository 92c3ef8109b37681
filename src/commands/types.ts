/**
 * Command System Types
 */

// ============================================================================
// MODES
// ============================================================================

/**
 * Interactive context owned by the UI. `global` commands are visible from
 * every other mode.
 */
export type Mode = "global" | "search" | "thread" | "envelope" | "bufferlist" | "taglist";

export const MODES: readonly Mode[] = ["global", "search", "thread", "envelope", "bufferlist", "taglist"];

export function isMode(value: string): value is Mode {
  return MODES.some((mode) => mode === value);
}

// ============================================================================
// PARAMETERS
// ============================================================================

/**
 * Named parameters supplied at a call site (interpreter or programmatic).
 * Keys a command does not know are ignored.
 */
export type CallsiteParams = Readonly<Record<string, unknown>>;
