/**
 * Dispatch Error Codes
 *
 * Centralized error codes and error classes for the command layer.
 *
 * Categories:
 * - DISPATCH_*: lookup and parameter binding
 * - STORE_*: message store conditions raised by collaborators
 * - HOOK_*: pre/post hook outcomes
 * - CONFIG_*: startup configuration
 */

import type { ZodIssue } from "zod";

export const DISPATCH_ERROR_CODES = {
  UNKNOWN_COMMAND: "DISPATCH_UNKNOWN_COMMAND",
  MALFORMED_PARAMETER: "DISPATCH_MALFORMED_PARAMETER",
  APPLY_FAILED: "DISPATCH_APPLY_FAILED",
} as const;

export const STORE_ERROR_CODES = {
  READ_ONLY: "STORE_READ_ONLY",
  LOCKED: "STORE_LOCKED",
} as const;

export const HOOK_ERROR_CODES = {
  BLOCKED: "HOOK_BLOCKED",
  HOOK_FAILED: "HOOK_FAILED",
} as const;

export const CONFIG_ERROR_CODES = {
  INVALID: "CONFIG_INVALID",
} as const;

export const ERROR_CODES = {
  ...DISPATCH_ERROR_CODES,
  ...STORE_ERROR_CODES,
  ...HOOK_ERROR_CODES,
  ...CONFIG_ERROR_CODES,
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// ============================================================================
// ERROR CLASSES
// ============================================================================

export class CommandError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CommandError";
  }
}

export class UnknownCommandError extends CommandError {
  constructor(
    public readonly command: string,
    public readonly mode: string
  ) {
    super(DISPATCH_ERROR_CODES.UNKNOWN_COMMAND, `there is no command ${command} in mode ${mode}`);
    this.name = "UnknownCommandError";
  }
}

export class MalformedParameterError extends CommandError {
  constructor(
    public readonly command: string,
    public readonly issues: string[],
    options?: { cause?: unknown }
  ) {
    super(
      DISPATCH_ERROR_CODES.MALFORMED_PARAMETER,
      `malformed parameters for ${command}: ${issues.join("; ")}`,
      options
    );
    this.name = "MalformedParameterError";
  }
}

/** Raised by the store when a mutation hits an index opened read-only. */
export class ReadOnlyStoreError extends CommandError {
  constructor(message = "index in read-only mode") {
    super(STORE_ERROR_CODES.READ_ONLY, message);
    this.name = "ReadOnlyStoreError";
  }
}

/** Raised by the store while another writer holds the index lock. */
export class StoreLockedError extends CommandError {
  constructor(message = "index locked") {
    super(STORE_ERROR_CODES.LOCKED, message);
    this.name = "StoreLockedError";
  }
}

export class HookBlockedError extends CommandError {
  constructor(
    public readonly command: string,
    public readonly reason?: string
  ) {
    super(HOOK_ERROR_CODES.BLOCKED, `prehook blocked ${command}${reason ? `: ${reason}` : ""}`);
    this.name = "HookBlockedError";
  }
}

export class ConfigurationError extends CommandError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(CONFIG_ERROR_CODES.INVALID, message, options);
    this.name = "ConfigurationError";
  }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Format zod issues as `path: message` strings
 */
export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

export function isRecoverableError(code: ErrorCode): boolean {
  return code === STORE_ERROR_CODES.LOCKED;
}

export function getErrorCategory(code: ErrorCode): string {
  if (code.startsWith("DISPATCH_")) return "dispatch";
  if (code.startsWith("STORE_")) return "store";
  if (code.startsWith("HOOK_")) return "hook";
  if (code.startsWith("CONFIG_")) return "config";
  return "unknown";
}

/**
 * Messages shown in the notification bar. Technical details go to the log.
 */
export const USER_FRIENDLY_MESSAGES: Record<ErrorCode, string> = {
  [DISPATCH_ERROR_CODES.UNKNOWN_COMMAND]: "unknown command",
  [DISPATCH_ERROR_CODES.MALFORMED_PARAMETER]: "invalid command parameters",
  [DISPATCH_ERROR_CODES.APPLY_FAILED]: "command failed",
  [STORE_ERROR_CODES.READ_ONLY]: "index in read-only mode",
  [STORE_ERROR_CODES.LOCKED]: "index locked",
  [HOOK_ERROR_CODES.BLOCKED]: "command cancelled by hook",
  [HOOK_ERROR_CODES.HOOK_FAILED]: "hook failed",
  [CONFIG_ERROR_CODES.INVALID]: "invalid configuration",
};

export function getUserFriendlyMessage(error: unknown): string {
  if (error instanceof CommandError) {
    return USER_FRIENDLY_MESSAGES[error.code];
  }
  return USER_FRIENDLY_MESSAGES[DISPATCH_ERROR_CODES.APPLY_FAILED];
}
