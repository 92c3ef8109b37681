/**
 * Settings Schema
 *
 * Validated shape of the user's configuration file. Every field has a
 * default so an empty object is a complete configuration.
 */

import { z } from "zod";

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error"]);

export const GeneralSettingsSchema = z.object({
  /** Prefix used to run a command in a fresh terminal */
  terminalCmd: z.string().min(1).default("x-terminal-emulator -e"),
  /** Editor invocation; the file path is appended */
  editorCmd: z.string().min(1).default("/usr/bin/vim -f"),
  /** Run the editor in a new terminal instead of suspending the UI */
  spawnEditor: z.boolean().default(false),
  /** Seconds to wait before retrying a flush against a locked index */
  flushRetryTimeout: z.number().int().positive().default(5),
  /** Prompt for a subject when composing */
  askSubject: z.boolean().default(true),
  logLevel: logLevelSchema.default("info"),
});

export const SettingsSchema = z.object({
  general: GeneralSettingsSchema.default({}),
  /** alias -> command (may carry leading parameters, e.g. "search tag:inbox") */
  commandAliases: z.record(z.string(), z.string().min(1)).default({}),
  /** JS module exporting pre_<command>/post_<command> functions */
  hooksFile: z.string().min(1).optional(),
});

export type GeneralSettings = z.infer<typeof GeneralSettingsSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
