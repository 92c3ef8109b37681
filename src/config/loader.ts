/**
 * Settings Loader
 *
 * Reads the JSON configuration file and validates it against
 * {@link SettingsSchema}. A missing file yields the defaults.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigurationError, formatIssues } from "../errors.js";
import { SettingsSchema, type Settings } from "./schema.js";

export const CONFIG_ENV_VAR = "MUA_DISPATCH_CONFIG";

/**
 * Validate an in-memory settings object
 */
export function parseSettings(raw: unknown, source = "settings"): Settings {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `invalid ${source}: ${formatIssues(result.error.issues).join("; ")}`,
      { cause: result.error }
    );
  }
  return result.data;
}

/**
 * Locate the configuration file.
 *
 * Order: $MUA_DISPATCH_CONFIG, $XDG_CONFIG_HOME/mua-dispatch/config.json,
 * ~/.config/mua-dispatch/config.json.
 */
export function resolveSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env[CONFIG_ENV_VAR];
  if (explicit) {
    return explicit;
  }
  const configHome = env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(configHome, "mua-dispatch", "config.json");
}

export function loadSettings(path: string = resolveSettingsPath()): Settings {
  if (!existsSync(path)) {
    return parseSettings({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  return parseSettings(raw, path);
}
