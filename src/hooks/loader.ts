/**
 * Loads hooks from a user-supplied JS module whose named exports follow
 * the `pre_<command>` / `post_<command>` convention.
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { ConfigurationError } from "../errors.js";
import { CommandHookTable } from "./table.js";

export async function loadHookModule(path: string): Promise<CommandHookTable> {
  const absolute = resolve(path);
  if (!existsSync(absolute)) {
    throw new ConfigurationError(`hooks file not found: ${absolute}`);
  }

  let exports: Record<string, unknown>;
  try {
    exports = await import(pathToFileURL(absolute).href);
  } catch (error) {
    throw new ConfigurationError(
      `cannot load hooks from ${absolute}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  return CommandHookTable.fromRecord(exports, absolute);
}
