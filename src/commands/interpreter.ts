/**
 * Commandline Interpreter
 *
 * Parses a line typed at the command prompt into a command for the active
 * mode. The first word names the command; how the rest of the line maps
 * onto named parameters is fixed per command name.
 *
 * @example
 * ```typescript
 * const interpreter = new CommandInterpreter({ factory, aliases });
 *
 * interpreter.interpret('search tag:inbox', 'global'); // SearchCommand
 * interpreter.interpret('!ls -la', 'thread');          // ExternalCommand
 * interpreter.interpret('exit now', 'global');         // null
 * ```
 */

import { existsSync, statSync } from "node:fs";
import { homedir, userInfo } from "node:os";
import { CommandAliasTable } from "../aliases/table.js";
import { MalformedParameterError } from "../errors.js";
import { NullLogReporter, type LogReporter } from "../logging/log-reporter.js";
import type { Command } from "./command.js";
import type { CommandFactory } from "./factory.js";
import type { CallsiteParams, Mode } from "./types.js";

const LINE_PATTERN = /^(\S+)(?:\s+([\s\S]*))?$/;

/** Commands that take no arguments; trailing text makes the line invalid */
const NO_ARGUMENT_COMMANDS: ReadonlySet<string> = new Set([
  "exit",
  "flush",
  "repl",
  "taglist",
  "close",
  "openfocussed",
  "closefocussed",
  "bnext",
  "bprevious",
  "refresh",
  "bufferlist",
  "refineprompt",
  "reply",
  "forward",
  "groupreply",
  "bounce",
  "openthread",
  "send",
  "reedit",
  "select",
  "retagprompt",
]);

export interface CommandInterpreterOptions {
  factory: CommandFactory;
  aliases?: CommandAliasTable;
  logger?: LogReporter;
}

function currentUserName(): string | undefined {
  try {
    return userInfo().username;
  } catch (error) {
    // No passwd entry for the process uid
    if (error instanceof Error) return undefined;
    throw error;
  }
}

/**
 * Expand a leading `~` or `~<user>` naming the current user to the home
 * directory. Other users' `~<user>` prefixes are left as written.
 */
export function expandHome(path: string): string {
  const match = /^~([^/]*)(?=$|\/)/.exec(path);
  if (!match) return path;
  const user = match[1];
  if (user !== "" && user !== currentUserName()) return path;
  return homedir() + path.slice(match[0].length);
}

function isRegularFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

export class CommandInterpreter {
  private factory: CommandFactory;
  private aliases: CommandAliasTable;
  private logger: LogReporter;

  constructor(options: CommandInterpreterOptions) {
    this.factory = options.factory;
    this.aliases = options.aliases ?? new CommandAliasTable();
    this.logger = options.logger ?? new NullLogReporter();
  }

  /**
   * Command for `line` in `mode`, or null when the line is empty, names no
   * visible command or does not fit the command's parameters
   */
  interpret(line: string, mode: Mode): Command | null {
    try {
      return this.parse(line, mode);
    } catch (error) {
      this.logger.error(error instanceof Error ? error : String(error), { type: "interpret", mode });
      return null;
    }
  }

  private parse(line: string, mode: Mode): Command | null {
    const match = line.trim().match(LINE_PATTERN);
    if (!match) {
      this.logger.debug("empty commandline", { type: "interpret", mode });
      return null;
    }

    let name = match[1];
    let rest = match[2] ?? "";

    const expansion = this.aliases.expand(name);
    if (expansion) {
      this.logger.debug(`alias ${name} -> ${expansion.name}`, { type: "alias", mode });
      name = expansion.name;
      rest = joinWords(expansion.args, rest);
    }

    // `!cmd args` is shorthand for `shellescape cmd args`
    if (name.startsWith("!")) {
      rest = joinWords(name.slice(1), rest);
      name = "shellescape";
    }

    if (!this.factory.registry.has(mode, name)) {
      this.logger.debug(`no command ${name} in mode ${mode}`, { type: "interpret", command: name, mode });
      return null;
    }

    const params = this.positionalParams(name, rest, mode);
    if (!params) {
      this.logger.debug(`unexpected arguments for ${name}: ${rest}`, { type: "interpret", command: name, mode });
      return null;
    }

    const result = this.factory.resolve(name, mode, params);
    return result.success ? result.command : null;
  }

  /**
   * Named parameters for the text after the command name
   */
  private positionalParams(name: string, rest: string, mode: Mode): CallsiteParams | null {
    switch (name) {
      case "search":
      case "refine":
        return { query: rest };
      case "compose":
        return rest ? { headers: { To: rest } } : {};
      case "prompt":
        return { startString: rest };
      case "retag":
        return { tagsString: rest };
      case "subject":
        return { key: "Subject", value: rest };
      case "to":
        return { key: "To", value: rest };
      case "shellescape":
        return { commandString: rest };
      case "toggletag":
        return { tag: rest };
      case "fold":
      case "unfold":
        return { all: rest === "all" };
      case "edit":
        return this.editParams(rest, mode);
      default:
        if (NO_ARGUMENT_COMMANDS.has(name) && rest === "") {
          return {};
        }
        return null;
    }
  }

  private editParams(rest: string, mode: Mode): CallsiteParams | null {
    const path = expandHome(rest);
    if (!isRegularFile(path)) {
      const error = new MalformedParameterError("edit", [`path: ${rest || "(none)"} is not a file`]);
      this.logger.error(error, { type: "interpret", command: "edit", mode });
      return null;
    }
    return { path };
  }
}

function joinWords(...parts: string[]): string {
  return parts.filter((part) => part.length > 0).join(" ");
}
