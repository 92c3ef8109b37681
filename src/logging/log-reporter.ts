/**
 * Log Reporter
 *
 * Logging interface shared by the interpreter, factory and dispatcher.
 * Supports multiple output destinations.
 */

import { appendFileSync, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

// ============================================================================
// LOG ENTRY TYPES
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error"];

/**
 * Log entry type identifying the stage that produced it
 */
export type LogEntryType =
  | "interpret"      // Commandline parsing
  | "resolve"        // Registry lookup and parameter binding
  | "apply"          // Command application
  | "hook"           // Pre/post hook
  | "alias"          // Alias expansion
  | "config"         // Settings and hook loading
  | "message"        // Free-form message from a command
  | "error";         // Error

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  type: LogEntryType;
  message: string;
  /** Dispatcher-assigned id of one command application */
  invocationId?: string;
  /** Command name (if applicable) */
  command?: string;
  /** Active mode (if applicable) */
  mode?: string;
  /** Bound parameters (if applicable) */
  params?: Record<string, unknown>;
  error?: {
    code?: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

/**
 * Optional fields callers attach to a message
 */
export type LogFields = Partial<Omit<LogEntry, "timestamp" | "level" | "message" | "error">>;

// ============================================================================
// LOG REPORTER INTERFACE
// ============================================================================

/**
 * Implement this interface to create custom log destinations.
 */
export interface LogReporter {
  log(entry: LogEntry): void;

  trace(message: string, fields?: LogFields): void;

  debug(message: string, fields?: LogFields): void;

  info(message: string, fields?: LogFields): void;

  warn(message: string, fields?: LogFields): void;

  error(error: Error | string, fields?: LogFields): void;

  /**
   * Flush any buffered entries (for file-based reporters)
   */
  flush?(): void | Promise<void>;

  /**
   * Close the reporter (cleanup resources)
   */
  close?(): void | Promise<void>;
}

/**
 * Builds entries for the level methods; subclasses only implement `log`.
 */
export abstract class BaseLogReporter implements LogReporter {
  abstract log(entry: LogEntry): void;

  protected entry(level: LogLevel, message: string, fields: LogFields = {}): LogEntry {
    return {
      type: "message",
      ...fields,
      timestamp: new Date().toISOString(),
      level,
      message,
    };
  }

  trace(message: string, fields?: LogFields): void {
    this.log(this.entry("trace", message, fields));
  }

  debug(message: string, fields?: LogFields): void {
    this.log(this.entry("debug", message, fields));
  }

  info(message: string, fields?: LogFields): void {
    this.log(this.entry("info", message, fields));
  }

  warn(message: string, fields?: LogFields): void {
    this.log(this.entry("warn", message, fields));
  }

  error(error: Error | string, fields?: LogFields): void {
    const err = error instanceof Error ? error : new Error(error);
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    this.log({
      ...this.entry("error", err.message, { type: "error", ...fields }),
      error: { code, message: err.message, stack: err.stack },
    });
  }
}

// ============================================================================
// CONSOLE LOG REPORTER
// ============================================================================

export interface ConsoleLogReporterOptions {
  /** Minimum log level to output */
  minLevel?: LogLevel;
  showTimestamps?: boolean;
  /** Use colors (ANSI escape codes) */
  useColors?: boolean;
  /** Custom prefix for all log lines */
  prefix?: string;
  /** Defaults to stderr so the terminal UI owns stdout */
  write?: (line: string) => void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

export class ConsoleLogReporter extends BaseLogReporter {
  private options: Required<ConsoleLogReporterOptions>;

  constructor(options: ConsoleLogReporterOptions = {}) {
    super();
    this.options = {
      minLevel: options.minLevel ?? "info",
      showTimestamps: options.showTimestamps ?? true,
      useColors: options.useColors ?? true,
      prefix: options.prefix ?? "[mua]",
      write: options.write ?? ((line) => console.error(line)),
    };
  }

  private formatTimestamp(timestamp: string): string {
    if (!this.options.showTimestamps) return "";
    const time = timestamp.split("T")[1]?.split(".")[0] || timestamp;
    return `[${time}] `;
  }

  private colorize(text: string, color: string): string {
    if (!this.options.useColors) return text;
    const colors: Record<string, string> = {
      reset: "\x1b[0m",
      red: "\x1b[31m",
      yellow: "\x1b[33m",
      blue: "\x1b[34m",
      gray: "\x1b[90m",
    };
    return `${colors[color] || ""}${text}${colors.reset}`;
  }

  private getLevelColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      trace: "gray",
      debug: "gray",
      info: "blue",
      warn: "yellow",
      error: "red",
    };
    return colors[level];
  }

  format(entry: LogEntry): string {
    const label = this.colorize(entry.level.toUpperCase().padEnd(5), this.getLevelColor(entry.level));
    const scope = entry.command ? ` ${entry.command}${entry.mode ? `@${entry.mode}` : ""}` : "";
    return `${this.options.prefix} ${this.formatTimestamp(entry.timestamp)}${label} ${entry.type}${scope}: ${entry.message}`;
  }

  log(entry: LogEntry): void {
    if (!isLevelEnabled(entry.level, this.options.minLevel)) return;

    this.options.write(this.format(entry));
    if (entry.error?.stack && entry.level === "error") {
      for (const line of entry.error.stack.split("\n").slice(1)) {
        this.options.write(`${this.options.prefix}    ${line.trim()}`);
      }
    }
  }
}

// ============================================================================
// FILE LOG REPORTER
// ============================================================================

export interface FileLogReporterOptions {
  filePath: string;
  minLevel?: LogLevel;
  /** Flush after each write */
  autoFlush?: boolean;
}

/**
 * File-based log reporter (JSONL format)
 */
export class FileLogReporter extends BaseLogReporter {
  private filePath: string;
  private buffer: LogEntry[] = [];
  private autoFlush: boolean;
  private minLevel: LogLevel;
  private initialized = false;

  constructor(options: FileLogReporterOptions) {
    super();
    this.filePath = options.filePath;
    this.autoFlush = options.autoFlush ?? true;
    this.minLevel = options.minLevel ?? "debug";
  }

  private ensureInitialized(): void {
    if (this.initialized) return;

    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    writeFileSync(
      this.filePath,
      JSON.stringify({
        type: "header",
        version: "1.0",
        startTime: new Date().toISOString(),
      }) + "\n"
    );

    this.initialized = true;
  }

  log(entry: LogEntry): void {
    if (!isLevelEnabled(entry.level, this.minLevel)) return;
    this.buffer.push(entry);
    if (this.autoFlush) {
      this.flush();
    }
  }

  flush(): void {
    if (this.buffer.length === 0) return;

    this.ensureInitialized();

    const lines = this.buffer.map((entry) => JSON.stringify(entry)).join("\n") + "\n";
    appendFileSync(this.filePath, lines);
    this.buffer = [];
  }

  close(): void {
    this.flush();
    this.ensureInitialized();

    appendFileSync(
      this.filePath,
      JSON.stringify({
        type: "footer",
        endTime: new Date().toISOString(),
      }) + "\n"
    );
  }
}

// ============================================================================
// MULTI LOG REPORTER
// ============================================================================

/**
 * Forwards log entries to multiple reporters.
 */
export class MultiLogReporter extends BaseLogReporter {
  private reporters: LogReporter[];

  constructor(reporters: LogReporter[] = []) {
    super();
    this.reporters = reporters;
  }

  addReporter(reporter: LogReporter): void {
    this.reporters.push(reporter);
  }

  removeReporter(reporter: LogReporter): void {
    const index = this.reporters.indexOf(reporter);
    if (index >= 0) {
      this.reporters.splice(index, 1);
    }
  }

  log(entry: LogEntry): void {
    for (const reporter of this.reporters) {
      reporter.log(entry);
    }
  }

  async flush(): Promise<void> {
    await Promise.all(this.reporters.map((r) => r.flush?.()));
  }

  async close(): Promise<void> {
    await Promise.all(this.reporters.map((r) => r.close?.()));
  }
}

// ============================================================================
// NULL LOG REPORTER
// ============================================================================

/**
 * Use when logging is disabled.
 */
export class NullLogReporter extends BaseLogReporter {
  log(_entry: LogEntry): void {}
}

// ============================================================================
// FACTORY
// ============================================================================

export function createLogReporter(options?: {
  console?: boolean | ConsoleLogReporterOptions;
  file?: string | FileLogReporterOptions;
  reporters?: LogReporter[];
}): LogReporter {
  if (!options) {
    return new NullLogReporter();
  }

  const reporters: LogReporter[] = [];

  if (options.console) {
    const consoleOptions = typeof options.console === "boolean" ? {} : options.console;
    reporters.push(new ConsoleLogReporter(consoleOptions));
  }

  if (options.file) {
    const fileOptions = typeof options.file === "string"
      ? { filePath: options.file }
      : options.file;
    reporters.push(new FileLogReporter(fileOptions));
  }

  if (options.reporters) {
    reporters.push(...options.reporters);
  }

  if (reporters.length === 0) {
    return new NullLogReporter();
  }

  if (reporters.length === 1) {
    return reporters[0];
  }

  return new MultiLogReporter(reporters);
}
