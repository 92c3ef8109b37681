export {
  BaseLogReporter,
  ConsoleLogReporter,
  FileLogReporter,
  MultiLogReporter,
  NullLogReporter,
  createLogReporter,
  isLevelEnabled,
  LOG_LEVELS,
  type LogLevel,
  type LogEntry,
  type LogEntryType,
  type LogFields,
  type LogReporter,
  type ConsoleLogReporterOptions,
  type FileLogReporterOptions,
} from "./log-reporter.js";
