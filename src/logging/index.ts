export {
  ConsoleTransport,
  MemoryTransport,
  ReportLoggerImpl,
  LOG_LEVELS,
  createDefaultFormatter,
  createReportLogger,
  createSilentLogger,
  isLogLevel,
  shouldLog,
} from "./logger.js";

export type {
  LogContext,
  LogEntry,
  LogFormatter,
  LogLevel,
  LogTransport,
  LoggerOptions,
  ReportLogger,
} from "./logger.js";
