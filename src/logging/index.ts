export {
  type ConsoleLoggerOptions,
  createConsoleLogger,
  formatLogLine,
  type Logger,
  type LogMeta,
  silentLogger,
} from "./logger";
