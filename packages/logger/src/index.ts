export {
  initLogger,
  getLogger,
  createLogger,
  flushLoggers,
  isLogLevel,
  LOG_LEVELS,
  DEFAULT_REDACT_KEYS,
  type Logger,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { FileSink, type FileSinkOptions } from './sinks/file.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
