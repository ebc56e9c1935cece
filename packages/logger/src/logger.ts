export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
  /**
   * Context keys whose values are replaced with `[REDACTED]` at any depth.
   * Matched case-insensitively. Defaults to {@link DEFAULT_REDACT_KEYS}.
   */
  redactKeys?: readonly string[] | undefined;
}

interface ResolvedLoggerConfig {
  level: LogLevel;
  sinks: Sink[];
  redactKeys: ReadonlySet<string>;
}

export const DEFAULT_REDACT_KEYS: readonly string[] = ['password', 'token', 'authorization', 'apiKey', 'secret'];

const REDACTED = '[REDACTED]';

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolveConfig(config: LoggerConfig): ResolvedLoggerConfig {
  return {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
    redactKeys: new Set((config.redactKeys ?? DEFAULT_REDACT_KEYS).map((key) => key.toLowerCase())),
  };
}

/**
 * Serialize a context object into plain JSON data.
 * Errors become `{ name, message, stack }`, BigInts become strings, values with a
 * `toJSON` (Decimal, Date) use it, cycles become `[Circular]` and redacted keys
 * are masked. Shared references at several keys are treated as cycles.
 */
function serializeContext(obj: Record<string, unknown>, redactKeys: ReadonlySet<string>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (key: string, value: unknown): unknown => {
    if (key !== '' && redactKeys.has(key.toLowerCase()) && value !== undefined && value !== null) {
      return REDACTED;
    }

    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    const parsed: unknown = JSON.parse(JSON.stringify(obj, replacer));
    return isRecord(parsed) ? parsed : {};
  } catch {
    return { error: '[unserializable]' };
  }
}

class LoggerImpl implements Logger {
  constructor(
    private readonly category: string,
    private readonly config: () => ResolvedLoggerConfig
  ) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  private log(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    // Resolved per call so loggers created at module load follow a later initLogger()
    const config = this.config();
    if (levelOrder[level] < levelOrder[config.level]) return;

    let msg: string;
    let context: Record<string, unknown> | undefined;

    if (typeof msgOrObj === 'string') {
      msg = msgOrObj;
    } else {
      msg = maybeMsg ?? '';
      context = serializeContext(msgOrObj, config.redactKeys);
    }

    const entry: LogEntry = {
      level,
      category: this.category,
      timestamp: new Date(),
      msg,
      ...(context ? { context } : {}),
    };

    for (const sink of config.sinks) {
      sink.write(entry);
    }
  }
}

// Process-wide default, used by getLogger(). Silent until initLogger() runs.
let globalConfig: ResolvedLoggerConfig = resolveConfig({});

const loggerCache = new Map<string, Logger>();

export function initLogger(config: LoggerConfig): void {
  globalConfig = resolveConfig(config);
  loggerCache.clear();
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }

  const logger = new LoggerImpl(category, () => globalConfig);
  loggerCache.set(category, logger);
  return logger;
}

/**
 * Create a logger bound to its own level and sinks, independent of initLogger().
 * Use this to give a client instance its own log destination.
 */
export function createLogger(category: string, config: LoggerConfig): Logger {
  const resolved = resolveConfig(config);
  return new LoggerImpl(category, () => resolved);
}

export function flushLoggers(): void {
  for (const sink of globalConfig.sinks) {
    sink.flush();
  }
}
