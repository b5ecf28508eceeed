import { sanitize, type Sanitizer } from '@cloudcall/core';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

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
  /** Logger whose entries always carry `bindings` in their context. */
  child(bindings: Record<string, unknown>): Logger;
  isLevelEnabled(level: LogLevel): boolean;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: Sink[];
  /**
   * Applied to every message and every string in the context before an entry
   * reaches a sink. Defaults to the core redaction pass.
   */
  sanitizer?: Sanitizer;
}

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(levelOrder, value);
}

/**
 * Serialize context for logging and redact every string inside it.
 * Handles Error objects, circular references, BigInt and non-serializable values.
 * Note: shared object references (same object at multiple keys) are treated as circular.
 */
function serializeContext(obj: Record<string, unknown>, redact: Sanitizer): Record<string, unknown> {
  const seen = new WeakSet();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return {
        name: value.name,
        message: redact(value.message),
        stack: value.stack === undefined ? undefined : redact(value.stack),
      };
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (typeof value === 'string') {
      return redact(value);
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
    return JSON.parse(JSON.stringify(obj, replacer)) as Record<string, unknown>;
  } catch {
    return { error: '[unserializable]' };
  }
}

class LoggerImpl implements Logger {
  constructor(
    private readonly category: string,
    private readonly bindings?: Record<string, unknown>
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

  child(bindings: Record<string, unknown>): Logger {
    return new LoggerImpl(this.category, { ...this.bindings, ...bindings });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return globalConfig.sinks.length > 0 && levelOrder[level] >= levelOrder[globalConfig.level];
  }

  private log(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    if (!this.isLevelEnabled(level)) return;

    const redact = globalConfig.sanitizer;
    const rawMsg = typeof msgOrObj === 'string' ? msgOrObj : (maybeMsg ?? '');
    const fields = typeof msgOrObj === 'string' ? this.bindings : { ...this.bindings, ...msgOrObj };
    const context = fields ? serializeContext(fields, redact) : undefined;

    const entry: LogEntry = {
      level,
      category: this.category,
      timestamp: new Date(),
      msg: redact(rawMsg),
      ...(context ? { context } : {}),
    };

    for (const sink of globalConfig.sinks) {
      sink.write(entry);
    }
  }
}

// Global logger state
let globalConfig: Required<LoggerConfig> = {
  level: 'info',
  sinks: [],
  sanitizer: sanitize,
};

const loggerCache = new Map<string, Logger>();

export function initLogger(config: LoggerConfig): void {
  globalConfig = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
    sanitizer: config.sanitizer ?? sanitize,
  };
  loggerCache.clear();
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }

  const logger = new LoggerImpl(category);
  loggerCache.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of globalConfig.sinks) {
    sink.flush();
  }
}
