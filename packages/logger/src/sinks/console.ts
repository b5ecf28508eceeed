import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean;
  /** `text` (default) for humans, `json` for one JSON object per line. */
  format?: 'text' | 'json';
}

const levelColors: Record<LogLevel, string> = {
  trace: '\x1b[90m', // gray
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

/**
 * Console sink.
 *
 * Text format: [HH:MM:SS] LEVEL [category] message {context}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;
  private readonly format: 'text' | 'json';

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
    this.format = options?.format ?? 'text';
  }

  protected writeEntry(entry: LogEntry): void {
    const message = this.format === 'json' ? this.formatJson(entry) : this.formatText(entry);

    if (entry.level === 'error') {
      console.error(message);
    } else if (entry.level === 'warn') {
      console.warn(message);
    } else {
      console.log(message);
    }
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      msg: entry.msg,
      ...(entry.context ? { context: entry.context } : {}),
    });
  }

  private formatText(entry: LogEntry): string {
    const time = this.formatTime(entry.timestamp);
    const level = this.formatLevel(entry.level);
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';
    return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
  }

  private formatTime(timestamp: Date): string {
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return `[${hours}:${minutes}:${seconds}]`;
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? `${levelColors[level]}${upper}\x1b[0m` : upper;
  }

  private formatContext(context: Record<string, unknown>): string {
    const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    return `{${pairs.join(', ')}}`;
  }
}
