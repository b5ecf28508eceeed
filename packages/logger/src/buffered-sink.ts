import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  maxBuffer?: number;
}

/**
 * Base class for sinks that buffer log entries and drain them on the next tick,
 * so logging inside a retry loop or a stream never blocks on output.
 *
 * When the buffer is full the oldest entry is dropped; the next drain reports
 * how many were lost. Subclasses implement `writeEntry(entry)`.
 */
export abstract class BufferedSink implements Sink {
  private buffer: LogEntry[] = [];
  private scheduled = false;
  private dropped = 0;
  private readonly maxBuffer: number;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = Math.max(1, options?.maxBuffer ?? 1000);
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    if (this.buffer.length >= this.maxBuffer) {
      this.dropped++;
      this.buffer.shift();
    }
    this.buffer.push(entry);
    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.drain());
    }
  }

  /** Drain buffer synchronously. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    if (this.buffer.length === 0 && this.dropped === 0) {
      this.scheduled = false;
      return;
    }

    const entries = this.buffer;
    const dropped = this.dropped;
    this.buffer = [];
    this.scheduled = false;
    this.dropped = 0;

    if (dropped > 0) {
      this.writeEntry({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
      });
    }

    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }
}
