import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Oldest entries are dropped past this many pending entries. Default 1000. */
  maxBuffer?: number | undefined;
}

const DEFAULT_MAX_BUFFER = 1000;

function overflowNotice(dropped: number): LogEntry {
  return {
    level: 'warn',
    category: 'logger',
    timestamp: new Date(),
    msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
  };
}

/**
 * Queues entries and hands them to the subclass in one batch, either on the
 * next turn of the event loop or on an explicit `flush()`.
 */
export abstract class BufferedSink implements Sink {
  private queue: LogEntry[] = [];
  private overflow = 0;
  private drainScheduled = false;
  private readonly capacity: number;

  constructor(options?: BufferedSinkOptions) {
    this.capacity = options?.maxBuffer ?? DEFAULT_MAX_BUFFER;
  }

  protected abstract writeEntry(entry: LogEntry): void;

  /**
   * Write a drained batch. Sinks with a cheaper bulk write override this.
   */
  protected writeBatch(entries: readonly LogEntry[]): void {
    entries.forEach((entry) => this.writeEntry(entry));
  }

  get pending(): number {
    return this.queue.length;
  }

  write(entry: LogEntry): void {
    this.queue.push(entry);
    if (this.queue.length > this.capacity) {
      this.queue.shift();
      this.overflow++;
    }

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.drain());
    }
  }

  flush(): void {
    this.drain();
  }

  private drain(): void {
    this.drainScheduled = false;
    if (this.queue.length === 0 && this.overflow === 0) {
      return;
    }

    const batch = this.overflow > 0 ? [overflowNotice(this.overflow), ...this.queue] : this.queue;
    this.queue = [];
    this.overflow = 0;
    this.writeBatch(batch);
  }
}
