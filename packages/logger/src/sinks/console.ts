import pc from 'picocolors';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean | undefined;
  /**
   * `split` sends error/warn to stderr and the rest to stdout.
   * `stderr` sends everything to stderr so stdout stays clean for JSON output.
   */
  routing?: 'split' | 'stderr' | undefined;
  /** `time` prints HH:MM:SS, `iso` the full ISO-8601 timestamp. */
  timestamps?: 'time' | 'iso' | undefined;
}

/**
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export class ConsoleSink extends BufferedSink {
  private readonly colors: ReturnType<typeof pc.createColors>;
  private readonly routing: 'split' | 'stderr';
  private readonly timestamps: 'time' | 'iso';

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.colors = pc.createColors(options?.color ?? false);
    this.routing = options?.routing ?? 'split';
    this.timestamps = options?.timestamps ?? 'time';
  }

  protected writeEntry(entry: LogEntry): void {
    const time = this.formatTime(entry.timestamp);
    const level = this.formatLevel(entry.level);
    const category = `[${entry.category}]`;
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';

    const message = `${time} ${level} ${category} ${entry.msg}${context}`;

    if (this.routing === 'stderr' || entry.level === 'error') {
      console.error(message);
    } else if (entry.level === 'warn') {
      console.warn(message);
    } else {
      console.log(message);
    }
  }

  private formatTime(timestamp: Date): string {
    if (this.timestamps === 'iso') {
      return `[${timestamp.toISOString()}]`;
    }
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return `[${hours}:${minutes}:${seconds}]`;
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    switch (level) {
      case 'trace':
        return this.colors.gray(upper);
      case 'debug':
        return this.colors.cyan(upper);
      case 'info':
        return this.colors.green(upper);
      case 'warn':
        return this.colors.yellow(upper);
      case 'error':
        return this.colors.red(upper);
    }
  }

  private formatContext(context: Record<string, unknown>): string {
    const pairs: string[] = [];
    for (const [key, value] of Object.entries(context)) {
      pairs.push(`${key}=${JSON.stringify(value)}`);
    }
    return `{${pairs.join(', ')}}`;
  }
}
