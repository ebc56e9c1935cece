import { appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions extends BufferedSinkOptions {
  path: string;
  /** Start from an empty file instead of appending to an existing one. */
  truncate?: boolean | undefined;
}

function toJsonLine(entry: LogEntry): string {
  const record = {
    timestamp: entry.timestamp.toISOString(),
    level: entry.level,
    category: entry.category,
    msg: entry.msg,
    ...(entry.context === undefined ? {} : { context: entry.context }),
  };
  return `${JSON.stringify(record)}\n`;
}

/**
 * JSON-lines log file, such as `banking_client.log`. Each drained batch is a
 * single synchronous append.
 */
export class FileSink extends BufferedSink {
  readonly path: string;

  constructor(options: FileSinkOptions) {
    super(options);
    this.path = options.path;

    mkdirSync(dirname(this.path), { recursive: true });
    if (options.truncate) {
      writeFileSync(this.path, '', 'utf8');
    }
  }

  protected writeEntry(entry: LogEntry): void {
    appendFileSync(this.path, toJsonLine(entry), 'utf8');
  }

  protected override writeBatch(entries: readonly LogEntry[]): void {
    appendFileSync(this.path, entries.map(toJsonLine).join(''), 'utf8');
  }
}
