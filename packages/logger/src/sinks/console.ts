import { resolveLogColor } from '../env.schema.js';
import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  /** ANSI level colors; defaults to ZENTITY_LOG_COLOR */
  color?: boolean | undefined;
  /** Queued entries kept before the oldest are dropped (default 1000) */
  maxBuffer?: number | undefined;
}

const levelColors: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Prints `[HH:MM:SS] LEVEL [category] message {key=value, ...}` lines.
 *
 * Entries are queued and printed together on the next macrotask, so a commit
 * never waits on the terminal. `flush()` prints the queue at once.
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private readonly maxBuffer: number;
  private queue: LogEntry[] = [];
  private dropped = 0;
  private pending: NodeJS.Immediate | undefined;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? resolveLogColor();
    this.maxBuffer = options?.maxBuffer ?? 1000;
  }

  write(entry: LogEntry): void {
    if (this.queue.length >= this.maxBuffer) {
      this.queue.shift();
      this.dropped++;
    }
    this.queue.push(entry);
    if (this.pending === undefined) {
      this.pending = setImmediate(() => this.flush());
    }
  }

  flush(): void {
    if (this.pending !== undefined) {
      clearImmediate(this.pending);
      this.pending = undefined;
    }

    const entries = this.queue;
    this.queue = [];

    if (this.dropped > 0) {
      const count = this.dropped;
      this.dropped = 0;
      this.print({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${String(count)} log entries (buffer overflow)`,
      });
    }

    for (const entry of entries) {
      this.print(entry);
    }
  }

  private print(entry: LogEntry): void {
    const context = entry.context ? ` ${formatContext(entry.context)}` : '';
    const line = `${formatTime(entry.timestamp)} ${this.formatLevel(entry.level)} [${entry.category}] ${entry.msg}${context}`;

    switch (entry.level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? `${levelColors[level]}${upper}\x1b[0m` : upper;
  }
}

function formatTime(timestamp: Date): string {
  const hours = String(timestamp.getHours()).padStart(2, '0');
  const minutes = String(timestamp.getMinutes()).padStart(2, '0');
  const seconds = String(timestamp.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}
