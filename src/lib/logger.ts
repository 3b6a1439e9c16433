import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const LEVEL_STYLE: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
};

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  name: string;
  level?: LogLevel;
  /** Receives one formatted line (with trailing newline). Defaults to stderr. */
  write?: (line: string) => void;
  /** Clock used for timestamps */
  now?: () => Date;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function pad(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

/**
 * Formats a timestamp as `Oct 19 16:07:03` in local time
 */
export function formatTimestamp(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function serializeMeta(meta: LogMeta): string {
  return JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  );
}

/**
 * Leveled logger handle.
 *
 * One instance is built by the CLI entry point and handed down to commands
 * and services; there is no module-level logger.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ name: 'gh-graft', level: 'debug' });
 * logger.info('Processing', { repo: 'octocat/hello-world' });
 * // Oct 19 16:07:03 INFO gh-graft: Processing {"repo":"octocat/hello-world"}
 * ```
 */
export class Logger {
  readonly name: string;
  readonly level: LogLevel;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;

  constructor(options: LoggerOptions) {
    this.name = options.name;
    this.level = options.level ?? 'info';
    this.write = options.write ?? ((line) => process.stderr.write(line));
    this.now = options.now ?? (() => new Date());
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log('error', message, meta);
  }

  child(name: string): Logger {
    return new Logger({
      name: `${this.name}:${name}`,
      level: this.level,
      write: this.write,
      now: this.now
    });
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.isEnabled(level)) return;
    const label = LEVEL_STYLE[level](level.toUpperCase());
    let line = `${formatTimestamp(this.now())} ${label} ${this.name}: ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      line += ` ${serializeMeta(meta)}`;
    }
    this.write(`${line}\n`);
  }
}
