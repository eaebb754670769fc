/**
 * Leveled logging to stderr. stdout belongs to command results.
 */
import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

const STYLE: Record<Exclude<LogLevel, 'silent'>, { tag: string; color: ChalkInstance }> = {
  debug: { tag: 'DEBUG', color: chalk.gray },
  info: { tag: 'INFO', color: chalk.blue },
  warn: { tag: 'WARN', color: chalk.yellow },
  error: { tag: 'ERROR', color: chalk.red },
};

/**
 * Children share the level of the root they were created from.
 */
class Logger {
  private level: LogLevel = 'info';

  constructor(
    private readonly prefix = '',
    private readonly parent: Logger | null = null
  ) {}

  setLevel(level: LogLevel): void {
    if (this.parent) this.parent.setLevel(level);
    else this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string): void {
    if (RANK[level] < RANK[this.getLevel()]) return;
    const { tag, color } = STYLE[level];
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    console.error(color(`[${tag}] ${text}`));
  }
}

export const logger = new Logger();

export { Logger };
