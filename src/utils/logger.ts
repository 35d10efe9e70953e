/**
 * @arch fmtkit.infra.logging
 *
 * Leveled console logger used by the CLI and the formatting pipeline.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Paint = (text: string) => string;

/**
 * Console logger with a level threshold and an optional prefix.
 * Child loggers share the level of the logger they were created from.
 */
class Logger {
  private level: LogLevel = 'info';
  private prefix = '';
  private parent: Logger | null = null;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.isLevelEnabled('debug')) return;
    this.write(console.log, chalk.gray, `[DEBUG] ${this.withPrefix(message)}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.isLevelEnabled('info')) return;
    this.write(console.log, chalk.blue, `[INFO] ${this.withPrefix(message)}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.isLevelEnabled('warn')) return;
    this.write(console.warn, chalk.yellow, `[WARN] ${this.withPrefix(message)}`, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isLevelEnabled('error')) return;
    const formatted = chalk.red(`[ERROR] ${this.withPrefix(message)}`);
    console.error(formatted);
    if (error instanceof Error) {
      console.error(chalk.red(error.stack ?? error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Create a child logger with a prefix, e.g. `run:java`.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }

  private withPrefix(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private write(
    sink: (...args: unknown[]) => void,
    paint: Paint,
    line: string,
    data?: Record<string, unknown>
  ): void {
    sink(paint(line));
    if (data) {
      sink(paint(JSON.stringify(data, null, 2)));
    }
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
