import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

/**
 * Leveled logger with colored output.
 *
 * Every line goes to stderr: stdout is reserved for reports so that
 * `apexcov scan --output json` stays machine-readable.
 */
export class Logger {
  private level: LogLevel = "info";
  private prefix: string = "";
  private readonly parent: Logger | undefined;

  constructor(parent?: Logger, prefix = "") {
    this.parent = parent;
    this.prefix = prefix;
  }

  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.level = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== "silent" && LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("debug")) {
      console.error(chalk.gray(this.format(message)), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("info")) {
      console.error(this.format(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("warn")) {
      console.error(chalk.yellow(this.format(message)), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("error")) {
      console.error(chalk.red(this.format(message)), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled("info")) {
      console.error(chalk.green(this.format(message)), ...args);
    }
  }

  /**
   * Create a child logger with a prefix. Children follow the parent's level.
   */
  child(prefix: string): Logger {
    const label = chalk.dim(`[${prefix}]`);
    return new Logger(this, this.prefix ? `${this.prefix} ${label}` : label);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
