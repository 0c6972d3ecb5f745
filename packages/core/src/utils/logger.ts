export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export class Logger {
  private static get verbosity(): number {
    const level = process.env.LOG_VERBOSITY;
    const parsed = level ? parseInt(level, 10) : NaN;
    return Number.isNaN(parsed) ? LogLevel.WARN : parsed; // Default to 1 (ERROR + WARN)
  }

  static isEnabled(level: LogLevel): boolean {
    return this.verbosity >= level;
  }

  private static formatTime(): string {
    const now = new Date();
    return now.toTimeString().split(' ')[0]; // HH:MM:SS
  }

  static info(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.INFO)) {
      console.log(`${this.formatTime()} [INFO] ${message}`, ...args);
    }
  }

  static warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.WARN)) {
      console.warn(`${this.formatTime()} [WARN] ${message}`, ...args);
    }
  }

  static error(message: string, ...args: unknown[]): void {
    console.error(`${this.formatTime()} [ERROR] ${message}`, ...args);
  }

  static debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      console.debug(`${this.formatTime()} [DEBUG] ${message}`, ...args);
    }
  }
}
