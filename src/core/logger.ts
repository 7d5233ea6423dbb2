// Leveled console logger shared by the store and the CLI

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Maps a configured level name (`logging.level`) to its LogLevel
 */
export function toLogLevel(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

export interface LoggerConfig {
  level: LogLevel;
  prefix: string;
}

type Context = Record<string, unknown>;

/**
 * Writes `<prefix> [LEVEL] message {context}` lines to the console method
 * matching the level. Messages below the configured level are dropped.
 */
export class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { level: LogLevel.INFO, prefix: '[planner]', ...config };
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigures the shared logger in place, so modules holding `logger` see the change
   */
  static configure(config: Partial<LoggerConfig>): void {
    const instance = Logger.getInstance();
    instance.config = { ...instance.config, ...config };
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  debug(message: string, context?: Context): void {
    if (this.config.level <= LogLevel.DEBUG) {
      console.debug(this.line('DEBUG', message, context));
    }
  }

  info(message: string, context?: Context): void {
    if (this.config.level <= LogLevel.INFO) {
      console.info(this.line('INFO', message, context));
    }
  }

  warn(message: string, context?: Context): void {
    if (this.config.level <= LogLevel.WARN) {
      console.warn(this.line('WARN', message, context));
    }
  }

  error(message: string, context?: Context): void {
    if (this.config.level <= LogLevel.ERROR) {
      console.error(this.line('ERROR', message, context));
    }
  }

  private line(label: string, message: string, context?: Context): string {
    const text = `${this.config.prefix} [${label}] ${message}`;
    return context && Object.keys(context).length > 0 ? `${text} ${JSON.stringify(context)}` : text;
  }
}

export const logger = Logger.getInstance();
