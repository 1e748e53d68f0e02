// Centralized logging service for the review engine

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

/**
 * Receives formatted lines; defaults to the console
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  sink?: LogSink;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: '[review]',
  timestamps: false
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Parses a level name from configuration ("debug", "info", ...)
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.DEBUG:
      console.debug(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    default:
      console.error(line);
  }
};

/**
 * Logger with structured context output
 */
export class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}, private readonly parent: Logger | null = null) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the shared logger in place, so modules holding it see the change
   */
  static configure(config: Partial<LoggerConfig>): void {
    const shared = Logger.getInstance();
    shared.config = { ...shared.config, ...config };
  }

  /**
   * Effective settings; children follow their parent's level and sink
   */
  private get settings(): LoggerConfig {
    if (!this.parent) {
      return this.config;
    }
    return { ...this.parent.settings, prefix: this.config.prefix };
  }

  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
      return;
    }
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.settings.level;
  }

  /**
   * Logger for a sub-component, e.g. `[review:registry]`
   */
  child(scope: string): Logger {
    const base = this.settings.prefix ?? '';
    const prefix = base.endsWith(']') ? `${base.slice(0, -1)}:${scope}]` : `[${scope}]`;
    return new Logger({ prefix }, this);
  }

  private format(level: string, message: string, context?: Record<string, unknown>): string {
    const settings = this.settings;
    const parts: string[] = [];

    if (settings.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    if (settings.prefix) {
      parts.push(settings.prefix);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  private emit(level: LogLevel, label: string, message: string, context?: Record<string, unknown>): void {
    const settings = this.settings;
    if (settings.level <= level) {
      const sink = settings.sink ?? consoleSink;
      sink(level, this.format(label, message, context));
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, 'DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, 'INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, 'WARN', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, 'ERROR', message, context);
  }

  /**
   * Log an error with stack trace
   */
  exception(error: Error, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, 'ERROR', error.message, {
      ...context,
      name: error.name,
      stack: error.stack
    });
  }
}

// Export singleton instance
export const logger = Logger.getInstance();
