/**
 * Logger Implementation
 *
 * Structured, leveled logger used across ingestion, search and the CLI.
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  createDefaultLoggerConfig,
  shouldLog,
  formatError,
  LogLevel as LogLevelEnum,
  LogFormat,
} from './types.js';

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;
  private level: LogLevel;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = createDefaultLoggerConfig(config);
    this.level = this.config.level;
  }

  /**
   * Create a child logger whose source is appended to this one's
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      level: this.level,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: Error, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: Error | Record<string, unknown>,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error) {
      this.log(LogLevelEnum.ERROR, message, context, errorOrContext);
    } else {
      this.log(LogLevelEnum.ERROR, message, errorOrContext);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.DEBUG, message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.TRACE, message, context);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!shouldLog(level, this.level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context,
      source: this.config.source,
      error: error ? formatError(error) : undefined,
    };

    this.output(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return this.formatJson(entry);
      case LogFormat.COMPACT:
        return this.formatCompact(entry);
      case LogFormat.PRETTY:
        return this.formatPretty(entry);
      case LogFormat.TEXT:
      default:
        return this.formatText(entry);
    }
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }
    parts.push(LogLevelName[entry.level].padEnd(5));
    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(`\n  Error: ${entry.error.name}${code}: ${entry.error.message}`);
      if (entry.error.stack) {
        parts.push(`\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`);
      }
    }

    return parts.join(' ');
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: LogLevelName[entry.level],
      message: entry.message,
      source: entry.source,
      context: entry.context,
      error: entry.error,
    });
  }

  private formatCompact(entry: LogEntry): string {
    const levelLetter = LogLevelName[entry.level].charAt(0);
    const time = entry.timestamp.toISOString().slice(11, 19);
    return `${time} ${levelLetter} ${entry.message}`;
  }

  private formatPretty(entry: LogEntry): string {
    if (!this.config.colors) {
      return this.formatText(entry);
    }

    const parts: string[] = [];
    const levelColor = LogLevelColors[entry.level];

    if (this.config.timestamps) {
      parts.push(`${LogColors.gray}[${entry.timestamp.toISOString()}]${LogColors.reset}`);
    }
    parts.push(`${levelColor}${LogLevelName[entry.level].padEnd(5)}${LogColors.reset}`);
    if (entry.source) {
      parts.push(`${LogColors.cyan}[${entry.source}]${LogColors.reset}`);
    }
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(`${LogColors.dim}${JSON.stringify(entry.context)}${LogColors.reset}`);
    }
    if (entry.error) {
      parts.push(
        `\n  ${LogColors.red}Error: ${entry.error.name}: ${entry.error.message}${LogColors.reset}`
      );
      if (entry.error.stack) {
        parts.push(
          `\n  ${LogColors.gray}${entry.error.stack.replace(/\n/g, '\n  ')}${LogColors.reset}`
        );
      }
    }

    return parts.join(' ');
  }

  private output(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (!this.config.console) {
      return;
    }
    // stdout is reserved for command output
    if (level === LogLevelEnum.ERROR) {
      console.error(formatted);
    } else {
      console.warn(formatted);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config, level: this.level };
  }
}

// =============================================================================
// Global Logger Instance
// =============================================================================

let globalLogger: Logger | null = null;

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({
      level: LogLevelEnum.INFO,
      format: 'pretty',
    });
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

/**
 * Create a logger with a specific source
 */
export function createLogger(
  source: string,
  config?: Partial<LoggerConfig>
): Logger {
  return new Logger({
    ...config,
    source,
  });
}

/**
 * Resolve the logger a component should use: the caller's, or a child of the global one
 */
export function resolveLogger(source: string, logger?: Logger): Logger {
  return logger ?? getGlobalLogger().child(source);
}
