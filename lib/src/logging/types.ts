/**
 * Logging Types and Schemas
 *
 * Log levels, output formats and the zod-validated logger configuration
 * shared by every pipeline stage and the CLI.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelName = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
} as const;

export type LogLevelName = (typeof LogLevelName)[keyof typeof LogLevelName];

export const LogLevelSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

// =============================================================================
// Log Entry
// =============================================================================

export const LogEntrySchema = z.object({
  level: LogLevelSchema,
  message: z.string(),
  timestamp: z.date(),
  /** Structured fields attached to the message */
  context: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      code: z.string().optional(),
      stack: z.string().optional(),
    })
    .optional(),
  /** Colon-joined component path, e.g. `ingest:chunker` */
  source: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  /** Human-readable single line */
  TEXT: 'text',
  /** One JSON object per line */
  JSON: 'json',
  /** Time, level letter and message only */
  COMPACT: 'compact',
  /** Text with ANSI colors */
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'compact', 'pretty']);

export const LoggerConfigSchema = z.object({
  /**
   * Minimum level written
   * @default LogLevel.INFO
   */
  level: LogLevelSchema.default(LogLevel.INFO),

  /** @default 'text' */
  format: LogFormatSchema.default('text'),

  timestamps: z.boolean().default(true),

  /** Only honoured by the pretty format */
  colors: z.boolean().default(true),

  source: z.string().optional(),

  /**
   * Write to the console when no custom output is set
   * @default true
   */
  console: z.boolean().default(true),

  /**
   * Custom sink receiving each formatted line. Takes precedence over console output.
   */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.void())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(
  overrides?: Partial<LoggerConfig>
): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Log Formatting
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const LogColors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export const LogLevelColors: Record<LogLevel, string> = {
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
  [LogLevel.TRACE]: LogColors.gray,
};

// =============================================================================
// Utility Functions
// =============================================================================

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  ERROR: LogLevel.ERROR,
  WARN: LogLevel.WARN,
  WARNING: LogLevel.WARN,
  INFO: LogLevel.INFO,
  DEBUG: LogLevel.DEBUG,
  TRACE: LogLevel.TRACE,
};

/**
 * Parse a log level name (case-insensitive). Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  return LEVELS_BY_NAME[level.trim().toUpperCase()] ?? LogLevel.INFO;
}

/**
 * Parse a log format name. Unknown names yield undefined.
 */
export function parseLogFormat(format: string): LogFormat | undefined {
  const parsed = LogFormatSchema.safeParse(format.trim().toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

export function getLogLevelName(level: LogLevel): LogLevelName {
  return LogLevelName[level];
}

/**
 * Check if a log level should be output given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

/**
 * Format an error for logging. Errors carrying a string `code` keep it.
 */
export function formatError(
  error: unknown
): { name: string; message: string; code?: string; stack?: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code !== undefined ? { code } : {}),
      ...(error.stack !== undefined ? { stack: error.stack } : {}),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

/**
 * Read LOG_LEVEL / LOG_FORMAT from an environment map
 */
export function loadLoggerConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<LoggerConfig> {
  const config: Partial<LoggerConfig> = {};
  const level = env['LOG_LEVEL'];
  const format = env['LOG_FORMAT'];

  if (level) {
    config.level = parseLogLevel(level);
  }
  if (format) {
    const parsed = parseLogFormat(format);
    if (parsed) {
      config.format = parsed;
    }
  }
  return config;
}
