/**
 * Structured Log Levels: RFC 5424 / OpenTelemetry severity conventions.
 *
 * Levels (ascending severity):
 *   TRACE → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 *   TRACE  Request/response bodies, raw directory payloads.
 *   DEBUG  Cache hits, trigger resolution, not-found lookups.
 *   INFO   Business events: game created, app authenticated.
 *   WARN   Recoverable anomalies: unknown tenant, rejected credentials, ignored command errors.
 *   ERROR  Failed operations: persistence failure, misconfigured role gate.
 *   FATAL  Unexpected exceptions reaching a surface boundary.
 *   OFF    Suppress all log output.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

/** String → enum mapping (case-insensitive). */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  // Look up named key; typeof check avoids numeric enum reverse-mapping ('0' → 'TRACE')
  const mapped: unknown = LogLevel[upper as keyof typeof LogLevel];
  if (typeof mapped === 'number') return mapped;
  const num = Number(upper);
  if (!isNaN(num) && num >= (LogLevel.TRACE as number) && num <= (LogLevel.OFF as number)) return num;
  return LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/** Functional area a log entry belongs to. */
export enum LogCategory {
  /** HTTP request/response lifecycle */
  HTTP = 'http',
  /** Credential authentication & scope checks */
  AUTH = 'auth',
  /** Tenant configuration and command gating */
  TENANT = 'tenant',
  /** Member resolution against the membership directory */
  IDENTITY = 'identity',
  /** Game creation and lookup */
  GAME = 'game',
  /** Command dispatch */
  COMMAND = 'command',
  /** PostgreSQL pool and queries */
  DATABASE = 'database',
  GENERAL = 'general',
}

export interface LogConfig {
  /** Global minimum log level (LOG_LEVEL, default INFO). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { 'identity': LogLevel.DEBUG, 'http': LogLevel.WARN }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /** Include stack traces in ERROR/FATAL output (default: true). */
  includeStackTraces: boolean;

  /** Maximum payload size to log in bytes (default: 8KB). Bodies larger are truncated. */
  maxPayloadSizeBytes: number;

  /** 'json' for one structured line per entry, 'pretty' for human-readable output. */
  format: 'json' | 'pretty';
}

/** Build the log configuration from environment variables. Read once per logger. */
export function buildDefaultLogConfig(): LogConfig {
  const isProd = process.env.NODE_ENV === 'production';
  return {
    globalLevel: parseLogLevel(process.env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(process.env.LOG_CATEGORY_LEVELS),
    includeStackTraces: process.env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(process.env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd ? 'json' : parseLogFormat(process.env.LOG_FORMAT),
  };
}

function parseLogFormat(raw: string | undefined): 'json' | 'pretty' {
  return raw === 'json' ? 'json' : 'pretty';
}

function isLogCategory(value: string): value is LogCategory {
  return (Object.values(LogCategory) as string[]).includes(value);
}

/**
 * Parse LOG_CATEGORY_LEVELS env var.
 * Format: "identity=DEBUG,auth=WARN,http=TRACE"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = cat.trim();
      if (isLogCategory(category)) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
