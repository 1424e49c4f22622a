import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
} from './log-levels';

/**
 * Correlation context attached to every log entry within a single unit of work
 * (an HTTP request or a dispatched command).
 */
export interface CorrelationContext {
  /** Propagated from X-Request-Id or generated. */
  requestId: string;
  method?: string;
  path?: string;
  /** Authenticated application id, once the scope guard has run. */
  principal?: string;
  /** Operation (handler or command) being executed. */
  operation?: string;
  /** Tenant the unit of work acts for, when known. */
  tenantId?: string;
  /** Start timestamp for duration tracking */
  startTime?: number;
}

/**
 * A single structured log entry.
 * In JSON format mode these are emitted as one JSON line per entry.
 */
export interface StructuredLogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  level: string;
  category: string;
  message: string;
  requestId?: string;
  principal?: string;
  operation?: string;
  tenantId?: string;
  method?: string;
  path?: string;
  durationMs?: number;
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  data?: Record<string, unknown>;
}

/**
 * GatewayLogger: structured, leveled, correlation-aware logger.
 *
 * Configuration is taken from the environment when the logger is constructed and
 * is not changed afterwards. Every component receives the logger through
 * injection; the correlation store belongs to the logger instance.
 *
 * Usage:
 *   this.logger.info(LogCategory.GAME, 'Game created', { gameId: 12 });
 *   this.logger.debug(LogCategory.IDENTITY, 'Member cache hit', { tenantId, memberId });
 */
@Injectable()
export class GatewayLogger {
  private readonly config: LogConfig;
  private readonly correlationStorage = new AsyncLocalStorage<CorrelationContext>();

  constructor() {
    this.config = buildDefaultLogConfig();
  }

  // ─── Correlation Context ──────────────────────────────────────────

  /** Run a function within a correlation context. */
  runWithContext<T>(ctx: CorrelationContext, fn: () => T): T {
    return this.correlationStorage.run(ctx, fn);
  }

  getContext(): CorrelationContext | undefined {
    return this.correlationStorage.getStore();
  }

  /** Update fields on the current correlation context. */
  enrichContext(partial: Partial<CorrelationContext>): void {
    const current = this.correlationStorage.getStore();
    if (current) {
      Object.assign(current, partial);
    }
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, this.formatError(error));
  }

  fatal(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, category, message, data, this.formatError(error));
  }

  // ─── Core logging logic ───────────────────────────────────────────

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    errorInfo?: StructuredLogEntry['error'],
  ): void {
    if (!this.isEnabled(level, category)) return;

    const ctx = this.correlationStorage.getStore();
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
      requestId: ctx?.requestId,
      principal: ctx?.principal,
      operation: ctx?.operation,
      tenantId: ctx?.tenantId,
      method: ctx?.method,
      path: ctx?.path,
    };

    if (ctx?.startTime) {
      entry.durationMs = Date.now() - ctx.startTime;
    }

    if (errorInfo) {
      entry.error = errorInfo;
      if (!this.config.includeStackTraces) {
        delete entry.error.stack;
      }
    }

    if (data) {
      entry.data = this.sanitizeData(data);
    }

    this.emit(level, entry);
  }

  /** Check if a log at the given level + category should be emitted. */
  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    if (category) {
      const override = this.config.categoryLevels[category];
      if (override !== undefined) {
        return level >= override;
      }
    }
    return level >= this.config.globalLevel;
  }

  private formatError(error: unknown): StructuredLogEntry['error'] | undefined {
    if (!error) return undefined;
    if (error instanceof Error) {
      return {
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    return { message: String(error) };
  }

  /** Truncate large payloads, redact secrets. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    const max = this.config.maxPayloadSizeBytes;
    for (const [key, value] of Object.entries(data)) {
      if (/secret|password|token|authorization/i.test(key)) {
        result[key] = '[REDACTED]';
        continue;
      }

      if (typeof value === 'string' && value.length > max) {
        result[key] = value.slice(0, max) + `...[truncated ${value.length - max}B]`;
      } else if (typeof value === 'object' && value !== null) {
        const serialized = JSON.stringify(value);
        result[key] = serialized.length > max ? serialized.slice(0, max) + '...[truncated]' : value;
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  private emit(level: LogLevel, entry: StructuredLogEntry): void {
    if (this.config.format === 'json') {
      const line = JSON.stringify(entry) + '\n';
      if (level >= LogLevel.WARN) {
        process.stderr.write(line);
      } else {
        process.stdout.write(line);
      }
      return;
    }
    this.emitPretty(level, entry);
  }

  private emitPretty(level: LogLevel, entry: StructuredLogEntry): void {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const lvl = entry.level.padEnd(5);
    const cat = entry.category.padEnd(9);
    const reqId = entry.requestId ? ` [${entry.requestId.slice(0, 8)}]` : '';
    const principal = entry.principal ? ` app:${entry.principal}` : '';
    const op = entry.operation ? ` op:${entry.operation}` : '';
    const tenant = entry.tenantId ? ` tenant:${entry.tenantId}` : '';
    const dur = entry.durationMs !== undefined ? ` +${entry.durationMs}ms` : '';

    let line = `${ts} ${this.colorize(level, lvl)} ${cat}${reqId}${principal}${tenant}${op}${dur} ${entry.message}`;

    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack && this.config.includeStackTraces) {
        line += `\n${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      if (level <= LogLevel.DEBUG) {
        line += `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`;
      } else {
        const compact = JSON.stringify(entry.data);
        if (compact.length <= 200) {
          line += ` | ${compact}`;
        }
      }
    }

    switch (level) {
      case LogLevel.TRACE:
      case LogLevel.DEBUG:
        // eslint-disable-next-line no-console
        console.debug(line);
        break;
      case LogLevel.INFO:
        // eslint-disable-next-line no-console
        console.log(line);
        break;
      case LogLevel.WARN:
        // eslint-disable-next-line no-console
        console.warn(line);
        break;
      default:
        // eslint-disable-next-line no-console
        console.error(line);
        break;
    }
  }

  private colorize(level: LogLevel, text: string): string {
    if (!process.stdout.isTTY) return text;
    switch (level) {
      case LogLevel.TRACE: return `\x1b[90m${text}\x1b[0m`;
      case LogLevel.DEBUG: return `\x1b[36m${text}\x1b[0m`;
      case LogLevel.INFO:  return `\x1b[32m${text}\x1b[0m`;
      case LogLevel.WARN:  return `\x1b[33m${text}\x1b[0m`;
      case LogLevel.ERROR: return `\x1b[31m${text}\x1b[0m`;
      case LogLevel.FATAL: return `\x1b[35m${text}\x1b[0m`;
      default: return text;
    }
  }
}
