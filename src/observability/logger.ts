/**
 * Structured JSON logging with trace correlation
 *
 * Outputs NDJSON with RFC 5424 levels. Entries written while a span is
 * active (see SpanRecorder.withSpan) carry its trace and span ids.
 */

import { z } from 'zod';
import { trace, context, isSpanContextValid } from '@opentelemetry/api';

// =============================================================================
// Levels (RFC 5424)
// =============================================================================

/**
 * Lower number = more severe.
 */
export const LOG_LEVEL_PRIORITY = {
  emergency: 0,
  alert: 1,
  critical: 2,
  error: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7,
} as const;

export const LogLevelSchema = z.enum([
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

// =============================================================================
// Types
// =============================================================================

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Logger name/component */
  logger?: string;
  traceId?: string;
  spanId?: string;
  data?: unknown;
}

export interface StructuredLoggerOptions {
  /** Logger name/component identifier */
  name?: string;
  /** Minimum log level (default: from WEATHER_MCP_LOG_LEVEL env or 'info') */
  minLevel?: LogLevel;
  /** Output function (default: console.log) */
  output?: (json: string) => void;
}

// =============================================================================
// Helper Functions
// =============================================================================

function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env['WEATHER_MCP_LOG_LEVEL'];
  if (envLevel) {
    const result = LogLevelSchema.safeParse(envLevel);
    if (result.success) {
      return result.data;
    }
  }
  return 'info';
}

/**
 * Reads the span context made active by the span recorder, if any
 */
function getTraceContext(): { traceId?: string; spanId?: string } {
  const spanContext = trace.getSpanContext(context.active());
  if (!spanContext || !isSpanContextValid(spanContext)) {
    return {};
  }
  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
  };
}

/**
 * Errors do not survive JSON.stringify; flatten them to name/message.
 */
function normalizeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    return out;
  }
  return data;
}

// =============================================================================
// StructuredLogger Class
// =============================================================================

/**
 * Structured JSON logger with trace correlation.
 *
 * @example
 * ```typescript
 * const logger = new StructuredLogger({ name: 'server' });
 *
 * logger.info('Listening', { port: 8001 });
 * // {"timestamp":"...","level":"info","message":"Listening","logger":"server","data":{"port":8001}}
 *
 * const httpLogger = logger.child('http');
 * // httpLogger.getName() === 'server.http'
 * ```
 */
export class StructuredLogger {
  private readonly name?: string;
  private readonly minLevel: LogLevel;
  private readonly output: (json: string) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    if (options.name !== undefined) {
      this.name = options.name;
    }
    this.minLevel = options.minLevel ?? getDefaultLogLevel();
    this.output = options.output ?? console.log;
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  getName(): string | undefined {
    return this.name;
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (this.name !== undefined) {
      entry.logger = this.name;
    }

    const traceContext = getTraceContext();
    if (traceContext.traceId) {
      entry.traceId = traceContext.traceId;
    }
    if (traceContext.spanId) {
      entry.spanId = traceContext.spanId;
    }

    if (data !== undefined) {
      entry.data = normalizeData(data);
    }

    this.output(JSON.stringify(entry));
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  notice(message: string, data?: unknown): void {
    this.log('notice', message, data);
  }

  warning(message: string, data?: unknown): void {
    this.log('warning', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  critical(message: string, data?: unknown): void {
    this.log('critical', message, data);
  }

  /**
   * Create a child logger named `<parent>.<childName>` that shares the
   * parent's level and output.
   */
  child(childName: string): StructuredLogger {
    const newName = this.name ? `${this.name}.${childName}` : childName;
    return new StructuredLogger({
      name: newName,
      minLevel: this.minLevel,
      output: this.output,
    });
  }
}

/**
 * Logger that discards everything; the default for library components
 * constructed without one.
 */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger({ minLevel: 'emergency', output: () => {} });
}
