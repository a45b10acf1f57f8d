/**
 * Environment configuration loader with Zod validation
 */

import { z } from 'zod';
import { LogLevelSchema } from './observability/logger.js';
import { DROP_POLICIES } from './observability/exporter.js';
import { parseOtlpHeaders } from './observability/sinks.js';

export const TRACE_SINKS = ['otlp', 'langfuse', 'console', 'memory', 'none'] as const;

export type TraceSinkKind = (typeof TRACE_SINKS)[number];

/**
 * Configuration schema with validation rules
 */
export const ConfigSchema = z
  .object({
    host: z.string().min(1).default('0.0.0.0'),
    // 0 binds an ephemeral port
    port: z.number().int().min(0).max(65535).default(8001),
    path: z
      .string()
      .regex(/^\/\S*$/, 'must start with "/"')
      .default('/weather'),
    logLevel: LogLevelSchema.default('info'),
    toolTimeoutMs: z.number().int().min(1).default(30000),
    shutdownTimeoutMs: z.number().int().min(0).default(10000),
    serviceName: z.string().min(1).default('weather-assistant'),
    traceSink: z.enum(TRACE_SINKS).default('otlp'),
    otlp: z
      .object({
        /** Base endpoint; `/v1/traces` is appended */
        endpoint: z.string().url().default('http://localhost:4318'),
        /** Full traces URL, used as is when set */
        tracesEndpoint: z.string().url().optional(),
        headers: z.record(z.string()).default({}),
      })
      .default({}),
    export: z
      .object({
        batchSize: z.number().int().min(1).default(512),
        intervalMs: z.number().int().min(1).default(200),
        queueSize: z.number().int().min(1).default(2048),
        timeoutMs: z.number().int().min(1).default(10000),
        dropPolicy: z.enum(DROP_POLICIES).default('drop-newest'),
      })
      .default({}),
    langfuse: z
      .object({
        publicKey: z.string().min(1).optional(),
        secretKey: z.string().min(1).optional(),
        host: z.string().url().default('http://localhost:3000'),
      })
      .default({}),
  })
  .superRefine((value, ctx) => {
    if (value.traceSink !== 'langfuse') {
      return;
    }
    if (value.langfuse.publicKey === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['langfuse', 'publicKey'],
        message: 'LANGFUSE_PUBLIC_KEY is required when the trace sink is langfuse',
      });
    }
    if (value.langfuse.secretKey === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['langfuse', 'secretKey'],
        message: 'LANGFUSE_SECRET_KEY is required when the trace sink is langfuse',
      });
    }
  });

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Raised when the environment does not produce a valid configuration.
 */
export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    const details = issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    super(`Invalid configuration: ${details.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse an integer from environment variable string. Values that are not
 * integers are passed through as NaN so that validation reports them.
 */
export function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
}

function readEnv(name: string, env: NodeJS.ProcessEnv): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Copy entries whose value is defined, so schema defaults apply to the rest.
 */
function defined(entries: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(entries).filter(([, v]) => v !== undefined));
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const otlpHeaders = readEnv('OTEL_EXPORTER_OTLP_HEADERS', env);

  const configInput = defined({
    host: readEnv('WEATHER_MCP_HOST', env),
    port: parseInteger(readEnv('WEATHER_MCP_PORT', env)),
    path: readEnv('WEATHER_MCP_PATH', env),
    logLevel: readEnv('WEATHER_MCP_LOG_LEVEL', env),
    toolTimeoutMs: parseInteger(readEnv('WEATHER_MCP_TOOL_TIMEOUT_MS', env)),
    shutdownTimeoutMs: parseInteger(readEnv('WEATHER_MCP_SHUTDOWN_TIMEOUT_MS', env)),
    serviceName: readEnv('OTEL_SERVICE_NAME', env),
    traceSink: readEnv('WEATHER_MCP_TRACE_SINK', env),
    otlp: defined({
      endpoint: readEnv('OTEL_EXPORTER_OTLP_ENDPOINT', env),
      tracesEndpoint: readEnv('OTEL_EXPORTER_OTLP_TRACES_ENDPOINT', env),
      headers: otlpHeaders !== undefined ? parseOtlpHeaders(otlpHeaders) : undefined,
    }),
    export: defined({
      batchSize: parseInteger(readEnv('WEATHER_MCP_EXPORT_BATCH_SIZE', env)),
      intervalMs: parseInteger(readEnv('WEATHER_MCP_EXPORT_INTERVAL_MS', env)),
      queueSize: parseInteger(readEnv('WEATHER_MCP_EXPORT_QUEUE_SIZE', env)),
      timeoutMs: parseInteger(readEnv('WEATHER_MCP_EXPORT_TIMEOUT_MS', env)),
      dropPolicy: readEnv('WEATHER_MCP_EXPORT_DROP_POLICY', env),
    }),
    langfuse: defined({
      publicKey: readEnv('LANGFUSE_PUBLIC_KEY', env),
      secretKey: readEnv('LANGFUSE_SECRET_KEY', env),
      host: readEnv('LANGFUSE_HOST', env) ?? readEnv('LANGFUSE_BASE_URL', env),
    }),
  });

  const result = ConfigSchema.safeParse(configInput);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return result.data;
}

/**
 * Singleton config instance
 */
let config: Config | null = null;

/**
 * Get the current configuration (singleton)
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Force reload configuration from environment
 */
export function reloadConfig(): Config {
  config = loadConfig();
  return config;
}

/**
 * Reset config singleton (for testing)
 */
export function resetConfig(): void {
  config = null;
}
