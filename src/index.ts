/**
 * Traced weather tool server - entry point and public exports
 */

// Main server
export {
  WeatherToolServer,
  ShutdownManager,
  type CleanupStep,
  type ShutdownManagerOptions,
  type ShutdownReport,
  type WeatherToolServerOptions,
} from './server.js';

// Configuration
export {
  loadConfig,
  getConfig,
  reloadConfig,
  resetConfig,
  ConfigSchema,
  ConfigError,
  TRACE_SINKS,
  type Config,
  type TraceSinkKind,
} from './config.js';

// Dispatcher
export * from './message-router.js';

// Protocol
export * from './protocol/jsonrpc.js';
export * from './protocol/lifecycle.js';
export * from './protocol/errors.js';

// Transport
export * from './transport/http.js';

// Tools
export * from './tools/registry.js';
export * from './tools/executor.js';
export * from './tools/weather.js';

// Observability
export * from './observability/logger.js';
export * from './observability/trace-context.js';
export * from './observability/span-recorder.js';
export * from './observability/exporter.js';
export * from './observability/sinks.js';
export * from './observability/otlp.js';
export * from './observability/telemetry.js';

// Client
export * from './client/index.js';
