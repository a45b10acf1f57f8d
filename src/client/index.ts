/**
 * Client Module
 *
 * Exports for programmatic use of the traced JSON-RPC client.
 */

export {
  TracedRpcClient,
  RpcTransportError,
  ToolCallResultSchema,
  ToolListSchema,
  runWeatherSession,
} from './traced-client.js';
export type {
  TracedRpcClientOptions,
  ClientToolCallResult,
  ClientToolList,
  WeatherSessionResult,
} from './traced-client.js';
