/**
 * JSON-RPC 2.0 types and parsing
 *
 * Envelope codec for the tool server. Requests use named params only, so
 * `params`, when present, must be an object.
 * See: https://www.jsonrpc.org/specification
 */

import { z } from 'zod';
import { INVALID_REQUEST, ParseError, toErrorResponse } from './errors.js';

// =============================================================================
// Constants
// =============================================================================

export const JSONRPC_VERSION = '2.0' as const;

// =============================================================================
// Zod Schemas
// =============================================================================

/**
 * JSON-RPC message ID - can be string, number, or null (null only in
 * responses to requests whose id could not be read)
 */
export const JsonRpcIdSchema = z.union([z.string(), z.number().int(), z.null()]);

/**
 * JSON-RPC error object schema
 */
export const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const JsonRpcBaseSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
});

/**
 * A request MUST have a non-null id (distinguishes it from a notification)
 */
export const JsonRpcRequestSchema = JsonRpcBaseSchema.extend({
  id: z.union([z.string(), z.number().int()]),
  method: z.string(),
  params: z.record(z.unknown()).optional(),
});

export const JsonRpcNotificationSchema = JsonRpcBaseSchema.extend({
  method: z.string(),
  params: z.record(z.unknown()).optional(),
}).strict();

/**
 * Strict, so that a body carrying `error` can never pass as a success
 */
export const JsonRpcSuccessResponseSchema = JsonRpcBaseSchema.extend({
  id: JsonRpcIdSchema,
  result: z.unknown(),
}).strict();

export const JsonRpcErrorResponseSchema = JsonRpcBaseSchema.extend({
  id: JsonRpcIdSchema,
  error: JsonRpcErrorSchema,
}).strict();

// =============================================================================
// Types (inferred from schemas)
// =============================================================================

export type JsonRpcId = z.infer<typeof JsonRpcIdSchema>;
export type JsonRpcError = z.infer<typeof JsonRpcErrorSchema>;
export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;
export type JsonRpcNotification = z.infer<typeof JsonRpcNotificationSchema>;
export type JsonRpcSuccessResponse = z.infer<typeof JsonRpcSuccessResponseSchema>;
export type JsonRpcErrorResponse = z.infer<typeof JsonRpcErrorResponseSchema>;
export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/** What the server accepts on the wire */
export type JsonRpcInbound = JsonRpcRequest | JsonRpcNotification;

// =============================================================================
// Type Guards
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check if a message is a request (has an id, expects a response)
 */
export function isRequest(message: JsonRpcInbound): message is JsonRpcRequest {
  return 'id' in message && message.id !== undefined;
}

/**
 * Check if a response is an error response
 */
export function isErrorResponse(response: JsonRpcResponse): response is JsonRpcErrorResponse {
  return 'error' in response;
}

// =============================================================================
// ID Generator
// =============================================================================

/**
 * Creates a numeric ID generator for outgoing JSON-RPC requests
 */
export function createNumericIdGenerator(): () => number {
  let counter = 0;
  return () => {
    counter += 1;
    return counter;
  };
}

// =============================================================================
// Parse Result Types
// =============================================================================

export type ParseSuccess<T> = {
  success: true;
  data: T;
};

export type ParseFailure = {
  success: false;
  error: JsonRpcError;
};

export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

// =============================================================================
// Parsing Functions
// =============================================================================

/**
 * Create a JSON-RPC error object
 */
export function createJsonRpcError(code: number, message: string, data?: unknown): JsonRpcError {
  const error: JsonRpcError = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return error;
}

function invalidRequest(message: string, data?: unknown): ParseFailure {
  return {
    success: false,
    error: createJsonRpcError(INVALID_REQUEST, `Invalid Request: ${message}`, data),
  };
}

function isValidId(id: unknown): id is string | number {
  return typeof id === 'string' || (typeof id === 'number' && Number.isInteger(id));
}

/**
 * Validate an already-decoded JSON value as a request or notification.
 */
export function parseEnvelope(value: unknown): ParseResult<JsonRpcInbound> {
  if (!isRecord(value)) {
    return invalidRequest('Expected object');
  }

  if (value['jsonrpc'] !== JSONRPC_VERSION) {
    return invalidRequest(`jsonrpc must be "${JSONRPC_VERSION}"`, { received: value['jsonrpc'] });
  }

  const method = value['method'];
  if (typeof method !== 'string' || method === '') {
    return invalidRequest('method must be a non-empty string');
  }

  const params = value['params'];
  if (params !== undefined && !isRecord(params)) {
    return invalidRequest('params must be an object');
  }

  if (!('id' in value)) {
    const notification: JsonRpcNotification = { jsonrpc: JSONRPC_VERSION, method };
    if (params !== undefined) {
      notification.params = params;
    }
    return { success: true, data: notification };
  }

  const id = value['id'];
  if (!isValidId(id)) {
    return invalidRequest('id must be a string or an integer');
  }

  const request: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, id, method };
  if (params !== undefined) {
    request.params = params;
  }
  return { success: true, data: request };
}

/**
 * Validate a decoded response body (client side)
 */
export function parseJsonRpcResponse(value: unknown): ParseResult<JsonRpcResponse> {
  if (!isRecord(value)) {
    return invalidRequest('Expected response object');
  }
  const hasResult = 'result' in value;
  const hasError = 'error' in value;
  if (hasResult && hasError) {
    return invalidRequest('Response cannot have both result and error');
  }
  if (!hasResult && !hasError) {
    return invalidRequest('Response must have result or error');
  }

  if (hasError) {
    const parsed = JsonRpcErrorResponseSchema.safeParse(value);
    return parsed.success
      ? { success: true, data: parsed.data }
      : invalidRequest('Malformed error response', parsed.error.format());
  }
  const parsed = JsonRpcSuccessResponseSchema.safeParse(value);
  return parsed.success
    ? { success: true, data: parsed.data }
    : invalidRequest('Malformed response', parsed.error.format());
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a JSON-RPC request object
 */
export function createRequest(
  id: string | number,
  method: string,
  params?: Record<string, unknown>
): JsonRpcRequest {
  const request: JsonRpcRequest = {
    jsonrpc: JSONRPC_VERSION,
    id,
    method,
  };
  if (params !== undefined) {
    request.params = params;
  }
  return request;
}

/**
 * Create a JSON-RPC success response object
 */
export function createSuccessResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return {
    jsonrpc: JSONRPC_VERSION,
    id,
    result,
  };
}

/**
 * Create a JSON-RPC error response object
 */
export function createErrorResponse(id: JsonRpcId, error: JsonRpcError): JsonRpcErrorResponse {
  return {
    jsonrpc: JSONRPC_VERSION,
    id,
    error,
  };
}

/**
 * Parse error response; the request id could not be read, so it is null.
 */
export function createParseErrorResponse(detail?: string): JsonRpcErrorResponse {
  return toErrorResponse(new ParseError(detail), null);
}
