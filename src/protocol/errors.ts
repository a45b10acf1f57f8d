/**
 * Error taxonomy for the tool server
 *
 * - Standard JSON-RPC 2.0 error codes (-32700 to -32603)
 * - Tool failures, reported in the server error range (-32000)
 * - Conversion of anything thrown into a response that never leaks stacks
 */

import type { JsonRpcId, JsonRpcErrorResponse } from './jsonrpc.js';

// =============================================================================
// JSON-RPC 2.0 Standard Error Codes
// =============================================================================

/** Parse error - Invalid JSON was received by the server */
export const PARSE_ERROR = -32700;

/** Invalid Request - The JSON sent is not a valid Request object */
export const INVALID_REQUEST = -32600;

/** Method not found - The method does not exist / is not available */
export const METHOD_NOT_FOUND = -32601;

/** Invalid params - Invalid method parameter(s) */
export const INVALID_PARAMS = -32602;

/** Internal error - Internal JSON-RPC error */
export const INTERNAL_ERROR = -32603;

/** A tool handler threw, rejected or timed out */
export const TOOL_EXECUTION_FAILED = -32000;

// =============================================================================
// Base MCP Error Class
// =============================================================================

/**
 * Base error class for all protocol errors.
 * Includes error code and optional data for additional context.
 */
export class McpError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'McpError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Plain object for the response body. Never includes the stack.
   */
  toJSON(): { code: number; message: string; data?: unknown } {
    const result: { code: number; message: string; data?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.data !== undefined) {
      result.data = this.data;
    }
    return result;
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * The body was not valid JSON. `detail` is the decoder's message.
 */
export class ParseError extends McpError {
  constructor(detail?: string) {
    super(PARSE_ERROR, 'Parse error', detail);
    this.name = 'ParseError';
  }
}

export class InvalidRequestError extends McpError {
  constructor(message?: string, data?: unknown) {
    super(INVALID_REQUEST, message ?? 'Invalid Request', data);
    this.name = 'InvalidRequestError';
  }
}

export class MethodNotFoundError extends McpError {
  constructor(method: string) {
    super(METHOD_NOT_FOUND, `Method not found: ${method}`, { method });
    this.name = 'MethodNotFoundError';
  }
}

export class InvalidParamsError extends McpError {
  constructor(message?: string, data?: unknown) {
    super(INVALID_PARAMS, message ?? 'Invalid params', data);
    this.name = 'InvalidParamsError';
  }
}

export class InternalError extends McpError {
  constructor(message?: string, data?: unknown) {
    super(INTERNAL_ERROR, message ?? 'Internal error', data);
    this.name = 'InternalError';
  }
}

/**
 * The tool ran and failed. `data.detail` carries the handler's message.
 */
export class ToolExecutionFailedError extends McpError {
  constructor(
    public readonly toolName: string,
    detail: string
  ) {
    super(TOOL_EXECUTION_FAILED, `Tool '${toolName}' failed`, { tool: toolName, detail });
    this.name = 'ToolExecutionFailedError';
  }
}

// =============================================================================
// Tool Errors (values, not exceptions)
// =============================================================================

export type ToolErrorKind = 'UnknownTool' | 'InvalidParams' | 'ExecutionFailed';

/**
 * Failure outcome of a registry invocation.
 */
export interface ToolError {
  kind: ToolErrorKind;
  message: string;
  /** Validation issues or the underlying failure message */
  detail?: unknown;
}

/**
 * Map a tool failure onto its protocol error.
 *
 * @param availableTools - listed in the error data for unknown names
 */
export function toolErrorToMcpError(
  toolName: string,
  error: ToolError,
  availableTools: string[] = []
): McpError {
  switch (error.kind) {
    case 'UnknownTool':
      return new InvalidParamsError(`Unknown tool: ${toolName}`, { tool: toolName, availableTools });
    case 'InvalidParams':
      return new InvalidParamsError(
        `Invalid arguments for tool '${toolName}': ${error.message}`,
        error.detail !== undefined ? { tool: toolName, issues: error.detail } : { tool: toolName }
      );
    case 'ExecutionFailed':
      return new ToolExecutionFailedError(toolName, error.message);
  }
}

// =============================================================================
// Error Response Helpers
// =============================================================================

/**
 * Convert an McpError to a JSON-RPC error response.
 */
export function toErrorResponse(error: McpError, requestId: JsonRpcId): JsonRpcErrorResponse {
  return { jsonrpc: '2.0', id: requestId, error: error.toJSON() };
}

/**
 * Wrap an unknown error in an InternalError.
 *
 * Never exposes internal stack traces.
 */
export function fromError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(`An internal error occurred: ${error.message}`);
  }

  if (typeof error === 'string') {
    return new InternalError(`An internal error occurred: ${error}`);
  }

  return new InternalError('An unexpected internal error occurred');
}
