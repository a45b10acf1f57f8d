/**
 * Tool Execution
 *
 * Deadline handling for tool handlers, the tools/call params schema and the
 * shape of a successful tools/call result.
 */

import { z } from 'zod';

// =============================================================================
// Types
// =============================================================================

/**
 * Passed to every handler invocation
 */
export interface ToolCallContext {
  toolName: string;
  /** Aborted when the call times out or the caller goes away */
  signal: AbortSignal;
}

export interface ExecuteOptions {
  /** Deadline in milliseconds */
  timeoutMs: number;
  /** Abort from outside (e.g. client disconnect) */
  signal?: AbortSignal;
}

export interface TextContent {
  type: 'text';
  text: string;
}

/**
 * Result body of a successful tools/call
 */
export interface ToolCallResult {
  content: TextContent[];
  structuredContent: unknown;
  isError: false;
}

// =============================================================================
// Errors
// =============================================================================

export class ToolTimeoutError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly timeoutMs: number
  ) {
    super(`Tool '${toolName}' timed out after ${timeoutMs}ms`);
    this.name = 'ToolTimeoutError';
  }
}

export class ToolCancelledError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' was cancelled`);
    this.name = 'ToolCancelledError';
  }
}

// =============================================================================
// Zod Schemas for Request Validation
// =============================================================================

/**
 * Schema for tools/call request params
 */
export const ToolsCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()),
});

export type ToolsCallParams = z.infer<typeof ToolsCallParamsSchema>;

// =============================================================================
// Execution
// =============================================================================

/**
 * Run a handler against a deadline. The handler's signal aborts when the
 * deadline passes or `options.signal` aborts; the returned promise then
 * rejects with ToolTimeoutError or ToolCancelledError even if the handler
 * ignores its signal.
 */
export async function executeWithTimeout<T>(
  toolName: string,
  handler: (context: ToolCallContext) => Promise<T> | T,
  options: ExecuteOptions
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  let removeExternalListener = (): void => {};

  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new ToolTimeoutError(toolName, options.timeoutMs));
    }, options.timeoutMs);

    const external = options.signal;
    if (external) {
      const onAbort = (): void => {
        controller.abort();
        reject(new ToolCancelledError(toolName));
      };
      if (external.aborted) {
        onAbort();
      } else {
        external.addEventListener('abort', onAbort, { once: true });
        removeExternalListener = () => external.removeEventListener('abort', onAbort);
      }
    }
  });

  try {
    // Promise.resolve().then() turns a synchronous throw into a rejection
    const run = Promise.resolve().then(() => handler({ toolName, signal: controller.signal }));
    return await Promise.race([run, deadline]);
  } finally {
    clearTimeout(timeoutId);
    removeExternalListener();
  }
}

// =============================================================================
// Result Formatting
// =============================================================================

/**
 * Successful tools/call body: the value as JSON text plus structured content.
 */
export function createToolCallResult(value: unknown): ToolCallResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value) }],
    structuredContent: value,
    isError: false,
  };
}
