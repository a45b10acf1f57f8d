/**
 * Traced JSON-RPC client
 *
 * Posts JSON-RPC requests to the weather tool server over HTTP. Each call
 * opens a CLIENT span and sends its context as `traceparent`, so the
 * server's tool span lands in the caller's trace.
 */

import { SpanKind } from '@opentelemetry/api';
import { z } from 'zod';
import { type StructuredLogger, createSilentLogger } from '../observability/logger.js';
import type { SpanHandle, SpanRecorder } from '../observability/span-recorder.js';
import { type TraceContext, createRootContext, inject } from '../observability/trace-context.js';
import { McpError } from '../protocol/errors.js';
import {
  type JsonRpcRequest,
  type JsonRpcSuccessResponse,
  createNumericIdGenerator,
  createRequest,
  isErrorResponse,
  parseJsonRpcResponse,
} from '../protocol/jsonrpc.js';
import { LATEST_PROTOCOL_VERSION } from '../protocol/lifecycle.js';

// =============================================================================
// Types
// =============================================================================

export interface TracedRpcClientOptions {
  /** Full endpoint URL, e.g. http://localhost:8001/weather */
  url: string;
  recorder: SpanRecorder;
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  logger?: StructuredLogger;
  /** Injected for tests; defaults to global fetch */
  fetch?: typeof fetch;
}

export const ToolCallResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()),
  structuredContent: z.unknown().optional(),
  isError: z.boolean().optional(),
});

export type ClientToolCallResult = z.infer<typeof ToolCallResultSchema>;

export const ToolListSchema = z.object({
  tools: z.array(
    z
      .object({
        name: z.string(),
        title: z.string().optional(),
        description: z.string().optional(),
        inputSchema: z.record(z.unknown()),
      })
      .passthrough()
  ),
});

export type ClientToolList = z.infer<typeof ToolListSchema>;

// =============================================================================
// Errors
// =============================================================================

/**
 * The server could not be reached or did not answer with JSON-RPC.
 */
export class RpcTransportError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'RpcTransportError';
  }
}

// =============================================================================
// TracedRpcClient Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const client = new TracedRpcClient({ url: 'http://localhost:8001/weather', recorder });
 * await recorder.withSpan(createRootContext(), 'cli_weather_request', async (span) => {
 *   const weather = await client.callTool('get_weather', { location: 'NY' }, span.context());
 * });
 * ```
 */
export class TracedRpcClient {
  private readonly url: string;
  private readonly recorder: SpanRecorder;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly logger: StructuredLogger;
  private readonly fetchFn: typeof fetch;
  private readonly nextId = createNumericIdGenerator();

  constructor(options: TracedRpcClientOptions) {
    this.url = options.url;
    this.recorder = options.recorder;
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger ?? createSilentLogger();
    this.fetchFn = options.fetch ?? fetch;
  }

  getUrl(): string {
    return this.url;
  }

  /**
   * Send one request under a CLIENT span that is a child of `parent`.
   * Resolves with the result; rejects with McpError for a JSON-RPC error
   * and RpcTransportError for anything else.
   */
  async request(
    method: string,
    params: Record<string, unknown> | undefined,
    parent: TraceContext = createRootContext()
  ): Promise<unknown> {
    const id = this.nextId();
    return this.recorder.withSpan(
      parent,
      method,
      async (span) => {
        const response = await this.post(span, createRequest(id, method, params));
        return response.result;
      },
      {
        kind: SpanKind.CLIENT,
        attributes: {
          'rpc.system': 'jsonrpc',
          'rpc.method': method,
          'rpc.jsonrpc.request_id': id,
          'server.address': this.url,
        },
      }
    );
  }

  async initialize(parent?: TraceContext): Promise<unknown> {
    return this.request(
      'initialize',
      {
        protocolVersion: LATEST_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: { name: 'weather-call', version: '1.0.0' },
      },
      parent
    );
  }

  async listTools(parent?: TraceContext): Promise<ClientToolList> {
    const result = await this.request('tools/list', undefined, parent);
    return ToolListSchema.parse(result);
  }

  async callTool(name: string, args: Record<string, unknown>, parent?: TraceContext): Promise<ClientToolCallResult> {
    const result = await this.request('tools/call', { name, arguments: args }, parent);
    return ToolCallResultSchema.parse(result);
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  /**
   * The timeout covers the whole exchange, body read included.
   */
  private async post(span: SpanHandle, request: JsonRpcRequest): Promise<JsonRpcSuccessResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.exchange(span, request, controller.signal);
    } finally {
      clearTimeout(timer);
    }
  }

  private async exchange(
    span: SpanHandle,
    request: JsonRpcRequest,
    signal: AbortSignal
  ): Promise<JsonRpcSuccessResponse> {
    let response: Response;
    try {
      response = await this.fetchFn(this.url, {
        method: 'POST',
        headers: {
          ...this.headers,
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...inject(span.context()),
        },
        body: JSON.stringify(request),
        signal,
      });
    } catch (error) {
      const reason = signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new RpcTransportError(`Request to ${this.url} failed: ${reason}`);
    }

    span.setAttribute('http.response.status_code', response.status);

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      if (signal.aborted) {
        throw new RpcTransportError(
          `Request to ${this.url} failed: timed out after ${this.timeoutMs}ms reading the body`,
          response.status
        );
      }
      throw new RpcTransportError(`Server answered HTTP ${response.status} without a JSON body`, response.status);
    }

    const parsed = parseJsonRpcResponse(payload);
    if (!parsed.success) {
      throw new RpcTransportError(`Server answered HTTP ${response.status} with ${parsed.error.message}`, response.status);
    }

    const message = parsed.data;
    // A null id is only legal on an error the server could not tie to a request
    const nullErrorId = isErrorResponse(message) && message.id === null;
    if (message.id !== request.id && !nullErrorId) {
      throw new RpcTransportError(
        `Response id ${JSON.stringify(message.id)} does not match request id ${JSON.stringify(request.id)}`,
        response.status
      );
    }

    if (isErrorResponse(message)) {
      span.setAttribute('rpc.jsonrpc.error_code', message.error.code);
      this.logger.debug('Server returned an error', { error: message.error });
      throw new McpError(message.error.code, message.error.message, message.error.data);
    }
    return message;
  }
}

// =============================================================================
// Weather session
// =============================================================================

export interface WeatherSessionResult {
  /** Trace id shared by every span of the session */
  traceId: string;
  weather: ClientToolCallResult;
  forecast: ClientToolCallResult;
}

/**
 * Call get_weather then get_forecast under one `cli_weather_request` span.
 */
export async function runWeatherSession(
  client: TracedRpcClient,
  recorder: SpanRecorder,
  location: string,
  days: number
): Promise<WeatherSessionResult> {
  return recorder.withSpan(createRootContext(), 'cli_weather_request', async (span) => {
    span.setAttributes({ 'weather.location': location, 'weather.days': days });
    const parent = span.context();
    const weather = await client.callTool('get_weather', { location }, parent);
    const forecast = await client.callTool('get_forecast', { location, days }, parent);
    return { traceId: parent.traceId, weather, forecast };
  });
}
