/**
 * RPC Dispatcher
 *
 * Turns one decoded HTTP body into at most one JSON-RPC response, running
 * it through an explicit middleware chain:
 *
 *   extract trace context -> parse envelope -> authorize -> [extra stages]
 *     -> request span -> method router
 *
 * Each request moves through received -> parsed -> authorized ->
 * dispatching -> completed. A request opens at most one span: tools/call
 * opens a span named after the tool once the tool is known to exist, every
 * other method runs under a span named after the method, and envelope
 * failures open none.
 */

import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import { type StructuredLogger, createSilentLogger } from './observability/logger.js';
import { type SpanHandle, type SpanRecorder, runInSpanContext } from './observability/span-recorder.js';
import { type TraceCarrier, type TraceContext, extract } from './observability/trace-context.js';
import {
  InternalError,
  InvalidParamsError,
  McpError,
  MethodNotFoundError,
  fromError,
  toErrorResponse,
  toolErrorToMcpError,
} from './protocol/errors.js';
import {
  type JsonRpcErrorResponse,
  type JsonRpcInbound,
  type JsonRpcResponse,
  createErrorResponse,
  createParseErrorResponse,
  createSuccessResponse,
  isRequest,
  parseEnvelope,
} from './protocol/jsonrpc.js';
import { DEFAULT_SERVER_DESCRIPTION, type ServerDescription, handleInitialize } from './protocol/lifecycle.js';
import { ToolsCallParamsSchema, createToolCallResult } from './tools/executor.js';
import type { ToolRegistry } from './tools/registry.js';

// =============================================================================
// Types
// =============================================================================

export const REQUEST_STATES = ['received', 'parsed', 'authorized', 'dispatching', 'completed'] as const;

export type RequestState = (typeof REQUEST_STATES)[number];

/**
 * What the transport should do with the request.
 * - response: write the JSON-RPC response (HTTP 200)
 * - rejected: the body was not a request; write the error (HTTP 400)
 * - accepted: a notification; nothing to write (HTTP 202)
 */
export type DispatchOutcome =
  | { type: 'response'; response: JsonRpcResponse }
  | { type: 'rejected'; response: JsonRpcErrorResponse }
  | { type: 'accepted' };

/**
 * Per-request state shared by the middleware stages.
 */
export interface RequestContext {
  /** Process-local sequence number, for logs */
  readonly seq: number;
  readonly body: unknown;
  readonly carrier: TraceCarrier;
  readonly logger: StructuredLogger;
  state: RequestState;
  /** Set by the extraction stage */
  traceContext?: TraceContext;
  /** Set by the parse stage */
  message?: JsonRpcInbound;
  /** The failure the router answered with, if any */
  error?: McpError;
}

export type Middleware = (ctx: RequestContext, next: () => Promise<DispatchOutcome>) => Promise<DispatchOutcome>;

export interface MessageRouterOptions {
  registry: ToolRegistry;
  recorder: SpanRecorder;
  logger?: StructuredLogger;
  server?: ServerDescription;
  /** Extra stages, run after authorization and before the request span */
  middleware?: Middleware[];
}

/** Longest tool.input / tool.output attribute value */
export const MAX_ATTRIBUTE_LENGTH = 1024;

// =============================================================================
// Helpers
// =============================================================================

export function truncate(text: string, max: number = MAX_ATTRIBUTE_LENGTH): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Move a request forward. States only advance; a backwards move is a bug in
 * the chain.
 */
export function transition(ctx: RequestContext, next: RequestState): void {
  const from = REQUEST_STATES.indexOf(ctx.state);
  const to = REQUEST_STATES.indexOf(next);
  if (to < from) {
    throw new Error(`Illegal request state transition ${ctx.state} -> ${next}`);
  }
  ctx.logger.debug('Request state', { seq: ctx.seq, from: ctx.state, to: next });
  ctx.state = next;
}

function rpcAttributes(message: JsonRpcInbound): Record<string, string | number> {
  const attributes: Record<string, string | number> = {
    'rpc.system': 'jsonrpc',
    'rpc.method': message.method,
  };
  if (isRequest(message)) {
    attributes['rpc.jsonrpc.request_id'] = message.id;
  }
  return attributes;
}

/**
 * Run `fn` with `span` active and always end the span. Errors the callee
 * did not already record mark the span as failed.
 */
async function traced<T>(span: SpanHandle, fn: () => Promise<T>): Promise<T> {
  try {
    return await runInSpanContext(span, fn);
  } catch (error) {
    if (!span.isEnded() && span.getStatus().code === SpanStatusCode.UNSET) {
      span.recordException(error);
      span.setStatus('error', error instanceof Error ? error.message : String(error));
    }
    throw error;
  } finally {
    span.end();
  }
}

// =============================================================================
// Built-in Stages
// =============================================================================

/**
 * Read traceparent/tracestate. Never fails: bad headers start a new trace.
 */
export const extractTraceContextStage: Middleware = async (ctx, next) => {
  ctx.traceContext = extract(ctx.carrier);
  return next();
};

export const parseStage: Middleware = async (ctx, next) => {
  const parsed = parseEnvelope(ctx.body);
  if (!parsed.success) {
    ctx.logger.debug('Rejected request body', { seq: ctx.seq, error: parsed.error.message });
    return { type: 'rejected', response: createErrorResponse(null, parsed.error) };
  }
  ctx.message = parsed.data;
  transition(ctx, 'parsed');
  return next();
};

/**
 * Every parsed request is allowed; the stage exists to keep the state
 * machine honest.
 */
export const authorizeStage: Middleware = async (ctx, next) => {
  transition(ctx, 'authorized');
  return next();
};

// =============================================================================
// MessageRouter Class
// =============================================================================

export class MessageRouter {
  private readonly registry: ToolRegistry;
  private readonly recorder: SpanRecorder;
  private readonly logger: StructuredLogger;
  private readonly server: ServerDescription;
  private readonly chain: Middleware[];
  private seq = 0;

  constructor(options: MessageRouterOptions) {
    this.registry = options.registry;
    this.recorder = options.recorder;
    this.logger = options.logger ?? createSilentLogger();
    this.server = options.server ?? DEFAULT_SERVER_DESCRIPTION;
    this.chain = [
      extractTraceContextStage,
      parseStage,
      authorizeStage,
      ...(options.middleware ?? []),
      this.requestSpanStage,
    ];
  }

  /**
   * Dispatch a decoded body. `carrier` holds the transport headers.
   */
  async handle(body: unknown, carrier: TraceCarrier = {}): Promise<DispatchOutcome> {
    this.seq += 1;
    const ctx: RequestContext = {
      seq: this.seq,
      body,
      carrier,
      logger: this.logger,
      state: 'received',
    };

    let outcome: DispatchOutcome;
    try {
      outcome = await this.runChain(ctx, 0);
    } catch (error) {
      // A stage threw outside the router's own error handling
      this.logger.error('Request pipeline failed', { seq: ctx.seq, error });
      ctx.error = fromError(error);
      const message = ctx.message;
      if (message === undefined) {
        return { type: 'rejected', response: toErrorResponse(ctx.error, null) };
      }
      outcome = isRequest(message)
        ? { type: 'response', response: toErrorResponse(ctx.error, message.id) }
        : { type: 'accepted' };
    }
    if (ctx.state !== 'received') {
      transition(ctx, 'completed');
    }
    return outcome;
  }

  /**
   * Dispatch a raw body. Invalid JSON is answered with a parse error.
   */
  async handleText(text: string, carrier: TraceCarrier = {}): Promise<DispatchOutcome> {
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      return { type: 'rejected', response: createParseErrorResponse(error instanceof Error ? error.message : undefined) };
    }
    return this.handle(body, carrier);
  }

  private runChain(ctx: RequestContext, index: number): Promise<DispatchOutcome> {
    const stage = this.chain[index];
    if (stage === undefined) {
      return this.dispatch(ctx);
    }
    return stage(ctx, () => this.runChain(ctx, index + 1));
  }

  /**
   * Request-level span for every method except tools/call, which opens its
   * own span only once the tool is known.
   */
  private readonly requestSpanStage: Middleware = async (ctx, next) => {
    const message = ctx.message;
    if (message === undefined || message.method === 'tools/call') {
      return next();
    }

    const span = this.recorder.startSpan(this.parentOf(ctx), message.method, {
      kind: SpanKind.SERVER,
      attributes: rpcAttributes(message),
    });
    return traced(span, async () => {
      const outcome = await next();
      if (ctx.error) {
        span.setAttribute('rpc.jsonrpc.error_code', ctx.error.code);
        span.setStatus('error', ctx.error.message);
      } else {
        span.setStatus('ok');
      }
      return outcome;
    });
  };

  /**
   * End of the chain: route by method and wrap the result.
   */
  private async dispatch(ctx: RequestContext): Promise<DispatchOutcome> {
    const message = ctx.message;
    if (message === undefined) {
      // Only reachable when a custom stage skips the parse stage
      ctx.error = new InternalError('Request reached the router unparsed');
      return { type: 'rejected', response: toErrorResponse(ctx.error, null) };
    }

    transition(ctx, 'dispatching');
    try {
      const result = await this.route(ctx, message);
      if (!isRequest(message)) {
        return { type: 'accepted' };
      }
      return { type: 'response', response: createSuccessResponse(message.id, result) };
    } catch (error) {
      const mcpError = fromError(error);
      ctx.error = mcpError;
      if (!(error instanceof McpError)) {
        this.logger.error('Unhandled error in request handler', { method: message.method, error });
      }
      if (!isRequest(message)) {
        this.logger.warning('Notification failed', { method: message.method, error: mcpError.message });
        return { type: 'accepted' };
      }
      return { type: 'response', response: toErrorResponse(mcpError, message.id) };
    }
  }

  private async route(ctx: RequestContext, message: JsonRpcInbound): Promise<unknown> {
    switch (message.method) {
      case 'initialize':
        return handleInitialize(message.params, this.server);

      case 'notifications/initialized':
        return {};

      case 'ping':
        return {};

      case 'tools/list':
        return { tools: this.registry.list() };

      case 'tools/call':
        return this.callTool(ctx, message);

      default:
        throw new MethodNotFoundError(message.method);
    }
  }

  private async callTool(ctx: RequestContext, message: JsonRpcInbound): Promise<unknown> {
    const params = ToolsCallParamsSchema.safeParse(message.params ?? {});
    if (!params.success) {
      throw new InvalidParamsError('Invalid params for tools/call', params.error.format());
    }

    const { name, arguments: args } = params.data;
    if (!this.registry.has(name)) {
      throw toolErrorToMcpError(name, { kind: 'UnknownTool', message: `Unknown tool: ${name}` }, this.registry.names());
    }

    const span = this.recorder.startSpan(this.parentOf(ctx), name, {
      kind: SpanKind.SERVER,
      attributes: {
        ...rpcAttributes(message),
        'tool.name': name,
        'tool.input': truncate(safeStringify(args)),
      },
    });

    return traced(span, async () => {
      this.logger.debug('Invoking tool', { tool: name });
      const outcome = await this.registry.invoke(name, args);

      if (outcome.ok) {
        span.setAttribute('tool.output', truncate(safeStringify(outcome.value)));
        span.setStatus('ok');
        this.logger.info('Tool call succeeded', { tool: name });
        return createToolCallResult(outcome.value);
      }

      const mcpError = toolErrorToMcpError(name, outcome.error, this.registry.names());
      span.setAttribute('tool.error.kind', outcome.error.kind);
      span.setAttribute('rpc.jsonrpc.error_code', mcpError.code);
      span.setStatus('error', outcome.error.message);
      this.logger.warning('Tool call failed', {
        tool: name,
        kind: outcome.error.kind,
        error: outcome.error.message,
      });
      throw mcpError;
    });
  }

  private parentOf(ctx: RequestContext): TraceContext {
    if (ctx.traceContext === undefined) {
      ctx.traceContext = extract(ctx.carrier);
    }
    return ctx.traceContext;
  }
}
