/**
 * Span Recorder
 *
 * Creates spans under a trace context, tracks their timing and hands each
 * one to the exporter exactly once when it ends.
 *
 * Start/end timestamps are wall-clock (unix nanoseconds); the duration is
 * measured on the monotonic clock and added to the start time, so clock
 * adjustments during a span never produce negative durations.
 */

import { SpanKind, SpanStatusCode, context, trace } from '@opentelemetry/api';
import {
  type LocalTraceContext,
  type TraceContext,
  generateSpanId,
  generateTraceId,
  parentSpanIdOf,
} from './trace-context.js';

// =============================================================================
// Types
// =============================================================================

export type AttributeValue = string | number | boolean;

export type SpanAttributes = Record<string, AttributeValue>;

export interface SpanStatus {
  code: SpanStatusCode;
  message?: string;
}

/**
 * A closed, frozen span as handed to the exporter.
 */
export interface FinishedSpan {
  readonly traceId: string;
  readonly spanId: string;
  readonly parentSpanId?: string;
  readonly name: string;
  readonly kind: SpanKind;
  readonly traceFlags: number;
  readonly traceState?: string;
  readonly startTimeUnixNano: bigint;
  readonly endTimeUnixNano: bigint;
  readonly durationMs: number;
  readonly status: Readonly<SpanStatus>;
  readonly attributes: Readonly<SpanAttributes>;
  readonly serviceName: string;
}

/**
 * Where ended spans go. Implemented by BatchSpanExporter.
 */
export interface SpanSubmitter {
  submit(span: FinishedSpan): boolean;
}

export interface SpanClock {
  /** Wall-clock time in unix nanoseconds */
  wallNanos(): bigint;
  /** Monotonic time in nanoseconds from an arbitrary origin */
  monotonicNanos(): bigint;
}

export interface StartSpanOptions {
  kind?: SpanKind;
  attributes?: SpanAttributes;
}

export interface SpanRecorderOptions {
  submitter: SpanSubmitter;
  /** Attached to every span */
  serviceName: string;
  clock?: SpanClock;
}

// =============================================================================
// Errors
// =============================================================================

export class SpanEndedError extends Error {
  constructor(spanName: string, operation: string) {
    super(`Cannot ${operation} on span '${spanName}' after end()`);
    this.name = 'SpanEndedError';
  }
}

// =============================================================================
// Clock
// =============================================================================

export const systemClock: SpanClock = {
  wallNanos: () => BigInt(Date.now()) * 1_000_000n,
  monotonicNanos: () => process.hrtime.bigint(),
};

// =============================================================================
// SpanHandle
// =============================================================================

/**
 * Live span. Attribute and status setters are valid until end().
 */
export class SpanHandle {
  readonly name: string;
  private readonly ctx: LocalTraceContext;
  private readonly kind: SpanKind;
  private readonly serviceName: string;
  private readonly submitter: SpanSubmitter;
  private readonly clock: SpanClock;
  private readonly startWallNanos: bigint;
  private readonly startMonotonicNanos: bigint;
  private readonly attributes: SpanAttributes = {};
  private status: SpanStatus = { code: SpanStatusCode.UNSET };
  private finished: FinishedSpan | null = null;

  constructor(
    name: string,
    ctx: LocalTraceContext,
    kind: SpanKind,
    serviceName: string,
    submitter: SpanSubmitter,
    clock: SpanClock
  ) {
    this.name = name;
    this.ctx = ctx;
    this.kind = kind;
    this.serviceName = serviceName;
    this.submitter = submitter;
    this.clock = clock;
    this.startWallNanos = clock.wallNanos();
    this.startMonotonicNanos = clock.monotonicNanos();
  }

  /**
   * Context to parent further spans on, or to inject into outgoing calls.
   */
  context(): LocalTraceContext {
    return this.ctx;
  }

  isEnded(): boolean {
    return this.finished !== null;
  }

  getStatus(): Readonly<SpanStatus> {
    return this.status;
  }

  setAttribute(key: string, value: AttributeValue): this {
    this.assertOpen('setAttribute');
    this.attributes[key] = value;
    return this;
  }

  setAttributes(attributes: SpanAttributes): this {
    this.assertOpen('setAttributes');
    Object.assign(this.attributes, attributes);
    return this;
  }

  setStatus(status: 'ok' | 'error', message?: string): this {
    this.assertOpen('setStatus');
    this.status = {
      code: status === 'ok' ? SpanStatusCode.OK : SpanStatusCode.ERROR,
      ...(message !== undefined ? { message } : {}),
    };
    return this;
  }

  recordException(error: unknown): this {
    this.assertOpen('recordException');
    if (error instanceof Error) {
      this.attributes['exception.type'] = error.name;
      this.attributes['exception.message'] = error.message;
    } else {
      this.attributes['exception.message'] = String(error);
    }
    return this;
  }

  /**
   * Close the span and submit it. Calling end() again does nothing.
   */
  end(): void {
    if (this.finished) {
      return;
    }

    const elapsedNanos = this.clock.monotonicNanos() - this.startMonotonicNanos;
    const span: FinishedSpan = {
      traceId: this.ctx.traceId,
      spanId: this.ctx.spanId,
      ...(this.ctx.parentSpanId !== undefined ? { parentSpanId: this.ctx.parentSpanId } : {}),
      name: this.name,
      kind: this.kind,
      traceFlags: this.ctx.traceFlags,
      ...(this.ctx.traceState !== undefined ? { traceState: this.ctx.traceState } : {}),
      startTimeUnixNano: this.startWallNanos,
      endTimeUnixNano: this.startWallNanos + elapsedNanos,
      durationMs: Number(elapsedNanos) / 1e6,
      status: Object.freeze({ ...this.status }),
      attributes: Object.freeze({ ...this.attributes }),
      serviceName: this.serviceName,
    };
    this.finished = Object.freeze(span);
    this.submitter.submit(this.finished);
  }

  /**
   * The frozen span after end(), otherwise null.
   */
  toFinished(): FinishedSpan | null {
    return this.finished;
  }

  private assertOpen(operation: string): void {
    if (this.finished) {
      throw new SpanEndedError(this.name, operation);
    }
  }
}

// =============================================================================
// SpanRecorder
// =============================================================================

/**
 * @example
 * ```typescript
 * const recorder = new SpanRecorder({ submitter: exporter, serviceName: 'weather-assistant' });
 * const parent = extract(req.headers);
 *
 * const result = await recorder.withSpan(parent, 'get_weather', async (span) => {
 *   span.setAttribute('location', 'NY');
 *   return lookup('NY');
 * });
 * ```
 */
export class SpanRecorder {
  private readonly submitter: SpanSubmitter;
  private readonly serviceName: string;
  private readonly clock: SpanClock;

  constructor(options: SpanRecorderOptions) {
    this.submitter = options.submitter;
    this.serviceName = options.serviceName;
    this.clock = options.clock ?? systemClock;
  }

  getServiceName(): string {
    return this.serviceName;
  }

  /**
   * Open a span under `parent`. A root parent starts a new trace: every span
   * opened on it gets its own trace id and no parent span id. Any other
   * parent makes the span its child.
   */
  startSpan(parent: TraceContext, name: string, options: StartSpanOptions = {}): SpanHandle {
    const parentSpanId = parentSpanIdOf(parent);
    const ctx: LocalTraceContext = Object.freeze({
      kind: 'local',
      traceId: parent.kind === 'root' ? generateTraceId() : parent.traceId,
      spanId: generateSpanId(),
      traceFlags: parent.traceFlags,
      ...(parentSpanId !== undefined ? { parentSpanId } : {}),
      ...(parent.traceState !== undefined ? { traceState: parent.traceState } : {}),
    });

    const span = new SpanHandle(
      name,
      ctx,
      options.kind ?? SpanKind.INTERNAL,
      this.serviceName,
      this.submitter,
      this.clock
    );
    if (options.attributes) {
      span.setAttributes(options.attributes);
    }
    return span;
  }

  /**
   * Run `fn` inside a new span. The span is active for the duration (log
   * entries pick up its ids), gets status ok unless `fn` set one or threw,
   * and is always ended.
   */
  async withSpan<T>(
    parent: TraceContext,
    name: string,
    fn: (span: SpanHandle) => Promise<T> | T,
    options: StartSpanOptions = {}
  ): Promise<T> {
    const span = this.startSpan(parent, name, options);
    try {
      const result = await runInSpanContext(span, () => fn(span));
      if (!span.isEnded() && span.getStatus().code === SpanStatusCode.UNSET) {
        span.setStatus('ok');
      }
      return result;
    } catch (error) {
      if (!span.isEnded()) {
        span.recordException(error);
        span.setStatus('error', error instanceof Error ? error.message : String(error));
      }
      throw error;
    } finally {
      span.end();
    }
  }
}

/**
 * Make `span` the active span while `fn` runs, so that anything reading the
 * active context (the structured logger) sees its ids.
 */
export function runInSpanContext<T>(span: SpanHandle, fn: () => T): T {
  const spanCtx = span.context();
  const active = trace.setSpanContext(context.active(), {
    traceId: spanCtx.traceId,
    spanId: spanCtx.spanId,
    traceFlags: spanCtx.traceFlags,
    isRemote: false,
  });
  return context.with(active, fn);
}
