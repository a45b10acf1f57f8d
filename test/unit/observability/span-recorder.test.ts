import { describe, it, expect, beforeEach } from 'vitest';
import { SpanKind, SpanStatusCode, context, trace } from '@opentelemetry/api';
import {
  type FinishedSpan,
  type SpanSubmitter,
  SpanEndedError,
  SpanRecorder,
  runInSpanContext,
} from '../../../src/observability/span-recorder.js';
import { createRootContext, extract } from '../../../src/observability/trace-context.js';
import { createManualClock } from '../../helpers/index.js';

const TRACE_ID = '4bf92f3577b34da6a3ce929d0e0e4736';
const SPAN_ID = '00f067aa0ba902b7';

class CollectingSubmitter implements SpanSubmitter {
  readonly spans: FinishedSpan[] = [];

  submit(span: FinishedSpan): boolean {
    this.spans.push(span);
    return true;
  }
}

describe('SpanRecorder', () => {
  let submitter: CollectingSubmitter;
  let clock: ReturnType<typeof createManualClock>;
  let recorder: SpanRecorder;

  beforeEach(() => {
    submitter = new CollectingSubmitter();
    clock = createManualClock(1_000);
    recorder = new SpanRecorder({ submitter, serviceName: 'weather-test', clock });
  });

  // ===========================================================================
  // startSpan
  // ===========================================================================

  describe('startSpan', () => {
    it('should make the span a child of a remote parent', () => {
      const parent = extract({ traceparent: `00-${TRACE_ID}-${SPAN_ID}-01` });
      const span = recorder.startSpan(parent, 'get_weather');

      const ctx = span.context();
      expect(ctx.kind).toBe('local');
      expect(ctx.traceId).toBe(TRACE_ID);
      expect(ctx.parentSpanId).toBe(SPAN_ID);
      expect(ctx.spanId).toMatch(/^[0-9a-f]{16}$/);
      expect(ctx.spanId).not.toBe(SPAN_ID);
      expect(ctx.traceFlags).toBe(1);
    });

    it('should start a new trace under a root context', () => {
      const root = createRootContext({ sampled: false, traceState: 'vendor=1' });
      const span = recorder.startSpan(root, 'ping');

      expect(span.context().traceId).toMatch(/^[0-9a-f]{32}$/);
      expect(span.context().parentSpanId).toBeUndefined();
      expect(span.context().traceFlags).toBe(0);
      expect(span.context().traceState).toBe('vendor=1');
    });

    it('should give each span under the same root its own trace', () => {
      const root = createRootContext();
      const first = recorder.startSpan(root, 'first');
      const second = recorder.startSpan(root, 'second');

      expect(first.context().traceId).not.toBe(second.context().traceId);
      expect(first.context().traceId).not.toBe(root.traceId);
      expect(second.context().parentSpanId).toBeUndefined();
    });

    it('should nest local spans', () => {
      const outer = recorder.startSpan(createRootContext(), 'outer');
      const inner = recorder.startSpan(outer.context(), 'inner');

      expect(inner.context().traceId).toBe(outer.context().traceId);
      expect(inner.context().parentSpanId).toBe(outer.context().spanId);
    });

    it('should carry traceState to the child', () => {
      const parent = extract({ traceparent: `00-${TRACE_ID}-${SPAN_ID}-01`, tracestate: 'vendor=1' });
      expect(recorder.startSpan(parent, 'x').context().traceState).toBe('vendor=1');
    });

    it('should default to INTERNAL kind', () => {
      const span = recorder.startSpan(createRootContext(), 'x');
      span.end();
      expect(submitter.spans[0]?.kind).toBe(SpanKind.INTERNAL);
    });

    it('should apply initial attributes', () => {
      const span = recorder.startSpan(createRootContext(), 'x', {
        kind: SpanKind.SERVER,
        attributes: { 'tool.name': 'get_weather' },
      });
      span.end();
      expect(submitter.spans[0]?.kind).toBe(SpanKind.SERVER);
      expect(submitter.spans[0]?.attributes).toEqual({ 'tool.name': 'get_weather' });
    });
  });

  // ===========================================================================
  // SpanHandle
  // ===========================================================================

  describe('SpanHandle', () => {
    it('should submit exactly once', () => {
      const span = recorder.startSpan(createRootContext(), 'once');
      span.end();
      span.end();
      expect(submitter.spans).toHaveLength(1);
    });

    it('should produce a frozen finished span', () => {
      const span = recorder.startSpan(createRootContext(), 'frozen');
      span.setAttribute('k', 'v');
      span.end();

      const finished = span.toFinished();
      expect(finished).not.toBeNull();
      expect(Object.isFrozen(finished)).toBe(true);
      expect(Object.isFrozen(finished?.attributes)).toBe(true);
      expect(Object.isFrozen(finished?.status)).toBe(true);
      expect(finished?.serviceName).toBe('weather-test');
    });

    it('should return null from toFinished before end', () => {
      expect(recorder.startSpan(createRootContext(), 'open').toFinished()).toBeNull();
    });

    it('should measure duration on the monotonic clock', () => {
      const span = recorder.startSpan(createRootContext(), 'timed');
      clock.advance(250);
      span.end();

      const finished = submitter.spans[0];
      expect(finished?.durationMs).toBe(250);
      expect(finished?.startTimeUnixNano).toBe(1_000_000_000n);
      expect(finished?.endTimeUnixNano).toBe(1_250_000_000n);
    });

    it('should record status with a message', () => {
      const span = recorder.startSpan(createRootContext(), 'failing');
      span.setStatus('error', 'boom');
      span.end();
      expect(submitter.spans[0]?.status).toEqual({ code: SpanStatusCode.ERROR, message: 'boom' });
    });

    it('should leave status unset by default', () => {
      const span = recorder.startSpan(createRootContext(), 'plain');
      expect(span.getStatus().code).toBe(SpanStatusCode.UNSET);
    });

    it('should record exceptions as attributes', () => {
      const span = recorder.startSpan(createRootContext(), 'exc');
      span.recordException(new TypeError('bad input'));
      span.end();
      expect(submitter.spans[0]?.attributes).toEqual({
        'exception.type': 'TypeError',
        'exception.message': 'bad input',
      });
    });

    it('should reject mutation after end', () => {
      const span = recorder.startSpan(createRootContext(), 'closed');
      span.end();

      expect(span.isEnded()).toBe(true);
      expect(() => span.setAttribute('k', 'v')).toThrow(SpanEndedError);
      expect(() => span.setStatus('ok')).toThrow("Cannot setStatus on span 'closed' after end()");
      expect(() => span.recordException(new Error('late'))).toThrow(SpanEndedError);
    });

    it('should copy attributes so later changes cannot leak in', () => {
      const span = recorder.startSpan(createRootContext(), 'copy');
      span.setAttributes({ a: 1, b: true });
      span.end();
      expect(submitter.spans[0]?.attributes).toEqual({ a: 1, b: true });
    });
  });

  // ===========================================================================
  // withSpan
  // ===========================================================================

  describe('withSpan', () => {
    it('should return the callback result and mark the span ok', async () => {
      const result = await recorder.withSpan(createRootContext(), 'work', async () => 42);

      expect(result).toBe(42);
      expect(submitter.spans[0]?.status.code).toBe(SpanStatusCode.OK);
    });

    it('should keep a status set by the callback', async () => {
      await recorder.withSpan(createRootContext(), 'work', (span) => {
        span.setStatus('error', 'handled');
      });
      expect(submitter.spans[0]?.status).toEqual({ code: SpanStatusCode.ERROR, message: 'handled' });
    });

    it('should mark the span as error and rethrow', async () => {
      await expect(
        recorder.withSpan(createRootContext(), 'work', async () => {
          throw new Error('kaput');
        })
      ).rejects.toThrow('kaput');

      const finished = submitter.spans[0];
      expect(finished?.status).toEqual({ code: SpanStatusCode.ERROR, message: 'kaput' });
      expect(finished?.attributes['exception.message']).toBe('kaput');
    });

    it('should make the span active while the callback runs', async () => {
      let activeSpanId: string | undefined;
      let expectedSpanId: string | undefined;

      await recorder.withSpan(createRootContext(), 'active', async (span) => {
        await new Promise((resolve) => setTimeout(resolve, 1));
        activeSpanId = trace.getSpanContext(context.active())?.spanId;
        expectedSpanId = span.context().spanId;
      });

      expect(activeSpanId).toBeDefined();
      expect(activeSpanId).toBe(expectedSpanId);
      expect(trace.getSpanContext(context.active())).toBeUndefined();
    });
  });

  describe('runInSpanContext', () => {
    it('should expose the span trace id to the active context', () => {
      const span = recorder.startSpan(createRootContext(), 'ctx');
      const traceId = runInSpanContext(span, () => trace.getSpanContext(context.active())?.traceId);
      expect(traceId).toBe(span.context().traceId);
    });
  });

  it('should report its service name', () => {
    expect(recorder.getServiceName()).toBe('weather-test');
  });
});
