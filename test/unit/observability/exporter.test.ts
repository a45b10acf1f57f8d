import { describe, it, expect, afterEach } from 'vitest';
import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import {
  BatchSpanExporter,
  type BatchSpanExporterOptions,
  DEFAULT_EXPORTER_OPTIONS,
  ExportFailure,
  ExportTimeoutError,
} from '../../../src/observability/exporter.js';
import { StructuredLogger } from '../../../src/observability/logger.js';
import { type ExportResult, InMemorySink, type SpanSink } from '../../../src/observability/sinks.js';
import type { FinishedSpan } from '../../../src/observability/span-recorder.js';
import { createDeferred, waitForCondition } from '../../helpers/index.js';

// =============================================================================
// Test Setup
// =============================================================================

const TRACE_ID = '4bf92f3577b34da6a3ce929d0e0e4736';

function makeSpan(name: string): FinishedSpan {
  return Object.freeze({
    traceId: TRACE_ID,
    spanId: '00f067aa0ba902b7',
    name,
    kind: SpanKind.SERVER,
    traceFlags: 1,
    startTimeUnixNano: 1_000n,
    endTimeUnixNano: 2_000n,
    durationMs: 0.001,
    status: Object.freeze({ code: SpanStatusCode.OK }),
    attributes: Object.freeze({}),
    serviceName: 'weather-test',
  });
}

function namesOf(batches: ReadonlyArray<ReadonlyArray<FinishedSpan>>): string[][] {
  return batches.map((batch) => batch.map((span) => span.name));
}

/**
 * Holds every export until release() is called (or the export is aborted).
 */
class GatedSink implements SpanSink {
  readonly name = 'gated';
  readonly batches: Array<ReadonlyArray<FinishedSpan>> = [];
  private readonly gate = createDeferred<void>();

  async export(batch: ReadonlyArray<FinishedSpan>, signal: AbortSignal): Promise<ExportResult> {
    this.batches.push([...batch]);
    const aborted = new Promise<ExportResult>((resolve) => {
      signal.addEventListener('abort', () => resolve({ success: false, error: new Error('aborted') }), {
        once: true,
      });
    });
    return Promise.race([this.gate.promise.then((): ExportResult => ({ success: true })), aborted]);
  }

  release(): void {
    this.gate.resolve();
  }
}

/**
 * Never answers; settles as a failure only when aborted.
 */
class HangingSink implements SpanSink {
  readonly name = 'hanging';
  readonly signals: AbortSignal[] = [];
  shutdownCalls = 0;

  export(_batch: ReadonlyArray<FinishedSpan>, signal: AbortSignal): Promise<ExportResult> {
    this.signals.push(signal);
    return new Promise((resolve) => {
      signal.addEventListener('abort', () => resolve({ success: false, error: new Error('aborted') }), {
        once: true,
      });
    });
  }

  async shutdown(): Promise<void> {
    this.shutdownCalls++;
  }
}

function captureLogger(): { logger: StructuredLogger; messages: string[] } {
  const messages: string[] = [];
  const logger = new StructuredLogger({
    minLevel: 'debug',
    output: (line) => {
      const entry: unknown = JSON.parse(line);
      if (typeof entry === 'object' && entry !== null && 'message' in entry && typeof entry.message === 'string') {
        messages.push(entry.message);
      }
    },
  });
  return { logger, messages };
}

// Interval long enough that only explicit flushes run during a test
const MANUAL: Omit<BatchSpanExporterOptions, 'sink'> = { flushIntervalMs: 60_000 };

// =============================================================================
// BatchSpanExporter Tests
// =============================================================================

describe('BatchSpanExporter', () => {
  const exporters: BatchSpanExporter[] = [];

  function create(options: BatchSpanExporterOptions): BatchSpanExporter {
    const exporter = new BatchSpanExporter(options);
    exporters.push(exporter);
    return exporter;
  }

  afterEach(async () => {
    await Promise.all(exporters.map((exporter) => exporter.shutdown(50)));
    exporters.length = 0;
  });

  describe('defaults', () => {
    it('should match the documented defaults', () => {
      expect(DEFAULT_EXPORTER_OPTIONS).toEqual({
        batchSize: 512,
        flushIntervalMs: 200,
        maxQueueSize: 2048,
        exportTimeoutMs: 10_000,
        dropPolicy: 'drop-newest',
      });
    });

    it('should report the sink name', () => {
      expect(create({ ...MANUAL, sink: new InMemorySink() }).getSinkName()).toBe('memory');
    });
  });

  // ===========================================================================
  // submit / flush
  // ===========================================================================

  describe('submit', () => {
    it('should enqueue without exporting', () => {
      const sink = new InMemorySink();
      const exporter = create({ ...MANUAL, sink });

      expect(exporter.submit(makeSpan('a'))).toBe(true);
      expect(exporter.stats()).toEqual({ queued: 1, dropped: 0, exported: 0, failed: 0, batches: 0 });
      expect(sink.getSpans()).toHaveLength(0);
    });

    it('should export queued spans on forceFlush', async () => {
      const sink = new InMemorySink();
      const exporter = create({ ...MANUAL, sink });

      exporter.submit(makeSpan('a'));
      exporter.submit(makeSpan('b'));
      await exporter.forceFlush();

      expect(namesOf(sink.getBatches())).toEqual([['a', 'b']]);
      expect(exporter.stats()).toEqual({ queued: 0, dropped: 0, exported: 2, failed: 0, batches: 1 });
    });

    it('should split the queue into batches of batchSize', async () => {
      const sink = new InMemorySink();
      const exporter = create({ ...MANUAL, sink, batchSize: 2 });

      for (const name of ['a', 'b', 'c', 'd', 'e']) {
        exporter.submit(makeSpan(name));
      }
      await exporter.forceFlush();

      expect(namesOf(sink.getBatches())).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
      expect(exporter.stats().batches).toBe(3);
    });

    it('should flush on the timer', async () => {
      const sink = new InMemorySink();
      create({ sink, flushIntervalMs: 10 }).submit(makeSpan('timed'));

      await waitForCondition(() => sink.getSpans().length === 1);
      expect(sink.getSpans()[0]?.name).toBe('timed');
    });

    it('should start exporting once a full batch is waiting', async () => {
      const sink = new InMemorySink();
      const exporter = create({ ...MANUAL, sink, batchSize: 2 });

      exporter.submit(makeSpan('a'));
      exporter.submit(makeSpan('b'));

      await waitForCondition(() => sink.getSpans().length === 2);
      expect(exporter.stats().queued).toBe(0);
    });

    it('should reject spans that were not ended', () => {
      const { logger, messages } = captureLogger();
      const exporter = create({ ...MANUAL, sink: new InMemorySink(), logger });

      const live: FinishedSpan = { ...makeSpan('live') };
      expect(exporter.submit(live)).toBe(false);
      expect(exporter.stats()).toEqual({ queued: 0, dropped: 0, exported: 0, failed: 0, batches: 0 });
      expect(messages).toContain('Rejected span that was not ended');
    });

    it('should keep at most one export in flight', async () => {
      const sink = new GatedSink();
      const exporter = create({ ...MANUAL, sink, batchSize: 1 });

      exporter.submit(makeSpan('a'));
      exporter.submit(makeSpan('b'));
      exporter.submit(makeSpan('c'));
      await new Promise((resolve) => setTimeout(resolve, 5));

      expect(namesOf(sink.batches)).toEqual([['a']]);
      sink.release();
      await exporter.forceFlush();
      expect(namesOf(sink.batches)).toEqual([['a'], ['b'], ['c']]);
    });
  });

  // ===========================================================================
  // Overflow
  // ===========================================================================

  describe('overflow', () => {
    it('should drop the incoming span under drop-newest', async () => {
      const sink = new GatedSink();
      const exporter = create({ ...MANUAL, sink, batchSize: 2, maxQueueSize: 2 });

      // a and b go out in the first (held) batch; c and d fill the queue
      for (const name of ['a', 'b', 'c', 'd']) {
        expect(exporter.submit(makeSpan(name))).toBe(true);
      }
      expect(exporter.submit(makeSpan('e'))).toBe(false);
      expect(exporter.stats().dropped).toBe(1);

      sink.release();
      await exporter.forceFlush();
      expect(namesOf(sink.batches)).toEqual([
        ['a', 'b'],
        ['c', 'd'],
      ]);
    });

    it('should evict the head under drop-oldest', async () => {
      const sink = new GatedSink();
      const exporter = create({ ...MANUAL, sink, batchSize: 2, maxQueueSize: 2, dropPolicy: 'drop-oldest' });

      for (const name of ['a', 'b', 'c', 'd']) {
        exporter.submit(makeSpan(name));
      }
      expect(exporter.submit(makeSpan('e'))).toBe(true);
      expect(exporter.stats()).toMatchObject({ queued: 2, dropped: 1 });

      sink.release();
      await exporter.forceFlush();
      expect(namesOf(sink.batches)).toEqual([
        ['a', 'b'],
        ['d', 'e'],
      ]);
    });

    it('should warn once per overflow episode', () => {
      const { logger, messages } = captureLogger();
      const exporter = create({ ...MANUAL, sink: new GatedSink(), batchSize: 1, maxQueueSize: 1, logger });

      // a is held in flight, b fills the queue, c and d overflow
      for (const name of ['a', 'b', 'c', 'd']) {
        exporter.submit(makeSpan(name));
      }

      expect(exporter.stats().dropped).toBe(2);
      expect(messages.filter((message) => message === 'Span queue full, dropping spans')).toHaveLength(1);
    });

    it('should clamp batchSize to the queue capacity', async () => {
      const sink = new InMemorySink();
      const exporter = create({ ...MANUAL, sink, batchSize: 10, maxQueueSize: 3 });

      for (const name of ['a', 'b', 'c']) {
        exporter.submit(makeSpan(name));
      }
      await exporter.forceFlush();
      expect(namesOf(sink.getBatches())).toEqual([['a', 'b', 'c']]);
    });
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe('export failures', () => {
    it('should count a failed batch and keep going', async () => {
      const { logger, messages } = captureLogger();
      let calls = 0;
      const sink: SpanSink = {
        name: 'flaky',
        async export(): Promise<ExportResult> {
          calls++;
          return calls === 1 ? { success: false, error: new Error('HTTP 503') } : { success: true };
        },
      };
      const exporter = create({ ...MANUAL, sink, batchSize: 1, logger });

      exporter.submit(makeSpan('a'));
      exporter.submit(makeSpan('b'));
      await exporter.forceFlush();

      expect(exporter.stats()).toEqual({ queued: 0, dropped: 0, exported: 1, failed: 1, batches: 2 });
      expect(messages).toContain('Export of 1 span(s) to flaky failed: HTTP 503');
    });

    it('should treat a throwing sink as a failure', async () => {
      const sink: SpanSink = {
        name: 'broken',
        export(): Promise<ExportResult> {
          return Promise.reject(new Error('socket hang up'));
        },
      };
      const exporter = create({ ...MANUAL, sink });

      exporter.submit(makeSpan('a'));
      await exporter.forceFlush();

      expect(exporter.stats()).toMatchObject({ exported: 0, failed: 1 });
    });

    it('should abort and fail a batch that exceeds the export timeout', async () => {
      const sink = new HangingSink();
      const exporter = create({ ...MANUAL, sink, exportTimeoutMs: 20 });

      exporter.submit(makeSpan('slow'));
      await exporter.forceFlush();

      expect(exporter.stats()).toMatchObject({ failed: 1, exported: 0 });
      expect(sink.signals[0]?.aborted).toBe(true);
    });

    it('should describe failures', () => {
      const failure = new ExportFailure('otlp', 3, new ExportTimeoutError(100));
      expect(failure.message).toBe('Export of 3 span(s) to otlp failed: Export timed out after 100ms');
      expect(failure.cause).toBeInstanceOf(ExportTimeoutError);
      expect(failure.spanCount).toBe(3);
    });
  });

  // ===========================================================================
  // Shutdown
  // ===========================================================================

  describe('shutdown', () => {
    it('should flush queued spans', async () => {
      const sink = new InMemorySink();
      const exporter = create({ ...MANUAL, sink });

      exporter.submit(makeSpan('a'));
      await exporter.shutdown();

      expect(sink.getSpans().map((span) => span.name)).toEqual(['a']);
      expect(exporter.isShutdown()).toBe(true);
    });

    it('should refuse and count spans submitted afterwards', async () => {
      const exporter = create({ ...MANUAL, sink: new InMemorySink() });
      await exporter.shutdown();

      expect(exporter.submit(makeSpan('late'))).toBe(false);
      expect(exporter.stats().dropped).toBe(1);
    });

    it('should be idempotent', async () => {
      const sink = new HangingSink();
      const exporter = create({ ...MANUAL, sink });

      const first = exporter.shutdown(10);
      const second = exporter.shutdown(10);
      expect(second).toBe(first);
      await first;
      expect(sink.shutdownCalls).toBe(1);
    });

    it('should give up after the timeout and discard what is left', async () => {
      const sink = new HangingSink();
      const exporter = create({ ...MANUAL, sink, batchSize: 1 });

      exporter.submit(makeSpan('a'));
      exporter.submit(makeSpan('b'));
      exporter.submit(makeSpan('c'));

      const started = Date.now();
      await exporter.shutdown(30);

      expect(Date.now() - started).toBeLessThan(1000);
      expect(exporter.stats()).toMatchObject({ queued: 0, dropped: 2 });
      expect(sink.signals[0]?.aborted).toBe(true);
      expect(sink.shutdownCalls).toBe(1);
    });
  });
});
