/**
 * Batch Span Exporter
 *
 * Bounded, non-blocking hand-off between the request path and a span sink.
 * `submit()` is a synchronous enqueue; a timer (and an eager trigger once a
 * full batch is waiting) drains the queue through the sink, one batch in
 * flight at a time. Failed batches are logged and dropped, never retried.
 */

import type { FinishedSpan, SpanSubmitter } from './span-recorder.js';
import type { ExportResult, SpanSink } from './sinks.js';
import { type StructuredLogger, createSilentLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * What to do with a span that arrives while the queue is full.
 * - drop-newest: discard the incoming span
 * - drop-oldest: evict the head of the queue to make room
 */
export type DropPolicy = 'drop-newest' | 'drop-oldest';

export const DROP_POLICIES = ['drop-newest', 'drop-oldest'] as const satisfies readonly DropPolicy[];

export interface BatchSpanExporterOptions {
  sink: SpanSink;
  /** Max spans per export call (default: 512) */
  batchSize?: number;
  /** Timer period in milliseconds (default: 200) */
  flushIntervalMs?: number;
  /** Queue capacity (default: 2048) */
  maxQueueSize?: number;
  /** Per-batch deadline in milliseconds (default: 10000) */
  exportTimeoutMs?: number;
  dropPolicy?: DropPolicy;
  logger?: StructuredLogger;
}

export interface ExporterStats {
  /** Spans waiting in the queue */
  queued: number;
  /** Spans discarded by overflow, late submits or shutdown */
  dropped: number;
  /** Spans the sink accepted */
  exported: number;
  /** Spans lost to failed export calls */
  failed: number;
  /** Export calls made, successful or not */
  batches: number;
}

export const DEFAULT_EXPORTER_OPTIONS = {
  batchSize: 512,
  flushIntervalMs: 200,
  maxQueueSize: 2048,
  exportTimeoutMs: 10_000,
  dropPolicy: 'drop-newest',
} as const satisfies Omit<Required<BatchSpanExporterOptions>, 'sink' | 'logger'>;

// =============================================================================
// Errors
// =============================================================================

/**
 * A batch the sink did not accept. Logged and counted, never thrown to
 * callers of submit().
 */
export class ExportFailure extends Error {
  readonly sink: string;
  readonly spanCount: number;

  constructor(sink: string, spanCount: number, cause: Error) {
    super(`Export of ${spanCount} span(s) to ${sink} failed: ${cause.message}`, { cause });
    this.name = 'ExportFailure';
    this.sink = sink;
    this.spanCount = spanCount;
  }
}

export class ExportTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Export timed out after ${timeoutMs}ms`);
    this.name = 'ExportTimeoutError';
  }
}

// =============================================================================
// BatchSpanExporter
// =============================================================================

export class BatchSpanExporter implements SpanSubmitter {
  private readonly sink: SpanSink;
  private readonly batchSize: number;
  private readonly maxQueueSize: number;
  private readonly exportTimeoutMs: number;
  private readonly dropPolicy: DropPolicy;
  private readonly logger: StructuredLogger;

  private queue: FinishedSpan[] = [];
  private timer: NodeJS.Timeout | null;
  private draining: Promise<void> | null = null;
  private activeExport: AbortController | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private overflowReported = false;

  private dropped = 0;
  private exported = 0;
  private failed = 0;
  private batches = 0;

  constructor(options: BatchSpanExporterOptions) {
    this.sink = options.sink;
    this.maxQueueSize = Math.max(1, options.maxQueueSize ?? DEFAULT_EXPORTER_OPTIONS.maxQueueSize);
    this.batchSize = Math.min(
      Math.max(1, options.batchSize ?? DEFAULT_EXPORTER_OPTIONS.batchSize),
      this.maxQueueSize
    );
    this.exportTimeoutMs = options.exportTimeoutMs ?? DEFAULT_EXPORTER_OPTIONS.exportTimeoutMs;
    this.dropPolicy = options.dropPolicy ?? DEFAULT_EXPORTER_OPTIONS.dropPolicy;
    this.logger = options.logger ?? createSilentLogger();

    const interval = options.flushIntervalMs ?? DEFAULT_EXPORTER_OPTIONS.flushIntervalMs;
    this.timer = setInterval(() => {
      void this.drain();
    }, interval);
    // The worker must not keep the process alive on its own
    this.timer.unref();
  }

  getSinkName(): string {
    return this.sink.name;
  }

  isShutdown(): boolean {
    return this.shutdownPromise !== null;
  }

  /**
   * Enqueue a closed span. Returns false when the span was not admitted
   * (not ended, queue full under drop-newest, or exporter shut down).
   */
  submit(span: FinishedSpan): boolean {
    if (this.shutdownPromise !== null) {
      this.dropped++;
      return false;
    }
    if (!Object.isFrozen(span)) {
      this.logger.warning('Rejected span that was not ended', { name: span.name });
      return false;
    }

    if (this.queue.length >= this.maxQueueSize) {
      this.dropped++;
      this.reportOverflow();
      if (this.dropPolicy === 'drop-newest') {
        return false;
      }
      this.queue.shift();
    }

    this.queue.push(span);
    if (this.queue.length >= this.batchSize) {
      void this.drain();
    }
    return true;
  }

  /**
   * Export everything queued so far, in batches.
   */
  async forceFlush(): Promise<void> {
    await this.drain();
  }

  /**
   * Stop the worker, make one flush bounded by `timeoutMs`, then discard
   * whatever is left. Later calls return the same promise.
   */
  shutdown(timeoutMs = this.exportTimeoutMs): Promise<void> {
    if (this.shutdownPromise === null) {
      this.shutdownPromise = this.runShutdown(timeoutMs);
    }
    return this.shutdownPromise;
  }

  stats(): ExporterStats {
    return {
      queued: this.queue.length,
      dropped: this.dropped,
      exported: this.exported,
      failed: this.failed,
      batches: this.batches,
    };
  }

  // ===========================================================================
  // Worker
  // ===========================================================================

  /**
   * Start a drain unless one is running. The running drain is the queue's
   * only reader, so at most one export call is ever in flight.
   */
  private drain(): Promise<void> {
    if (this.draining !== null) {
      return this.draining;
    }
    if (this.queue.length === 0) {
      return Promise.resolve();
    }
    this.draining = this.exportQueued().finally(() => {
      this.draining = null;
    });
    return this.draining;
  }

  private async exportQueued(): Promise<void> {
    while (this.queue.length > 0) {
      const batch = this.queue.splice(0, this.batchSize);
      await this.exportBatch(batch);
    }
    this.overflowReported = false;
  }

  private async exportBatch(batch: FinishedSpan[]): Promise<void> {
    const controller = new AbortController();
    this.activeExport = controller;
    this.batches++;

    let timeoutHandle: NodeJS.Timeout | undefined;
    const timeout = new Promise<ExportResult>((resolve) => {
      timeoutHandle = setTimeout(() => {
        controller.abort();
        resolve({ success: false, error: new ExportTimeoutError(this.exportTimeoutMs) });
      }, this.exportTimeoutMs);
    });

    let result: ExportResult;
    try {
      result = await Promise.race([this.sink.export(batch, controller.signal), timeout]);
    } catch (error) {
      result = { success: false, error: error instanceof Error ? error : new Error(String(error)) };
    } finally {
      clearTimeout(timeoutHandle);
      this.activeExport = null;
    }

    if (result.success) {
      this.exported += batch.length;
      this.logger.debug('Exported spans', { sink: this.sink.name, count: batch.length });
      return;
    }

    this.failed += batch.length;
    const failure = new ExportFailure(this.sink.name, batch.length, result.error);
    this.logger.warning(failure.message, {
      sink: this.sink.name,
      spans: batch.length,
      error: result.error,
    });
  }

  private reportOverflow(): void {
    if (this.overflowReported) {
      return;
    }
    this.overflowReported = true;
    this.logger.warning('Span queue full, dropping spans', {
      maxQueueSize: this.maxQueueSize,
      dropPolicy: this.dropPolicy,
    });
  }

  private async runShutdown(timeoutMs: number): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }

    let deadlineHandle: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      deadlineHandle = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    const outcome = await Promise.race([this.drain().then(() => 'flushed' as const), deadline]);
    clearTimeout(deadlineHandle);

    if (outcome === 'timeout') {
      const discarded = this.queue.length;
      this.queue = [];
      this.dropped += discarded;
      this.activeExport?.abort();
      this.logger.warning('Exporter shutdown flush timed out', { timeoutMs, discarded });
    }

    if (this.sink.shutdown) {
      try {
        await this.sink.shutdown();
      } catch (error) {
        this.logger.error('Span sink shutdown failed', { sink: this.sink.name, error });
      }
    }

    this.logger.debug('Exporter shut down', this.stats());
  }
}
