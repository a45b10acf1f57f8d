/**
 * Telemetry assembly for the weather tool server
 *
 * Provides:
 * - Sink selection from configuration (OTLP, Langfuse, console, memory, none)
 * - One exporter and one span recorder per process, injected where needed
 * - AsyncLocalStorage context manager so active spans follow async work
 * - Flush-on-shutdown
 */

import { context } from '@opentelemetry/api';
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';
import type { Config } from '../config.js';
import { BatchSpanExporter, type BatchSpanExporterOptions, type ExporterStats } from './exporter.js';
import { type StructuredLogger, createSilentLogger } from './logger.js';
import {
  ConsoleSink,
  InMemorySink,
  NoopSink,
  OtlpHttpSink,
  type SpanSink,
  createLangfuseSink,
  resolveOtlpTracesUrl,
} from './sinks.js';
import { SpanRecorder, type SpanClock } from './span-recorder.js';

// =============================================================================
// Types
// =============================================================================

export type ExporterSettings = Omit<BatchSpanExporterOptions, 'sink' | 'logger'>;

export interface TelemetryOptions {
  /** Recorded on every span and as the OTLP resource service.name */
  serviceName: string;
  sink: SpanSink;
  exporter?: ExporterSettings;
  logger?: StructuredLogger;
  clock?: SpanClock;
}

export interface SinkFactoryOptions {
  logger?: StructuredLogger;
  serviceVersion?: string;
}

// =============================================================================
// Sink selection
// =============================================================================

/**
 * Build the span sink named by `config.traceSink`.
 */
export function createSinkFromConfig(config: Config, options: SinkFactoryOptions = {}): SpanSink {
  const shared: { timeoutMs: number; serviceVersion?: string } = { timeoutMs: config.export.timeoutMs };
  if (options.serviceVersion !== undefined) shared.serviceVersion = options.serviceVersion;

  switch (config.traceSink) {
    case 'otlp':
      return new OtlpHttpSink({
        url: config.otlp.tracesEndpoint ?? resolveOtlpTracesUrl(config.otlp.endpoint),
        headers: config.otlp.headers,
        ...shared,
      });
    case 'langfuse': {
      const { publicKey, secretKey, host } = config.langfuse;
      if (publicKey === undefined || secretKey === undefined) {
        throw new Error('Langfuse sink requires LANGFUSE_PUBLIC_KEY and LANGFUSE_SECRET_KEY');
      }
      return createLangfuseSink({ host, publicKey, secretKey, ...shared });
    }
    case 'console':
      return new ConsoleSink(options.logger);
    case 'memory':
      return new InMemorySink();
    case 'none':
      return new NoopSink();
  }
}

export function exporterSettingsFromConfig(config: Config): ExporterSettings {
  return {
    batchSize: config.export.batchSize,
    flushIntervalMs: config.export.intervalMs,
    maxQueueSize: config.export.queueSize,
    exportTimeoutMs: config.export.timeoutMs,
    dropPolicy: config.export.dropPolicy,
  };
}

// =============================================================================
// TelemetryManager
// =============================================================================

/**
 * Owns the exporter and recorder for the life of the server.
 *
 * @example
 * ```typescript
 * const config = getConfig();
 * const telemetry = TelemetryManager.fromConfig(config, { logger });
 * telemetry.start();
 *
 * const recorder = telemetry.getRecorder();
 * // ... serve requests
 *
 * await telemetry.shutdown(config.shutdownTimeoutMs);
 * ```
 */
export class TelemetryManager {
  private readonly serviceName: string;
  private readonly sink: SpanSink;
  private readonly exporter: BatchSpanExporter;
  private readonly recorder: SpanRecorder;
  private readonly logger: StructuredLogger;
  private contextManager: AsyncLocalStorageContextManager | null = null;
  private started = false;

  constructor(options: TelemetryOptions) {
    this.serviceName = options.serviceName;
    this.sink = options.sink;
    this.logger = options.logger ?? createSilentLogger();
    this.exporter = new BatchSpanExporter({
      ...options.exporter,
      sink: options.sink,
      logger: this.logger.child('exporter'),
    });
    this.recorder = new SpanRecorder({
      submitter: this.exporter,
      serviceName: options.serviceName,
      ...(options.clock !== undefined ? { clock: options.clock } : {}),
    });
  }

  static fromConfig(config: Config, options: SinkFactoryOptions = {}): TelemetryManager {
    const logger = options.logger ?? createSilentLogger();
    const telemetryOptions: TelemetryOptions = {
      serviceName: config.serviceName,
      sink: createSinkFromConfig(config, { ...options, logger: logger.child('spans') }),
      exporter: exporterSettingsFromConfig(config),
      logger,
    };
    return new TelemetryManager(telemetryOptions);
  }

  /**
   * Install the async-hooks context manager unless one is already
   * registered. Idempotent.
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    const manager = new AsyncLocalStorageContextManager().enable();
    if (context.setGlobalContextManager(manager)) {
      this.contextManager = manager;
    } else {
      manager.disable();
      this.logger.debug('Context manager already registered, keeping it');
    }

    this.logger.info('Telemetry started', { serviceName: this.serviceName, sink: this.sink.name });
  }

  /**
   * Flush and stop the exporter (bounded by `timeoutMs`), then release the
   * context manager if this instance installed it.
   */
  async shutdown(timeoutMs?: number): Promise<void> {
    await this.exporter.shutdown(timeoutMs);
    if (this.contextManager !== null) {
      context.disable();
      this.contextManager = null;
    }
    this.logger.info('Telemetry stopped', { ...this.exporter.stats() });
  }

  getRecorder(): SpanRecorder {
    return this.recorder;
  }

  getExporter(): BatchSpanExporter {
    return this.exporter;
  }

  getSink(): SpanSink {
    return this.sink;
  }

  getServiceName(): string {
    return this.serviceName;
  }

  stats(): ExporterStats {
    return this.exporter.stats();
  }

  isStarted(): boolean {
    return this.started;
  }
}
