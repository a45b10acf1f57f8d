/**
 * Span sinks: the backend-specific end of the exporter.
 *
 * The exporter only relies on "export batch, get success or failure";
 * everything about the wire format lives here.
 */

import { type ExportResult as SdkExportResult, ExportResultCode } from '@opentelemetry/core';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import type { FinishedSpan } from './span-recorder.js';
import { ReadableSpanAdapter, type ReadableSpanAdapterOptions } from './otlp.js';
import { type StructuredLogger, createSilentLogger } from './logger.js';

// =============================================================================
// Contract
// =============================================================================

export type ExportResult = { success: true } | { success: false; error: Error };

export interface SpanSink {
  /** Short name used in logs */
  readonly name: string;
  /**
   * Transmit one batch. `signal` aborts when the exporter gives up on the
   * call (timeout or shutdown).
   */
  export(batch: ReadonlyArray<FinishedSpan>, signal: AbortSignal): Promise<ExportResult>;
  shutdown?(): Promise<void>;
}

// =============================================================================
// OTLP over HTTP (collector or SaaS endpoint)
// =============================================================================

export interface OtlpHttpSinkOptions extends ReadableSpanAdapterOptions {
  /** Full traces URL, e.g. http://localhost:4318/v1/traces */
  url: string;
  headers?: Record<string, string>;
  /** Per-request deadline of the underlying OTLP exporter (default: 10000) */
  timeoutMs?: number;
  /** Name reported in logs (default: 'otlp') */
  name?: string;
}

export const DEFAULT_OTLP_TIMEOUT_MS = 10000;

/**
 * Ships batches through the OpenTelemetry OTLP/HTTP JSON exporter.
 */
export class OtlpHttpSink implements SpanSink {
  readonly name: string;
  private readonly url: string;
  private readonly exporter: OTLPTraceExporter;
  private readonly adapter: ReadableSpanAdapter;

  constructor(options: OtlpHttpSinkOptions) {
    this.name = options.name ?? 'otlp';
    this.url = options.url;
    this.exporter = new OTLPTraceExporter({
      url: options.url,
      headers: options.headers ?? {},
      timeoutMillis: options.timeoutMs ?? DEFAULT_OTLP_TIMEOUT_MS,
    });
    this.adapter = new ReadableSpanAdapter({
      ...(options.scopeName !== undefined ? { scopeName: options.scopeName } : {}),
      ...(options.serviceVersion !== undefined ? { serviceVersion: options.serviceVersion } : {}),
    });
  }

  getUrl(): string {
    return this.url;
  }

  export(batch: ReadonlyArray<FinishedSpan>, signal: AbortSignal): Promise<ExportResult> {
    if (signal.aborted) {
      return Promise.resolve({ success: false, error: new Error(`Export to ${this.name} was aborted`) });
    }
    const spans = batch.map((span) => this.adapter.toReadableSpan(span));

    // The first of abort and the exporter's callback settles the promise
    return new Promise((resolve) => {
      const onAbort = (): void => {
        resolve({ success: false, error: new Error(`Export to ${this.name} was aborted`) });
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.exporter.export(spans, (result) => {
        signal.removeEventListener('abort', onAbort);
        resolve(toExportResult(this.name, result));
      });
    });
  }

  async shutdown(): Promise<void> {
    await this.exporter.shutdown();
  }
}

function toExportResult(sinkName: string, result: SdkExportResult): ExportResult {
  if (result.code === ExportResultCode.SUCCESS) {
    return { success: true };
  }
  return { success: false, error: result.error ?? new Error(`Export to ${sinkName} failed`) };
}

/**
 * Build the traces URL from an OTLP base endpoint, unless it already names
 * the traces path.
 */
export function resolveOtlpTracesUrl(endpoint: string): string {
  const trimmed = endpoint.replace(/\/+$/, '');
  return trimmed.endsWith('/v1/traces') ? trimmed : `${trimmed}/v1/traces`;
}

/**
 * Values that are not valid percent-encoding are kept as written.
 */
function decodeHeaderValue(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/**
 * Parse OTEL_EXPORTER_OTLP_HEADERS style values: `k1=v1,k2=v2`.
 * Entries without '=' are skipped; values are URL-decoded.
 */
export function parseOtlpHeaders(value: string | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!value) {
    return headers;
  }
  for (const pair of value.split(',')) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      continue;
    }
    const key = pair.slice(0, index).trim();
    const raw = pair.slice(index + 1).trim();
    if (key === '') {
      continue;
    }
    headers[key] = decodeHeaderValue(raw);
  }
  return headers;
}

// =============================================================================
// Langfuse (OTLP ingestion with Basic auth)
// =============================================================================

export interface LangfuseSinkOptions extends ReadableSpanAdapterOptions {
  /** Base URL, e.g. https://cloud.langfuse.com */
  host: string;
  publicKey: string;
  secretKey: string;
  timeoutMs?: number;
}

export const LANGFUSE_OTEL_PATH = '/api/public/otel/v1/traces';

export function createLangfuseSink(options: LangfuseSinkOptions): OtlpHttpSink {
  const { host, publicKey, secretKey, ...rest } = options;
  const credentials = Buffer.from(`${publicKey}:${secretKey}`).toString('base64');
  return new OtlpHttpSink({
    ...rest,
    name: 'langfuse',
    url: `${host.replace(/\/+$/, '')}${LANGFUSE_OTEL_PATH}`,
    headers: { Authorization: `Basic ${credentials}` },
  });
}

// =============================================================================
// Local sinks
// =============================================================================

/**
 * Writes each span as a structured log entry.
 */
export class ConsoleSink implements SpanSink {
  readonly name = 'console';
  private readonly logger: StructuredLogger;

  constructor(logger?: StructuredLogger) {
    this.logger = logger ?? createSilentLogger();
  }

  async export(batch: ReadonlyArray<FinishedSpan>): Promise<ExportResult> {
    for (const span of batch) {
      this.logger.info('span', {
        name: span.name,
        traceId: span.traceId,
        spanId: span.spanId,
        parentSpanId: span.parentSpanId,
        service: span.serviceName,
        durationMs: span.durationMs,
        status: span.status,
        attributes: span.attributes,
      });
    }
    return { success: true };
  }
}

/**
 * Keeps every exported batch in memory.
 */
export class InMemorySink implements SpanSink {
  readonly name = 'memory';
  private readonly batches: Array<ReadonlyArray<FinishedSpan>> = [];

  async export(batch: ReadonlyArray<FinishedSpan>): Promise<ExportResult> {
    this.batches.push([...batch]);
    return { success: true };
  }

  getBatches(): ReadonlyArray<ReadonlyArray<FinishedSpan>> {
    return this.batches;
  }

  getSpans(): FinishedSpan[] {
    return this.batches.flat();
  }

  reset(): void {
    this.batches.length = 0;
  }
}

export class NoopSink implements SpanSink {
  readonly name = 'none';

  async export(): Promise<ExportResult> {
    return { success: true };
  }
}
