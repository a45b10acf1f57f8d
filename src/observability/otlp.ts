/**
 * Finished spans as the OpenTelemetry SDK sees them
 *
 * The OTLP exporter serializes `ReadableSpan`s; this adapter builds one per
 * finished span. Each service name maps to a single cached Resource, so
 * spans from the same service land in the same resourceSpans entry.
 */

import { type HrTime, type SpanContext, createTraceState } from '@opentelemetry/api';
import { type IResource, Resource } from '@opentelemetry/resources';
import type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import type { FinishedSpan } from './span-recorder.js';

// =============================================================================
// Types
// =============================================================================

export interface ReadableSpanAdapterOptions {
  /** Instrumentation scope name (default: weather-trace-server) */
  scopeName?: string;
  serviceVersion?: string;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_SCOPE_NAME = 'weather-trace-server';

const NANOS_PER_SECOND = 1_000_000_000n;

// =============================================================================
// Conversion
// =============================================================================

export function nanosToHrTime(nanos: bigint): HrTime {
  return [Number(nanos / NANOS_PER_SECOND), Number(nanos % NANOS_PER_SECOND)];
}

export class ReadableSpanAdapter {
  private readonly scope: { readonly name: string; readonly version?: string };
  private readonly serviceVersion: string | undefined;
  private readonly resources = new Map<string, IResource>();

  constructor(options: ReadableSpanAdapterOptions = {}) {
    this.scope = { name: options.scopeName ?? DEFAULT_SCOPE_NAME };
    this.serviceVersion = options.serviceVersion;
  }

  toReadableSpan(span: FinishedSpan): ReadableSpan {
    const spanContext: SpanContext = {
      traceId: span.traceId,
      spanId: span.spanId,
      traceFlags: span.traceFlags,
      isRemote: false,
      ...(span.traceState !== undefined ? { traceState: createTraceState(span.traceState) } : {}),
    };

    return {
      name: span.name,
      kind: span.kind,
      spanContext: () => spanContext,
      ...(span.parentSpanId !== undefined ? { parentSpanId: span.parentSpanId } : {}),
      startTime: nanosToHrTime(span.startTimeUnixNano),
      endTime: nanosToHrTime(span.endTimeUnixNano),
      duration: nanosToHrTime(span.endTimeUnixNano - span.startTimeUnixNano),
      status:
        span.status.message !== undefined
          ? { code: span.status.code, message: span.status.message }
          : { code: span.status.code },
      attributes: { ...span.attributes },
      links: [],
      events: [],
      ended: true,
      resource: this.resourceFor(span.serviceName),
      instrumentationLibrary: this.scope,
      droppedAttributesCount: 0,
      droppedEventsCount: 0,
      droppedLinksCount: 0,
    };
  }

  private resourceFor(serviceName: string): IResource {
    const cached = this.resources.get(serviceName);
    if (cached) {
      return cached;
    }
    const resource = new Resource({
      [ATTR_SERVICE_NAME]: serviceName,
      'telemetry.sdk.language': 'nodejs',
      ...(this.serviceVersion !== undefined ? { [ATTR_SERVICE_VERSION]: this.serviceVersion } : {}),
    });
    this.resources.set(serviceName, resource);
    return resource;
  }
}
