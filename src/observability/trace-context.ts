/**
 * W3C Trace Context codec
 *
 * Parses and serializes the `traceparent` / `tracestate` header pair.
 * Format: {version}-{trace-id}-{parent-id}-{trace-flags}
 * Example: 00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01
 *
 * Extraction never fails: anything that is not a valid version-00 header
 * yields a freshly generated root context.
 *
 * @see https://www.w3.org/TR/trace-context/
 */

import { randomBytes } from 'node:crypto';
import { TraceFlags, isValidSpanId, isValidTraceId } from '@opentelemetry/api';

// =============================================================================
// Constants
// =============================================================================

export const TRACEPARENT_HEADER = 'traceparent';
export const TRACESTATE_HEADER = 'tracestate';

const SUPPORTED_VERSION = '00';
const TRACEPARENT_PATTERN = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/;
const MAX_TRACESTATE_LENGTH = 512;
const MAX_TRACESTATE_MEMBERS = 32;

// =============================================================================
// Types
// =============================================================================

/**
 * Header map as received from a transport. Names are matched
 * case-insensitively; repeated headers may arrive as arrays.
 */
export type TraceCarrier = Record<string, string | string[] | undefined>;

interface TraceContextBase {
  /** 16 bytes as 32 lowercase hex chars, never all zero */
  readonly traceId: string;
  readonly traceFlags: number;
  /** Opaque vendor state, forwarded untouched */
  readonly traceState?: string;
}

/**
 * A trace with no span behind it yet. Spans started under a root context
 * begin the trace and have no parent.
 */
export interface RootTraceContext extends TraceContextBase {
  readonly kind: 'root';
}

/**
 * Position of a span recorded by another process, as read from a carrier.
 */
export interface RemoteTraceContext extends TraceContextBase {
  readonly kind: 'remote';
  readonly spanId: string;
}

/**
 * Position of a span recorded by this process.
 */
export interface LocalTraceContext extends TraceContextBase {
  readonly kind: 'local';
  readonly spanId: string;
  /** Span id of the context this one derived from; absent for trace roots */
  readonly parentSpanId?: string;
}

export type TraceContext = RootTraceContext | RemoteTraceContext | LocalTraceContext;

export interface ParsedTraceparent {
  traceId: string;
  spanId: string;
  traceFlags: number;
}

// =============================================================================
// ID Generation
// =============================================================================

function randomHex(bytes: number): string {
  return randomBytes(bytes).toString('hex');
}

/**
 * Generate a random trace ID (16 bytes / 32 hex chars).
 */
export function generateTraceId(): string {
  let id = randomHex(16);
  while (!isValidTraceId(id)) {
    id = randomHex(16);
  }
  return id;
}

/**
 * Generate a random span ID (8 bytes / 16 hex chars).
 */
export function generateSpanId(): string {
  let id = randomHex(8);
  while (!isValidSpanId(id)) {
    id = randomHex(8);
  }
  return id;
}

// =============================================================================
// Context Construction
// =============================================================================

export function createRootContext(options: { sampled?: boolean; traceState?: string } = {}): RootTraceContext {
  const ctx: RootTraceContext = {
    kind: 'root',
    traceId: generateTraceId(),
    traceFlags: options.sampled === false ? TraceFlags.NONE : TraceFlags.SAMPLED,
    ...(options.traceState !== undefined ? { traceState: options.traceState } : {}),
  };
  return Object.freeze(ctx);
}

export function isSampled(ctx: TraceContext): boolean {
  return (ctx.traceFlags & TraceFlags.SAMPLED) === TraceFlags.SAMPLED;
}

/**
 * Span id a new child should record as its parent, if any.
 */
export function parentSpanIdOf(ctx: TraceContext): string | undefined {
  return ctx.kind === 'root' ? undefined : ctx.spanId;
}

// =============================================================================
// traceparent / tracestate
// =============================================================================

/**
 * Parse a traceparent value. Returns null for anything but a well-formed
 * version-00 header with non-zero ids.
 */
export function parseTraceparent(value: string): ParsedTraceparent | null {
  const match = TRACEPARENT_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, version, traceId, spanId, flags] = match;
  if (version !== SUPPORTED_VERSION || !traceId || !spanId || !flags) {
    return null;
  }
  if (!isValidTraceId(traceId) || !isValidSpanId(spanId)) {
    return null;
  }

  return { traceId, spanId, traceFlags: parseInt(flags, 16) };
}

export function formatTraceparent(traceId: string, spanId: string, traceFlags: number): string {
  const flags = (traceFlags & 0xff).toString(16).padStart(2, '0');
  return `${SUPPORTED_VERSION}-${traceId}-${spanId}-${flags}`;
}

/**
 * Returns the tracestate to carry forward, or undefined when it is empty or
 * over the W3C limits.
 */
function normalizeTraceState(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (trimmed === '' || trimmed.length > MAX_TRACESTATE_LENGTH) {
    return undefined;
  }
  const members = trimmed.split(',').filter((member) => member.trim() !== '');
  if (members.length === 0 || members.length > MAX_TRACESTATE_MEMBERS) {
    return undefined;
  }
  return trimmed;
}

function readHeader(carrier: TraceCarrier, name: string): string | undefined {
  for (const [key, value] of Object.entries(carrier)) {
    if (key.toLowerCase() !== name) {
      continue;
    }
    if (Array.isArray(value)) {
      // Repeated tracestate headers are one list; repeated traceparent is ambiguous
      if (name === TRACESTATE_HEADER) {
        return value.join(',');
      }
      return value.length === 1 ? value[0] : undefined;
    }
    return value;
  }
  return undefined;
}

// =============================================================================
// Codec
// =============================================================================

/**
 * Extract a trace context from a carrier.
 *
 * A missing, malformed, all-zero or unsupported-version traceparent yields a
 * new root context rather than an error.
 */
export function extract(carrier: TraceCarrier): TraceContext {
  const traceparent = readHeader(carrier, TRACEPARENT_HEADER);
  const parsed = traceparent !== undefined ? parseTraceparent(traceparent) : null;
  if (!parsed) {
    return createRootContext();
  }

  const traceState = normalizeTraceState(readHeader(carrier, TRACESTATE_HEADER));
  const ctx: RemoteTraceContext = {
    kind: 'remote',
    traceId: parsed.traceId,
    spanId: parsed.spanId,
    traceFlags: parsed.traceFlags,
    ...(traceState !== undefined ? { traceState } : {}),
  };
  return Object.freeze(ctx);
}

/**
 * Serialize a trace context for an outgoing call. Root contexts have no
 * span to point at and produce an empty carrier.
 */
export function inject(ctx: TraceContext): Record<string, string> {
  if (ctx.kind === 'root') {
    return {};
  }

  const carrier: Record<string, string> = {
    [TRACEPARENT_HEADER]: formatTraceparent(ctx.traceId, ctx.spanId, ctx.traceFlags),
  };
  if (ctx.traceState !== undefined) {
    carrier[TRACESTATE_HEADER] = ctx.traceState;
  }
  return carrier;
}
