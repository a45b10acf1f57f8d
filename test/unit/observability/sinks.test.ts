import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import { StructuredLogger } from '../../../src/observability/logger.js';
import {
  ConsoleSink,
  InMemorySink,
  LANGFUSE_OTEL_PATH,
  NoopSink,
  OtlpHttpSink,
  createLangfuseSink,
  parseOtlpHeaders,
  resolveOtlpTracesUrl,
} from '../../../src/observability/sinks.js';
import type { FinishedSpan } from '../../../src/observability/span-recorder.js';
import { type TestCollector, startTestCollector } from '../../helpers/index.js';

const TRACE_ID = '4bf92f3577b34da6a3ce929d0e0e4736';

function makeSpan(name = 'get_weather', serviceName = 'weather-assistant'): FinishedSpan {
  return Object.freeze({
    traceId: TRACE_ID,
    spanId: '1111111111111111',
    name,
    kind: SpanKind.SERVER,
    traceFlags: 1,
    startTimeUnixNano: 1_000n,
    endTimeUnixNano: 3_000n,
    durationMs: 0.002,
    status: { code: SpanStatusCode.OK },
    attributes: {},
    serviceName,
  });
}

function openSignal(): AbortSignal {
  return new AbortController().signal;
}

describe('Span sinks', () => {
  // ===========================================================================
  // OTLP
  // ===========================================================================

  describe('OtlpHttpSink', () => {
    let collector: TestCollector;
    let sink: OtlpHttpSink | undefined;

    beforeEach(async () => {
      collector = await startTestCollector();
    });

    afterEach(async () => {
      await sink?.shutdown();
      sink = undefined;
      await collector.close();
    });

    it('should POST the OTLP JSON body with configured headers', async () => {
      sink = new OtlpHttpSink({ url: collector.tracesUrl, headers: { 'x-api-key': 'test-secret' } });

      const result = await sink.export([makeSpan()], openSignal());

      expect(result).toEqual({ success: true });
      expect(collector.requests).toHaveLength(1);
      const request = collector.requests[0];
      expect(request?.path).toBe('/v1/traces');
      expect(request?.headers['x-api-key']).toBe('test-secret');
      expect(request?.headers['content-type']).toMatch(/^application\/json/);
      expect(request?.body).toMatchObject({
        resourceSpans: [
          {
            resource: {
              attributes: expect.arrayContaining([{ key: 'service.name', value: { stringValue: 'weather-assistant' } }]),
            },
            scopeSpans: [
              {
                scope: { name: 'weather-trace-server' },
                spans: [{ traceId: TRACE_ID, spanId: '1111111111111111', name: 'get_weather', kind: 2 }],
              },
            ],
          },
        ],
      });
    });

    it('should group spans under one resource per service', async () => {
      sink = new OtlpHttpSink({ url: collector.tracesUrl });

      await sink.export([makeSpan('a'), makeSpan('b', 'weather-cli'), makeSpan('c')], openSignal());

      expect(collector.requests[0]?.body).toMatchObject({
        resourceSpans: [
          { scopeSpans: [{ spans: [{ name: 'a' }, { name: 'c' }] }] },
          { scopeSpans: [{ spans: [{ name: 'b' }] }] },
        ],
      });
    });

    it('should report a rejected export as failure', async () => {
      collector.respondWith(400);
      sink = new OtlpHttpSink({ url: collector.tracesUrl });

      const result = await sink.export([makeSpan()], openSignal());

      expect(result.success).toBe(false);
      expect(!result.success && result.error).toBeInstanceOf(Error);
      expect(collector.requests).toHaveLength(1);
    });

    it('should not send a batch whose signal already aborted', async () => {
      sink = new OtlpHttpSink({ url: collector.tracesUrl });
      const controller = new AbortController();
      controller.abort();

      const result = await sink.export([makeSpan()], controller.signal);

      expect(result.success).toBe(false);
      expect(!result.success && result.error.message).toBe('Export to otlp was aborted');
      expect(collector.requests).toEqual([]);
    });

    it('should refuse batches after shutdown', async () => {
      sink = new OtlpHttpSink({ url: collector.tracesUrl });
      await sink.shutdown();

      const result = await sink.export([makeSpan()], openSignal());
      expect(result.success).toBe(false);
      expect(collector.requests).toEqual([]);
    });

    it('should be named otlp by default and report its url', () => {
      sink = new OtlpHttpSink({ url: collector.tracesUrl });
      expect(sink.name).toBe('otlp');
      expect(sink.getUrl()).toBe(collector.tracesUrl);
      expect(new OtlpHttpSink({ url: collector.tracesUrl, name: 'collector' }).name).toBe('collector');
    });
  });

  describe('resolveOtlpTracesUrl', () => {
    it('should append the traces path to a base endpoint', () => {
      expect(resolveOtlpTracesUrl('http://localhost:4318')).toBe('http://localhost:4318/v1/traces');
      expect(resolveOtlpTracesUrl('http://localhost:4318/')).toBe('http://localhost:4318/v1/traces');
    });

    it('should leave a full traces URL alone', () => {
      expect(resolveOtlpTracesUrl('http://collector/v1/traces')).toBe('http://collector/v1/traces');
    });
  });

  describe('parseOtlpHeaders', () => {
    it('should parse comma separated pairs', () => {
      expect(parseOtlpHeaders('a=1, b = two ,c=x%20y')).toEqual({ a: '1', b: 'two', c: 'x y' });
    });

    it('should keep values containing =', () => {
      expect(parseOtlpHeaders('authorization=Basic dGVzdA==')).toEqual({ authorization: 'Basic dGVzdA==' });
    });

    it('should skip malformed entries', () => {
      expect(parseOtlpHeaders('novalue,=x,ok=1')).toEqual({ ok: '1' });
    });

    it('should keep invalid percent-encoding as written', () => {
      expect(parseOtlpHeaders('k=%zz')).toEqual({ k: '%zz' });
    });

    it('should return an empty map for undefined or empty input', () => {
      expect(parseOtlpHeaders(undefined)).toEqual({});
      expect(parseOtlpHeaders('')).toEqual({});
    });
  });

  // ===========================================================================
  // Langfuse
  // ===========================================================================

  describe('createLangfuseSink', () => {
    it('should target the Langfuse OTLP path with Basic auth', async () => {
      const collector = await startTestCollector();
      const sink = createLangfuseSink({
        host: `${collector.baseUrl}/`,
        publicKey: 'pk-test',
        secretKey: 'sk-test',
      });

      try {
        expect(sink.name).toBe('langfuse');
        expect(sink.getUrl()).toBe(`${collector.baseUrl}${LANGFUSE_OTEL_PATH}`);

        const result = await sink.export([makeSpan()], openSignal());

        expect(result).toEqual({ success: true });
        expect(collector.requests[0]?.path).toBe('/api/public/otel/v1/traces');
        expect(collector.requests[0]?.headers['authorization']).toBe(
          `Basic ${Buffer.from('pk-test:sk-test').toString('base64')}`
        );
      } finally {
        await sink.shutdown();
        await collector.close();
      }
    });
  });

  // ===========================================================================
  // Local sinks
  // ===========================================================================

  describe('InMemorySink', () => {
    it('should keep batches until reset', async () => {
      const sink = new InMemorySink();
      await sink.export([makeSpan('a'), makeSpan('b')]);
      await sink.export([makeSpan('c')]);

      expect(sink.getBatches()).toHaveLength(2);
      expect(sink.getSpans().map((span) => span.name)).toEqual(['a', 'b', 'c']);

      sink.reset();
      expect(sink.getSpans()).toEqual([]);
    });
  });

  describe('ConsoleSink', () => {
    it('should log one entry per span', async () => {
      const lines: string[] = [];
      const sink = new ConsoleSink(new StructuredLogger({ name: 'spans', minLevel: 'info', output: (line) => lines.push(line) }));

      const result = await sink.export([makeSpan('a'), makeSpan('b')]);

      expect(result).toEqual({ success: true });
      expect(lines).toHaveLength(2);
      const entry: unknown = JSON.parse(lines[0] ?? '{}');
      expect(entry).toMatchObject({
        level: 'info',
        logger: 'spans',
        message: 'span',
        data: { name: 'a', traceId: TRACE_ID, spanId: '1111111111111111', service: 'weather-assistant' },
      });
    });
  });

  describe('NoopSink', () => {
    it('should accept everything', async () => {
      const sink = new NoopSink();
      expect(sink.name).toBe('none');
      expect(await sink.export()).toEqual({ success: true });
    });
  });
});
