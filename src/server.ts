/**
 * Weather tool server with graceful shutdown
 *
 * Implements:
 * - Component wiring (config -> telemetry -> tools -> dispatcher -> HTTP)
 * - Signal handling (SIGTERM/SIGINT)
 * - Request tracking
 * - Graceful shutdown with timeout, flushing queued spans last
 */

import type { Config } from './config.js';
import { MessageRouter, type Middleware } from './message-router.js';
import { type StructuredLogger, createSilentLogger } from './observability/logger.js';
import type { SpanSink } from './observability/sinks.js';
import { TelemetryManager, exporterSettingsFromConfig } from './observability/telemetry.js';
import { DEFAULT_SERVER_DESCRIPTION, type ServerDescription } from './protocol/lifecycle.js';
import { ToolRegistry } from './tools/registry.js';
import { type WeatherSource, registerWeatherTools } from './tools/weather.js';
import { HttpTransport, type RequestTracker } from './transport/http.js';

// =============================================================================
// Types
// =============================================================================

export interface ShutdownManagerOptions {
  /** How long to wait for in-flight requests, in milliseconds */
  timeoutMs: number;

  /**
   * Call process.exit() when done: 0 on a clean run, 1 when a cleanup step
   * failed. Default: true. Set to false for testing.
   */
  exitProcess?: boolean;

  logger?: StructuredLogger;
}

export type CleanupStep = () => Promise<void>;

export interface ShutdownReport {
  reason: string;
  /** Whether every in-flight request finished before the timeout */
  drained: boolean;
  abandonedRequests: number;
  /** Names of cleanup steps that threw */
  failedSteps: string[];
  durationMs: number;
}

export interface WeatherToolServerOptions {
  config: Config;
  logger?: StructuredLogger;

  /** Replaces the sink named by config.traceSink */
  sink?: SpanSink;

  /** Where get_weather/get_forecast read from. Default: random readings */
  weatherSource?: WeatherSource;

  /** Extra dispatcher stages */
  middleware?: Middleware[];

  server?: ServerDescription;

  /**
   * Whether to call process.exit() after shutdown completes.
   * Default: true. Set to false for testing.
   */
  exitProcess?: boolean;

  /** Install SIGTERM/SIGINT handlers on start. Default: true */
  handleSignals?: boolean;
}

// =============================================================================
// ShutdownManager Class
// =============================================================================

/**
 * Stops the server in phases: refuse new requests, drain the ones in
 * flight, then run the registered cleanup steps in order. The drain is
 * event-driven; the last `completeRequest` releases it.
 *
 * @example
 * ```typescript
 * const shutdown = new ShutdownManager({ timeoutMs: 10000, logger });
 * shutdown.register('http', () => http.close());
 * shutdown.register('telemetry', () => telemetry.shutdown(10000));
 * shutdown.installSignalHandlers();
 * ```
 */
export class ShutdownManager implements RequestTracker {
  private readonly timeoutMs: number;
  private readonly exitProcess: boolean;
  private readonly logger: StructuredLogger;
  private readonly steps: Array<{ name: string; cleanup: CleanupStep }> = [];
  private readonly inFlight = new Set<string>();

  private shutdownPromise: Promise<ShutdownReport> | null = null;
  private releaseDrain: (() => void) | null = null;
  private signalHandlersInstalled = false;

  private readonly onSigterm = (): void => {
    void this.initiateShutdown('SIGTERM');
  };
  private readonly onSigint = (): void => {
    void this.initiateShutdown('SIGINT');
  };

  constructor(options: ShutdownManagerOptions) {
    this.timeoutMs = options.timeoutMs;
    this.exitProcess = options.exitProcess ?? true;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Add a cleanup step. Steps run in registration order.
   */
  register(name: string, cleanup: CleanupStep): void {
    if (this.shutdownPromise !== null) {
      throw new Error('Cannot register cleanup handlers during shutdown');
    }
    this.steps.push({ name, cleanup });
  }

  /** Ignored once shutdown has begun */
  trackRequest(requestId: string): void {
    if (this.shutdownPromise === null) {
      this.inFlight.add(requestId);
    }
  }

  completeRequest(requestId: string): void {
    this.inFlight.delete(requestId);
    if (this.inFlight.size === 0) {
      this.releaseDrain?.();
    }
  }

  getInFlightCount(): number {
    return this.inFlight.size;
  }

  isShuttingDown(): boolean {
    return this.shutdownPromise !== null;
  }

  installSignalHandlers(): void {
    if (this.signalHandlersInstalled) {
      return;
    }
    process.on('SIGTERM', this.onSigterm);
    process.on('SIGINT', this.onSigint);
    this.signalHandlersInstalled = true;
  }

  removeSignalHandlers(): void {
    if (!this.signalHandlersInstalled) {
      return;
    }
    process.removeListener('SIGTERM', this.onSigterm);
    process.removeListener('SIGINT', this.onSigint);
    this.signalHandlersInstalled = false;
  }

  /**
   * Run the shutdown once; later calls share the first call's result.
   */
  initiateShutdown(reason: string = 'manual'): Promise<ShutdownReport> {
    if (this.shutdownPromise === null) {
      this.shutdownPromise = this.run(reason).finally(() => {
        this.removeSignalHandlers();
      });
    }
    return this.shutdownPromise;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async run(reason: string): Promise<ShutdownReport> {
    const startedAt = Date.now();
    this.logger.notice('Shutting down', { reason, inFlight: this.inFlight.size });

    const drained = await this.drain();
    if (!drained) {
      this.logger.warning('Timed out waiting for in-flight requests', {
        pending: this.inFlight.size,
        timeoutMs: this.timeoutMs,
      });
    }

    const failedSteps: string[] = [];
    for (const { name, cleanup } of this.steps) {
      try {
        await cleanup();
      } catch (error) {
        failedSteps.push(name);
        this.logger.error('Cleanup failed', { component: name, error });
      }
    }

    const report: ShutdownReport = {
      reason,
      drained,
      abandonedRequests: this.inFlight.size,
      failedSteps,
      durationMs: Date.now() - startedAt,
    };
    this.logger.notice('Shutdown complete', report);

    // Keep-alive sockets can hold the event loop open after close()
    if (this.exitProcess) {
      process.exit(failedSteps.length === 0 ? 0 : 1);
    }
    return report;
  }

  /**
   * Resolves true when the last in-flight request completes, false when
   * the timeout expires first.
   */
  private drain(): Promise<boolean> {
    if (this.inFlight.size === 0) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.releaseDrain = null;
        resolve(false);
      }, this.timeoutMs);
      this.releaseDrain = () => {
        clearTimeout(timer);
        this.releaseDrain = null;
        resolve(true);
      };
    });
  }
}

// =============================================================================
// WeatherToolServer Class
// =============================================================================

/**
 * The assembled server: one telemetry manager, one tool registry with the
 * weather tools, one dispatcher and the HTTP transport.
 *
 * @example
 * ```typescript
 * const server = new WeatherToolServer({ config: getConfig(), logger });
 * await server.start();
 * // Serves until SIGTERM/SIGINT or stop()
 * ```
 */
export class WeatherToolServer {
  private readonly config: Config;
  private readonly logger: StructuredLogger;
  private readonly telemetry: TelemetryManager;
  private readonly registry: ToolRegistry;
  private readonly router: MessageRouter;
  private readonly http: HttpTransport;
  private readonly shutdownManager: ShutdownManager;
  private readonly handleSignals: boolean;
  private started = false;

  constructor(options: WeatherToolServerOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createSilentLogger();
    this.handleSignals = options.handleSignals ?? true;

    this.telemetry = options.sink
      ? new TelemetryManager({
          serviceName: this.config.serviceName,
          sink: options.sink,
          exporter: exporterSettingsFromConfig(this.config),
          logger: this.logger.child('telemetry'),
        })
      : TelemetryManager.fromConfig(this.config, { logger: this.logger.child('telemetry') });

    this.registry = new ToolRegistry({ toolTimeoutMs: this.config.toolTimeoutMs });
    registerWeatherTools(this.registry, {
      logger: this.logger.child('tools'),
      ...(options.weatherSource !== undefined ? { source: options.weatherSource } : {}),
    });

    this.router = new MessageRouter({
      registry: this.registry,
      recorder: this.telemetry.getRecorder(),
      logger: this.logger.child('router'),
      server: options.server ?? DEFAULT_SERVER_DESCRIPTION,
      ...(options.middleware !== undefined ? { middleware: options.middleware } : {}),
    });

    this.shutdownManager = new ShutdownManager({
      timeoutMs: this.config.shutdownTimeoutMs,
      exitProcess: options.exitProcess ?? true,
      logger: this.logger.child('shutdown'),
    });

    this.http = new HttpTransport({
      host: this.config.host,
      port: this.config.port,
      path: this.config.path,
      logger: this.logger.child('http'),
      requestTracker: this.shutdownManager,
      healthDetails: () => ({ exporter: this.telemetry.stats() }),
    });
    this.http.setMessageHandler((body, carrier) => this.router.handle(body, carrier));

    // HTTP closes first so no new span is recorded after the exporter stops
    this.shutdownManager.register('http', async () => {
      await this.http.close();
    });
    this.shutdownManager.register('telemetry', async () => {
      await this.telemetry.shutdown(this.config.shutdownTimeoutMs);
    });
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }

    this.telemetry.start();
    await this.http.start();

    if (this.handleSignals) {
      this.shutdownManager.installSignalHandlers();
    }
    this.started = true;

    this.logger.info('Weather tool server started', {
      url: `http://${this.config.host}:${this.http.getPort() ?? this.config.port}${this.config.path}`,
      traceSink: this.config.traceSink,
      serviceName: this.config.serviceName,
    });
  }

  /**
   * Stop accepting requests, wait for in-flight ones, then flush spans.
   */
  async stop(): Promise<ShutdownReport> {
    return this.shutdownManager.initiateShutdown('stop');
  }

  isStarted(): boolean {
    return this.started;
  }

  isAcceptingRequests(): boolean {
    return this.started && !this.shutdownManager.isShuttingDown();
  }

  getPort(): number | null {
    return this.http.getPort();
  }

  getTelemetry(): TelemetryManager {
    return this.telemetry;
  }

  getRegistry(): ToolRegistry {
    return this.registry;
  }

  getRouter(): MessageRouter {
    return this.router;
  }

  getHttpTransport(): HttpTransport {
    return this.http;
  }

  getShutdownManager(): ShutdownManager {
    return this.shutdownManager;
  }
}
