/**
 * HTTP transport
 *
 * - POST <path> carries one JSON-RPC message per request
 * - Request headers are handed to the dispatcher as the trace carrier
 * - Permissive CORS, OPTIONS preflight answered with 204
 * - GET /health reports uptime and exporter counters
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { type AddressInfo } from 'node:net';
import { createServer, type Server } from 'node:http';
import { randomUUID } from 'node:crypto';
import type { DispatchOutcome } from '../message-router.js';
import type { TraceCarrier } from '../observability/trace-context.js';
import { TRACEPARENT_HEADER, TRACESTATE_HEADER } from '../observability/trace-context.js';
import { type StructuredLogger, createSilentLogger } from '../observability/logger.js';
import { InvalidRequestError, toErrorResponse } from '../protocol/errors.js';
import { createParseErrorResponse } from '../protocol/jsonrpc.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_RPC_PATH = '/weather';
export const HEALTH_PATH = '/health';
const DEFAULT_BODY_LIMIT = '1mb';

// =============================================================================
// Types
// =============================================================================

export interface HttpTransportOptions {
  /**
   * Port to listen on; 0 picks a free port (see getPort())
   */
  port: number;

  /**
   * Host to bind to. Default: '0.0.0.0'
   */
  host?: string;

  /**
   * JSON-RPC endpoint path. Default: '/weather'
   */
  path?: string;

  /**
   * Existing Express app to use. If not provided, creates a new one.
   */
  app?: Express;

  logger?: StructuredLogger;

  /**
   * Extra fields for GET /health (exporter stats)
   */
  healthDetails?: () => Record<string, unknown>;

  /**
   * In-flight tracking; requests are refused with 503 once it reports
   * shutdown
   */
  requestTracker?: RequestTracker;

  /** Max JSON body size. Default: '1mb' */
  bodyLimit?: string;
}

export interface RequestTracker {
  trackRequest(requestId: string): void;
  completeRequest(requestId: string): void;
  isShuttingDown(): boolean;
}

/**
 * Processes one decoded body. `carrier` is the request's header map.
 */
export type HttpMessageHandler = (body: unknown, carrier: TraceCarrier) => Promise<DispatchOutcome>;

// =============================================================================
// HTTP Transport Error
// =============================================================================

export class HttpTransportError extends Error {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = 'HttpTransportError';
    this.statusCode = statusCode;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * body-parser tags its errors with a `type` such as 'entity.parse.failed'
 */
function bodyErrorType(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return undefined;
}

// =============================================================================
// HTTP Transport Class
// =============================================================================

export class HttpTransport {
  private readonly app: Express;
  private readonly port: number;
  private readonly host: string;
  private readonly path: string;
  private readonly logger: StructuredLogger;
  private readonly healthDetails: (() => Record<string, unknown>) | undefined;
  private readonly requestTracker: RequestTracker | undefined;
  private readonly bodyLimit: string;
  private readonly startedAt = Date.now();
  private server: Server | null = null;
  private messageHandler: HttpMessageHandler | null = null;

  constructor(options: HttpTransportOptions) {
    this.port = options.port;
    this.host = options.host ?? '0.0.0.0';
    this.path = options.path ?? DEFAULT_RPC_PATH;
    this.logger = options.logger ?? createSilentLogger();
    this.healthDetails = options.healthDetails;
    this.requestTracker = options.requestTracker;
    this.bodyLimit = options.bodyLimit ?? DEFAULT_BODY_LIMIT;

    this.app = options.app ?? express();

    this.setupRoutes();
  }

  /**
   * Set the handler for processing incoming JSON-RPC messages
   */
  setMessageHandler(handler: HttpMessageHandler): void {
    this.messageHandler = handler;
  }

  getApp(): Express {
    return this.app;
  }

  getPath(): string {
    return this.path;
  }

  /**
   * Bound port, once listening
   */
  getPort(): number | null {
    const address = this.server?.address();
    if (typeof address === 'object' && address !== null) {
      const info: AddressInfo = address;
      return info.port;
    }
    return null;
  }

  /**
   * Start the HTTP server
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new HttpTransportError('Server already started', 500);
    }

    const server = createServer(this.app);
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException): void => {
        this.server = null;
        reject(new HttpTransportError(`Failed to start server: ${err.message}`, 500));
      };
      server.once('error', onError);
      server.listen(this.port, this.host, () => {
        server.removeListener('error', onError);
        resolve();
      });
    });

    this.logger.info('HTTP transport listening', {
      host: this.host,
      port: this.getPort(),
      path: this.path,
    });
  }

  /**
   * Stop accepting connections and wait for open requests to finish
   */
  async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(new HttpTransportError(`Failed to close server: ${err.message}`, 500));
        } else {
          resolve();
        }
      });
      // Keep-alive sockets with no request in progress would hold close() open
      server.closeIdleConnections();
    });
    this.server = null;
    this.logger.info('HTTP transport closed');
  }

  // ===========================================================================
  // Routes
  // ===========================================================================

  private setupRoutes(): void {
    this.app.use(this.corsMiddleware.bind(this));

    this.app.options('*', this.handleOptions.bind(this));

    this.app.get(HEALTH_PATH, this.handleHealth.bind(this));

    this.app.post(
      this.path,
      this.requireJson.bind(this),
      // strict: false lets scalar bodies through so they get -32600, not -32700
      express.json({ limit: this.bodyLimit, strict: false }),
      this.handlePost.bind(this)
    );

    this.app.use(this.handleBodyError.bind(this));
  }

  /**
   * Allow any origin
   */
  private corsMiddleware(req: Request, res: Response, next: NextFunction): void {
    const origin = req.get('Origin');
    res.setHeader('Access-Control-Allow-Origin', origin ?? '*');
    if (origin) {
      res.setHeader('Vary', 'Origin');
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader(
      'Access-Control-Allow-Headers',
      ['Content-Type', 'Accept', 'Authorization', TRACEPARENT_HEADER, TRACESTATE_HEADER, 'mcp-protocol-version'].join(
        ', '
      )
    );
    next();
  }

  private handleOptions(_req: Request, res: Response): void {
    res.status(204).end();
  }

  private handleHealth(_req: Request, res: Response): void {
    const shuttingDown = this.requestTracker?.isShuttingDown() ?? false;
    res.status(shuttingDown ? 503 : 200).json({
      status: shuttingDown ? 'shutting_down' : 'ok',
      uptime: Math.floor((Date.now() - this.startedAt) / 1000),
      ...(this.healthDetails ? this.healthDetails() : {}),
    });
  }

  private requireJson(req: Request, res: Response, next: NextFunction): void {
    const contentType = req.get('Content-Type');
    if (!contentType?.toLowerCase().includes('application/json')) {
      res.status(415).json({ error: 'Content-Type must be application/json' });
      return;
    }
    next();
  }

  /**
   * Body parser failures: invalid JSON becomes a JSON-RPC parse error.
   */
  private handleBodyError(err: unknown, _req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
      next(err);
      return;
    }

    const type = bodyErrorType(err);
    if (type === 'entity.parse.failed') {
      res.status(400).json(createParseErrorResponse(err instanceof Error ? err.message : undefined));
      return;
    }
    if (type === 'entity.too.large') {
      res.status(413).json(toErrorResponse(new InvalidRequestError('Request body too large'), null));
      return;
    }

    this.logger.error('Unhandled HTTP error', { error: err });
    res.status(500).json({ error: 'Internal server error' });
  }

  private async handlePost(req: Request, res: Response): Promise<void> {
    if (this.requestTracker?.isShuttingDown()) {
      res.status(503).json({ error: 'Server is shutting down' });
      return;
    }
    if (!this.messageHandler) {
      res.status(500).json({ error: 'No message handler configured' });
      return;
    }

    // 'close' before the response finished means the client went away
    let clientGone = false;
    res.on('close', () => {
      if (!res.writableFinished) {
        clientGone = true;
      }
    });

    const requestId = randomUUID();
    this.requestTracker?.trackRequest(requestId);
    try {
      const outcome = await this.messageHandler(req.body, req.headers);

      if (clientGone) {
        this.logger.debug('Client disconnected before the response was ready', { requestId });
        return;
      }

      switch (outcome.type) {
        case 'accepted':
          res.status(202).end();
          return;
        case 'rejected':
          res.status(400).json(outcome.response);
          return;
        case 'response':
          res.status(200).json(outcome.response);
          return;
      }
    } catch (error) {
      this.logger.error('Message handler failed', { error });
      if (!clientGone && !res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    } finally {
      this.requestTracker?.completeRequest(requestId);
    }
  }
}
