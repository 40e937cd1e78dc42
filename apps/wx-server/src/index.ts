/**
 * Weather API Server
 * Serves METAR, TAF and airport data by ICAO location code
 */

import path from 'path';
import type { Server } from 'http';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';
import {
  ApiResponse,
  ErrorCodes,
  HealthCheck,
  RequestError,
  StorageEngine,
  ValidationError,
  createRedisStorage,
  errorMessage,
  generateTraceId
} from '@wx/shared';
import { loadConfig, ServerConfig } from './config';
import { dispatch, ENDPOINTS } from './services/requestDispatcher';
import { LocationAggregator } from './services/locationAggregator';
import { formatJson, toWireView } from './services/viewSerializer';

const ALLOWED_METHODS = 'GET, HEAD, OPTIONS';
const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';
const LEGACY_JSON_CONTENT_TYPE = 'application-json';
const ENDPOINT_ROUTE = new RegExp(`^/(${ENDPOINTS.join('|')})(/.*)?$`);

function traceIdOf(res: express.Response): string | undefined {
  const traceId = res.getHeader('X-Trace-Id');
  return typeof traceId === 'string' ? traceId : undefined;
}

function sendError(res: express.Response, status: number, code: ErrorCodes, message: string) {
  const body: ApiResponse = {
    success: false,
    error: { code, message },
    traceId: traceIdOf(res)
  };
  res.status(status).json(body);
}

export class WxServer {
  public app: express.Application;
  private aggregator: LocationAggregator;
  private server?: Server;
  private corsMiddleware: express.RequestHandler;
  private metrics: {
    requestsTotal: Counter<string>;
    requestDuration: Histogram<string>;
  };

  constructor(private config: ServerConfig, private storage: StorageEngine, private registry: Registry = new Registry()) {
    this.app = express();
    this.aggregator = new LocationAggregator(storage);
    this.corsMiddleware = cors({
      origin: '*',
      methods: ALLOWED_METHODS,
      allowedHeaders: '*'
    });
    this.metrics = {
      requestsTotal: new Counter({
        name: 'wx_requests_total',
        help: 'Total number of requests processed',
        labelNames: ['route', 'method', 'status'] as const,
        registers: [registry]
      }),
      requestDuration: new Histogram({
        name: 'wx_request_duration_seconds',
        help: 'Duration of requests in seconds',
        labelNames: ['route'] as const,
        buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1],
        registers: [registry]
      })
    };
    this.app.disable('x-powered-by');
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware() {
    // Request tracing and logging
    this.app.use((req, res, next) => {
      const header = req.headers['x-trace-id'];
      res.setHeader('X-Trace-Id', typeof header === 'string' && header ? header : generateTraceId());

      const started = process.hrtime.bigint();
      res.on('finish', () => {
        const seconds = Number(process.hrtime.bigint() - started) / 1e9;
        const route = this.routeLabel(req.path);
        this.metrics.requestsTotal.inc({ route, method: req.method, status: String(res.statusCode) });
        this.metrics.requestDuration.observe({ route }, seconds);
        console.log(`[WX-SERVER] ${req.method} ${req.originalUrl} ${res.statusCode} ${(seconds * 1000).toFixed(1)}ms`);
      });
      next();
    });

    this.app.use(
      helmet({
        // Pages and data are meant to be embedded and fetched from anywhere
        crossOriginResourcePolicy: { policy: 'cross-origin' }
      })
    );

    // Read-only surface
    this.app.use((req, res, next) => {
      switch (req.method) {
        case 'GET':
        case 'HEAD':
          next();
          return;
        case 'OPTIONS':
          this.handleOptions(req, res, next);
          return;
        default:
          res.setHeader('Allow', ALLOWED_METHODS);
          sendError(res, 405, ErrorCodes.METHOD_NOT_ALLOWED, `Method ${req.method} is not allowed`);
      }
    });

    if (this.config.enableCors) {
      this.app.use(this.corsMiddleware);
    }
  }

  private handleOptions(req: express.Request, res: express.Response, next: express.NextFunction) {
    const preflight =
      req.headers['access-control-request-method'] !== undefined ||
      req.headers['access-control-request-headers'] !== undefined ||
      req.headers.origin !== undefined;
    if (this.config.enableCors && preflight) {
      this.corsMiddleware(req, res, next);
      return;
    }
    res.setHeader('Allow', ALLOWED_METHODS);
    res.setHeader('Cache-Control', 'no-cache');
    res.status(204).end();
  }

  private setupRoutes() {
    this.app.get('/health', (req, res, next) => {
      this.healthCheck(res).catch(next);
    });

    this.app.get('/metrics', (req, res, next) => {
      this.registry
        .metrics()
        .then((metrics) => {
          res.set('Content-Type', this.registry.contentType);
          res.end(metrics);
        })
        .catch(next);
    });

    this.app.get(ENDPOINT_ROUTE, (req, res, next) => {
      this.handleEndpoint(req, res).catch(next);
    });

    this.app.get('/', (req, res, next) => this.sendPage(res, next, 'index.html'));
    // Non-strict routing also matches /help/
    this.app.get('/help', (req, res, next) => this.sendPage(res, next, 'help.html'));
  }

  private async handleEndpoint(req: express.Request, res: express.Response) {
    const queryStart = req.originalUrl.indexOf('?');
    const rawQuery = queryStart < 0 ? '' : req.originalUrl.slice(queryStart + 1);
    const request = dispatch(req.path, rawQuery, this.config.maxLocations);

    const body =
      request.kind === 'single'
        ? toWireView(await this.aggregator.single(request.endpoint, request.location))
        : (await this.aggregator.batch(request.endpoint, request.locations)).map(toWireView);

    const json = formatJson(body);
    res.status(200);
    res.setHeader('Content-Type', this.config.legacyContentType ? LEGACY_JSON_CONTENT_TYPE : JSON_CONTENT_TYPE);
    res.setHeader('Content-Length', Buffer.byteLength(json));
    res.end(json);
  }

  private sendPage(res: express.Response, next: express.NextFunction, file: string) {
    res.sendFile(path.join(this.config.staticDir, file), { headers: { 'Content-Type': 'text/html; charset=utf-8' } }, (err) => {
      if (err) {
        next(err);
      }
    });
  }

  private async healthCheck(res: express.Response) {
    const health: HealthCheck = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'wx-server',
      version: '1.0.0',
      checks: {}
    };

    if (await this.storage.ping()) {
      health.checks.cache = 'healthy';
    } else {
      health.checks.cache = 'unhealthy';
      health.status = 'unhealthy';
    }

    const body: ApiResponse<HealthCheck> = { success: true, data: health };
    res.json(body);
  }

  private routeLabel(requestPath: string): string {
    const [, first] = requestPath.split('/');
    return ENDPOINTS.some((endpoint) => endpoint === first) || first === 'health' || first === 'metrics' ? first : 'other';
  }

  private setupErrorHandling() {
    // Unknown paths
    this.app.use((req, res) => {
      sendError(res, 403, ErrorCodes.FORBIDDEN, `Unknown endpoint or path ${req.path}`);
    });

    this.app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      if (err instanceof ValidationError) {
        sendError(res, 422, ErrorCodes.VALIDATION_ERROR, err.message);
        return;
      }
      if (err instanceof RequestError) {
        sendError(res, err.status, err.code, err.message);
        return;
      }
      console.error(`[WX-SERVER] ${req.method} ${req.originalUrl} failed:`, errorMessage(err));
      sendError(res, 500, ErrorCodes.INTERNAL_ERROR, errorMessage(err));
    });
  }

  public get httpServer(): Server | undefined {
    return this.server;
  }

  public start(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        console.log(`🚀 Weather API listening on ${this.config.host}:${this.config.port}`);
        console.log(`📍 Health check: http://localhost:${this.config.port}/health`);
        resolve();
      });
      server.requestTimeout = this.config.requestTimeoutMs;
      server.headersTimeout = Math.min(server.headersTimeout, this.config.requestTimeoutMs);
      server.keepAliveTimeout = this.config.keepAliveTimeoutMs;
      this.server = server;
    });
  }

  public async stop() {
    const server = this.server;
    if (server) {
      const closed = new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      server.closeIdleConnections();
      const grace = setTimeout(() => {
        console.warn('[WX-SERVER] Shutdown grace period over, dropping open connections');
        server.closeAllConnections();
      }, this.config.shutdownGraceMs);
      try {
        await closed;
      } finally {
        clearTimeout(grace);
      }
      this.server = undefined;
    }
    await this.storage.close();
    console.log('[WX-SERVER] Stopped');
  }
}

async function main() {
  const config = loadConfig();
  const storage = await createRedisStorage(config.redis);
  const registry = new Registry();
  collectDefaultMetrics({ register: registry });

  const server = new WxServer(config, storage, registry);
  await server.start();

  const onSignal = (signal: string) => {
    console.log(`[WX-SERVER] ${signal} received, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('❌ Shutdown failed:', errorMessage(error));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('❌ Weather API failed to start', error);
    process.exit(1);
  });
}
