import http, { type IncomingMessage, type ServerResponse } from 'node:http';
import { URL } from 'node:url';
import type { EventEmitter } from 'node:events';
import defaultBus from '../eventBus.js';
import logger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { collectHealthChecks, getServiceState, summarizeHealth } from '../app.js';
import type { DetectionEngine } from '../detection/engine.js';
import type { ScenarioHotReloader, ScenarioSource } from '../detection/hotReload.js';
import type { EventRecordWithId, ListEventsOptions, PaginatedEvents } from '../db.js';
import { createDetectionRouter } from './routes/detection.js';
import { createEventsRouter } from './routes/events.js';
import { sendJson, sendText } from './respond.js';

export interface HttpServerOptions<TFrame> {
  engine: DetectionEngine<TFrame>;
  reloader: ScenarioHotReloader<TFrame>;
  scenarioSource: ScenarioSource;
  port?: number;
  host?: string;
  bus?: EventEmitter;
  metrics?: MetricsRegistry;
  listEvents?: (options: ListEventsOptions) => PaginatedEvents;
  getEvent?: (id: number) => EventRecordWithId | null;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer<TFrame>(options: HttpServerOptions<TFrame>): Promise<HttpServerRuntime> {
  const port = options.port ?? 8080;
  const host = options.host ?? '127.0.0.1';
  const metrics = options.metrics ?? defaultMetrics;

  const eventsRouter = createEventsRouter({
    bus: options.bus ?? defaultBus,
    list: options.listEvents,
    get: options.getEvent
  });
  const detectionRouter = createDetectionRouter({
    engine: options.engine,
    reloader: options.reloader,
    scenarioSource: options.scenarioSource
  });

  const handleOperational = (req: IncomingMessage, res: ServerResponse, url: URL): boolean => {
    if (req.method !== 'GET') {
      return false;
    }
    switch (url.pathname) {
      case '/api/metrics':
        sendJson(res, 200, metrics.snapshot());
        return true;
      case '/metrics':
        sendText(res, 200, metrics.exportPrometheus(), 'text/plain; version=0.0.4; charset=utf-8');
        return true;
      case '/health':
        respondHealth(res).catch(error => {
          logger.error({ err: error }, 'Health check failed');
          sendJson(res, 500, { error: 'Internal server error' });
        });
        return true;
      default:
        return false;
    }
  };

  const server = http.createServer((req, res) => {
    try {
      const url = new URL(req.url ?? '/', 'http://localhost');
      if (
        handleOperational(req, res, url) ||
        detectionRouter.handle(req, res, url) ||
        eventsRouter.handle(req, res, url)
      ) {
        return;
      }

      sendJson(res, 404, { error: 'Not found' });
    } catch (error) {
      logger.error({ err: error }, 'HTTP request failed');
      sendJson(res, 500, { error: 'Internal server error' });
    }
  });

  server.on('close', () => {
    eventsRouter.close();
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        eventsRouter.close();
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      })
  };
}

async function respondHealth(res: ServerResponse) {
  const service = getServiceState();
  const checks = await collectHealthChecks({ service });
  const status = summarizeHealth(service.status, checks);
  sendJson(res, status === 'ok' ? 200 : 503, { status, service, checks });
}

export default startHttpServer;
