import fs from 'node:fs';
import path from 'node:path';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { EventEmitter } from 'node:events';
import {
  getEventById,
  listEvents,
  type EventRecordWithId,
  type ListEventsOptions,
  type PaginatedEvents
} from '../../db.js';
import logger from '../../logger.js';
import type { EventRecord, EventSeverity } from '../../types.js';
import { sendJson, toNumber, type Handler } from '../respond.js';

export interface EventsRouterOptions {
  bus: EventEmitter;
  list?: (options: ListEventsOptions) => PaginatedEvents;
  get?: (id: number) => EventRecordWithId | null;
  heartbeatMs?: number;
}

type StreamFilters = Pick<ListEventsOptions, 'detector' | 'severity' | 'scenario'>;

type ClientState = {
  heartbeat: NodeJS.Timeout;
  filters: StreamFilters;
};

const SEVERITIES: readonly EventSeverity[] = ['info', 'warning', 'critical'];

export class EventsRouter {
  private readonly bus: EventEmitter;
  private readonly list: (options: ListEventsOptions) => PaginatedEvents;
  private readonly get: (id: number) => EventRecordWithId | null;
  private readonly clients = new Map<ServerResponse, ClientState>();
  private readonly handlers: Handler[];
  private readonly heartbeatMs: number;

  constructor(options: EventsRouterOptions) {
    this.bus = options.bus;
    this.list = options.list ?? listEvents;
    this.get = options.get ?? getEventById;
    this.heartbeatMs = options.heartbeatMs ?? 15000;
    this.handlers = [
      (req, res, url) => this.handleList(req, res, url),
      (req, res, url) => this.handleStream(req, res, url),
      (req, res, url) => this.handleSnapshot(req, res, url),
      (req, res, url) => this.handleGet(req, res, url)
    ];
    this.bus.on('event', this.handleBusEvent);
  }

  handle(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    return this.handlers.some(handler => handler(req, res, url));
  }

  close() {
    this.bus.off('event', this.handleBusEvent);
    for (const [client, state] of this.clients) {
      clearInterval(state.heartbeat);
      client.end();
    }
    this.clients.clear();
  }

  private readonly handleBusEvent = (event: EventRecord) => {
    const payload = JSON.stringify(event);
    for (const [client, state] of this.clients) {
      if (client.writableEnded) {
        this.dropClient(client, state);
        continue;
      }
      if (!matchesStreamFilters(event, state.filters)) {
        continue;
      }
      client.write(`data: ${payload}\n\n`);
    }
  };

  private handleList(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/events') {
      return false;
    }

    const options = parseListOptions(url);
    const result = this.list(options);
    sendJson(res, 200, {
      items: result.items.map(formatEventForClient),
      total: result.total,
      summary: summarizeEvents(result.items)
    });
    return true;
  }

  private handleGet(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    const match = /^\/api\/events\/(\d+)$/.exec(url.pathname);
    if (req.method !== 'GET' || !match) {
      return false;
    }

    const event = this.get(Number(match[1]));
    if (!event) {
      sendJson(res, 404, { error: 'Event not found' });
      return true;
    }
    sendJson(res, 200, { event: formatEventForClient(event) });
    return true;
  }

  private handleSnapshot(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    const match = /^\/api\/events\/(\d+)\/snapshot$/.exec(url.pathname);
    if (req.method !== 'GET' || !match) {
      return false;
    }

    const event = this.get(Number(match[1]));
    const snapshot = event ? extractSnapshotPath(event) : null;
    if (!snapshot || !fs.existsSync(snapshot)) {
      sendJson(res, 404, { error: 'Snapshot not found' });
      return true;
    }

    res.writeHead(200, { 'Content-Type': 'image/png' });
    const stream = fs.createReadStream(snapshot);
    stream.on('error', error => {
      logger.error({ err: error, snapshot }, 'Failed to read snapshot');
      res.end();
    });
    stream.pipe(res);
    return true;
  }

  private handleStream(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/events/stream') {
      return false;
    }

    const filters = extractStreamFilters(url);
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });
    res.write(': connected\n\n');

    const heartbeat = setInterval(() => {
      if (res.writableEnded) {
        this.dropClient(res, state);
        return;
      }
      res.write(': heartbeat\n\n');
    }, this.heartbeatMs);
    heartbeat.unref?.();

    const state: ClientState = { heartbeat, filters };
    this.clients.set(res, state);
    req.on('close', () => {
      this.dropClient(res, state);
    });
    return true;
  }

  private dropClient(client: ServerResponse, state: ClientState) {
    clearInterval(state.heartbeat);
    this.clients.delete(client);
  }
}

export function createEventsRouter(options: EventsRouterOptions) {
  return new EventsRouter(options);
}

function isSeverity(value: string | null): value is EventSeverity {
  return SEVERITIES.some(severity => severity === value);
}

function extractStreamFilters(url: URL): StreamFilters {
  const params = url.searchParams;
  const filters: StreamFilters = {};
  const detector = params.get('detector');
  const severity = params.get('severity');
  const scenario = params.get('scenario');
  if (detector) {
    filters.detector = detector;
  }
  if (isSeverity(severity)) {
    filters.severity = severity;
  }
  if (scenario) {
    filters.scenario = scenario;
  }
  return filters;
}

function parseListOptions(url: URL): ListEventsOptions {
  const params = url.searchParams;
  const options: ListEventsOptions = extractStreamFilters(url);

  const limit = toNumber(params.get('limit'));
  const offset = toNumber(params.get('offset'));
  const since = toNumber(params.get('since'));
  const until = toNumber(params.get('until'));
  const source = params.get('source');
  const search = params.get('search');

  if (typeof limit === 'number') {
    options.limit = limit;
  }
  if (typeof offset === 'number') {
    options.offset = offset;
  }
  if (typeof since === 'number') {
    options.since = since;
  }
  if (typeof until === 'number') {
    options.until = until;
  }
  if (source) {
    options.source = source;
  }
  if (search) {
    options.search = search;
  }
  return options;
}

function matchesStreamFilters(event: EventRecord, filters: StreamFilters): boolean {
  if (filters.detector && event.detector !== filters.detector) {
    return false;
  }
  if (filters.severity && event.severity !== filters.severity) {
    return false;
  }
  if (filters.scenario && event.meta?.scenarioId !== filters.scenario) {
    return false;
  }
  return true;
}

function extractSnapshotPath(event: EventRecordWithId): string | null {
  const snapshot = event.meta?.snapshot;
  return typeof snapshot === 'string' ? path.resolve(snapshot) : null;
}

function formatEventForClient(event: EventRecordWithId) {
  const meta = { ...event.meta };
  if (extractSnapshotPath(event)) {
    meta.snapshotUrl = `/api/events/${event.id}/snapshot`;
  }
  return { ...event, meta };
}

function summarizeEvents(events: EventRecordWithId[]) {
  const bySeverity: Record<string, number> = {};
  const byScenario: Record<string, number> = {};
  for (const event of events) {
    bySeverity[event.severity] = (bySeverity[event.severity] ?? 0) + 1;
    const scenarioId = event.meta?.scenarioId;
    if (typeof scenarioId === 'string') {
      byScenario[scenarioId] = (byScenario[scenarioId] ?? 0) + 1;
    }
  }
  return { bySeverity, byScenario };
}
