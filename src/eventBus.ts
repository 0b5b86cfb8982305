import { EventEmitter } from 'node:events';
import logger from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { storeEvent } from './db.js';
import type { EventPayload, EventRecord } from './types.js';

const EVENT_CHANNEL = 'event';

interface EventBusDependencies {
  store: (event: EventRecord) => unknown;
  log: typeof logger;
  metrics?: MetricsRegistry;
}

/**
 * Fan-out point for alert events. Every emitted event is persisted, counted and
 * logged; other listeners (HTTP streams, tests) subscribe to `event`.
 */
class EventBus extends EventEmitter {
  private readonly store: (event: EventRecord) => unknown;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: EventBusDependencies = { store: storeEvent, log: logger }) {
    super();
    this.store = dependencies.store;
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;

    this.on(EVENT_CHANNEL, (event: EventRecord) => {
      this.persist(event);
      this.metrics.recordEvent(event);
      this.log.info(
        {
          detector: event.detector,
          source: event.source,
          severity: event.severity,
          meta: event.meta
        },
        event.message
      );
    });
  }

  emitEvent(payload: EventPayload): boolean {
    const normalized: EventRecord = {
      ts: normalizeTimestamp(payload.ts),
      source: payload.source,
      detector: payload.detector,
      severity: payload.severity,
      message: payload.message,
      meta: payload.meta
    };
    return this.emit(EVENT_CHANNEL, normalized);
  }

  private persist(event: EventRecord) {
    try {
      this.store(event);
    } catch (error) {
      this.metrics.recordEventStoreFailure(error);
      this.log.error({ err: error, detector: event.detector }, 'Failed to persist event');
    }
  }
}

function normalizeTimestamp(ts?: number | Date): number {
  if (typeof ts === 'undefined') {
    return Date.now();
  }

  if (ts instanceof Date) {
    return ts.getTime();
  }

  return ts;
}

const eventBus = new EventBus();

export default eventBus;
export { EventBus };
export type { EventRecord };
