import { describe, expect, it, vi } from 'vitest';
import { EventBus, type EventRecord } from '../src/eventBus.js';
import logger from '../src/logger.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { EventPayload } from '../src/types.js';

const basePayload: EventPayload = {
  source: 'video:test',
  detector: 'scenes',
  severity: 'critical',
  message: 'Fall detected (confidence 0.900)'
};

function createBus(store: (event: EventRecord) => unknown = vi.fn()) {
  const metrics = new MetricsRegistry();
  const bus = new EventBus({ store, log: logger, metrics });
  return { bus, metrics };
}

describe('EventBus', () => {
  it('persists, counts and forwards events', () => {
    const store = vi.fn();
    const { bus, metrics } = createBus(store);
    const received: EventRecord[] = [];
    bus.on('event', (event: EventRecord) => received.push(event));

    expect(bus.emitEvent({ ...basePayload, ts: 1000, meta: { scenarioId: 'fall' } })).toBe(true);

    const expected: EventRecord = { ...basePayload, ts: 1000, meta: { scenarioId: 'fall' } };
    expect(store).toHaveBeenCalledWith(expected);
    expect(received).toEqual([expected]);
    expect(metrics.snapshot().events).toMatchObject({
      total: 1,
      byDetector: { scenes: 1 },
      bySeverity: { critical: 1 },
      storeFailures: 0
    });
  });

  it('normalizes timestamps', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T12:00:00Z'));
    try {
      const store = vi.fn();
      const { bus } = createBus(store);

      bus.emitEvent(basePayload);
      bus.emitEvent({ ...basePayload, ts: new Date('2024-05-01T00:00:00Z') });

      expect(store.mock.calls.map(([event]) => event.ts)).toEqual([
        Date.parse('2024-05-01T12:00:00Z'),
        Date.parse('2024-05-01T00:00:00Z')
      ]);
    } finally {
      vi.useRealTimers();
    }
  });

  it('keeps delivering when the store fails', () => {
    const { bus, metrics } = createBus(() => {
      throw new Error('disk full');
    });
    const errorSpy = vi.spyOn(logger, 'error');
    const received: EventRecord[] = [];
    bus.on('event', (event: EventRecord) => received.push(event));

    bus.emitEvent({ ...basePayload, ts: 5 });

    expect(received).toHaveLength(1);
    expect(metrics.snapshot().events).toMatchObject({ total: 1, storeFailures: 1, lastStoreError: 'disk full' });
    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({ detector: 'scenes' }),
      'Failed to persist event'
    );
    errorSpy.mockRestore();
  });
});
