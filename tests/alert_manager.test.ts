import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { AlertManager, severityForLevel } from '../src/alerts/alertManager.js';
import type { Detection, DetectionResult } from '../src/detection/types.js';
import { EventBus, type EventRecord } from '../src/eventBus.js';
import logger from '../src/logger.js';
import { MetricsRegistry } from '../src/metrics/index.js';

function detection(overrides: Partial<Detection> = {}): Detection {
  return {
    detected: true,
    scenarioId: 'fall',
    scenarioName: 'Fall',
    confidence: 0.8176,
    alertLevel: 'high',
    allScores: { fall: 0.8176, fire: 0.1824 },
    ...overrides
  };
}

function createBus() {
  const store = vi.fn();
  const bus = new EventBus({ store, log: logger, metrics: new MetricsRegistry() });
  const events: EventRecord[] = [];
  bus.on('event', (event: EventRecord) => events.push(event));
  return { bus, store, events };
}

describe('AlertManager', () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('maps alert levels to event severities', () => {
    expect(severityForLevel('high')).toBe('critical');
    expect(severityForLevel('medium')).toBe('warning');
    expect(severityForLevel('low')).toBe('info');
  });

  it('turns a detection into an event', () => {
    const { bus, store, events } = createBus();
    const alerts = new AlertManager({ bus, source: 'video:lobby' });

    const record = alerts.handle(detection(), undefined, 1_700_000_000_000);

    expect(record).toEqual({
      ts: 1_700_000_000_000,
      scenarioId: 'fall',
      scenarioName: 'Fall',
      confidence: 0.8176,
      alertLevel: 'high',
      severity: 'critical',
      snapshot: null
    });
    expect(events).toEqual([
      {
        ts: 1_700_000_000_000,
        source: 'video:lobby',
        detector: 'scenes',
        severity: 'critical',
        message: 'Fall detected (confidence 0.818)',
        meta: {
          scenarioId: 'fall',
          scenarioName: 'Fall',
          confidence: 0.8176,
          alertLevel: 'high',
          allScores: { fall: 0.8176, fire: 0.1824 }
        }
      }
    ]);
    expect(store).toHaveBeenCalledTimes(1);
  });

  it('ignores negative results and ignored names', () => {
    const { bus, events } = createBus();
    const alerts = new AlertManager({ bus });
    const negative: DetectionResult = { detected: false, allScores: {} };

    expect(alerts.handle(negative)).toBeNull();
    expect(alerts.handle(detection({ scenarioId: 'normal', scenarioName: 'NORMAL' }))).toBeNull();
    expect(events).toEqual([]);
    expect(alerts.isIgnored('Normal')).toBe(true);
  });

  it('saves the frame when snapshots are enabled', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scenewatch-alerts-'));
    tempDirs.push(dir);
    const { bus, events } = createBus();
    const alerts = new AlertManager({ bus, saveFrames: true, snapshotDir: dir });
    const frame = Buffer.from('png-bytes');

    const record = alerts.handle(detection(), frame, 42);

    const expectedPath = path.join(dir, 'fall_42.png');
    expect(record?.snapshot).toBe(expectedPath);
    expect(fs.readFileSync(expectedPath)).toEqual(frame);
    expect(events[0].meta?.snapshot).toBe(expectedPath);
  });

  it('keeps alerting when the snapshot cannot be written', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scenewatch-alerts-'));
    tempDirs.push(dir);
    const blocker = path.join(dir, 'not-a-dir');
    fs.writeFileSync(blocker, '');
    const { bus, events } = createBus();
    const alerts = new AlertManager({ bus, saveFrames: true, snapshotDir: blocker });

    const record = alerts.handle(detection(), Buffer.from('x'), 7);

    expect(record?.snapshot).toBeNull();
    expect(events).toHaveLength(1);
    expect(events[0].meta).not.toHaveProperty('snapshot');
  });

  it('tracks a bounded history and statistics', () => {
    const { bus } = createBus();
    const alerts = new AlertManager({ bus, historyLimit: 2 });

    alerts.handle(detection(), undefined, 1);
    alerts.handle(detection({ scenarioId: 'fire', scenarioName: 'Fire' }), undefined, 2);
    alerts.handle(detection(), undefined, 3);

    expect(alerts.getHistory().map(record => record.ts)).toEqual([2, 3]);
    expect(alerts.getHistory(1).map(record => record.ts)).toEqual([3]);
    expect(alerts.getStatistics()).toEqual({
      total: 3,
      byScenario: { fall: 2, fire: 1 },
      firstAlertAt: 1,
      lastAlertAt: 3
    });

    alerts.clear();
    expect(alerts.getStatistics()).toEqual({ total: 0, byScenario: {}, firstAlertAt: null, lastAlertAt: null });
  });
});
