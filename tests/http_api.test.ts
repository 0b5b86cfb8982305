import { EventEmitter } from 'node:events';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { TextDecoder } from 'node:util';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { markServiceStatus, registerHealthIndicator, resetAppLifecycle } from '../src/app.js';
import { clearEvents, storeEvent } from '../src/db.js';
import { DetectionEngine } from '../src/detection/engine.js';
import { ScenarioHotReloader } from '../src/detection/hotReload.js';
import { ScenarioStore } from '../src/detection/scenarioStore.js';
import { EventBus } from '../src/eventBus.js';
import logger from '../src/logger.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { ScoreProvider } from '../src/models/scoreProvider.js';
import { startHttpServer, type HttpServerRuntime } from '../src/server/http.js';

class InMemoryConfigManager extends EventEmitter {
  watch() {
    return () => undefined;
  }
}

const provider: ScoreProvider<Buffer> = {
  predict: async (_frame, prompts) => ({
    rawScores: prompts.map(() => 0),
    probabilities: prompts.map(() => 1 / prompts.length)
  }),
  describe: () => ({ model: 'fake' })
};

const configuredScenarios = [
  { id: 'fall', name: 'Fall', prompt: 'a person on the floor', threshold: 0.5, alertLevel: 'high' },
  { id: 'fire', name: 'Fire', prompt: 'flames', threshold: 0.5, alertLevel: 'high' }
];

describe('HTTP API', () => {
  let runtime: HttpServerRuntime;
  let baseUrl: string;
  let store: ScenarioStore;
  let engine: DetectionEngine<Buffer>;
  let bus: EventBus;
  let metrics: MetricsRegistry;
  let scenarioSource: Mock<[], unknown>;
  let tempDir: string;

  beforeEach(async () => {
    clearEvents();
    resetAppLifecycle();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scenewatch-http-'));
    metrics = new MetricsRegistry();
    store = new ScenarioStore(configuredScenarios);
    engine = new DetectionEngine<Buffer>(store, provider, { metrics });
    const reloader = new ScenarioHotReloader<Buffer>(engine, new InMemoryConfigManager(), { metrics });
    bus = new EventBus({ store: vi.fn(), log: logger, metrics });
    scenarioSource = vi.fn<[], unknown>(() => configuredScenarios);
    runtime = await startHttpServer({ engine, reloader, scenarioSource, port: 0, bus, metrics });
    baseUrl = `http://127.0.0.1:${runtime.port}`;
  });

  afterEach(async () => {
    await runtime.close();
    resetAppLifecycle();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function post(pathname: string, body?: string) {
    return fetch(`${baseUrl}${pathname}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body
    });
  }

  it('lists scenarios with their runtime state', async () => {
    store.require('fall').observe(0.9);

    const response = await fetch(`${baseUrl}/api/scenarios`);
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      scenarios: [
        { id: 'fall', consecutiveCount: 1, phase: 'accumulating', history: [0.9] },
        { id: 'fire', consecutiveCount: 0, phase: 'idle', history: [] }
      ]
    });
  });

  it('returns one scenario or 404', async () => {
    const found = await fetch(`${baseUrl}/api/scenarios/fire`);
    expect(found.status).toBe(200);
    expect(await found.json()).toMatchObject({ scenario: { id: 'fire', name: 'Fire', phase: 'idle' } });

    const missing = await fetch(`${baseUrl}/api/scenarios/smoke`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: 'Unknown scenario "smoke"' });
  });

  it('rejects a malformed scenario id with 400', async () => {
    const read = await fetch(`${baseUrl}/api/scenarios/%E0`);
    expect(read.status).toBe(400);
    expect(await read.json()).toEqual({ error: 'Invalid scenario id' });

    const reset = await post('/api/scenarios/%E0/reset');
    expect(reset.status).toBe(400);
    expect(await reset.json()).toEqual({ error: 'Invalid scenario id' });
  });

  it('describes the detector', async () => {
    const response = await fetch(`${baseUrl}/api/detector`);
    expect(await response.json()).toEqual({
      detector: {
        enabled: true,
        temperature: 0.01,
        totalScenarios: 2,
        enabledScenarios: 2,
        busy: false,
        provider: { model: 'fake' }
      }
    });
  });

  it('reloads scenarios from the request body', async () => {
    const response = await post(
      '/api/scenarios/reload',
      JSON.stringify({ scenarios: [{ id: 'smoke', prompt: 'smoke', threshold: 0.4 }] })
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      report: { added: ['smoke'], removed: ['fall', 'fire'], updated: [], unchanged: [] }
    });
    expect(scenarioSource).not.toHaveBeenCalled();
    expect(store.list().map(scenario => scenario.id)).toEqual(['smoke']);
  });

  it('reloads scenarios from the configured source without a body', async () => {
    const response = await post('/api/scenarios/reload');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ report: { unchanged: ['fall', 'fire'] } });
    expect(scenarioSource).toHaveBeenCalledTimes(1);
  });

  it('rejects invalid reloads and keeps the current scenarios', async () => {
    const invalid = await post('/api/scenarios/reload', JSON.stringify({ scenarios: [] }));
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toEqual({ error: 'scenarios must define at least one scenario' });

    const malformed = await post('/api/scenarios/reload', '{ nope');
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ error: 'Request body is not valid JSON' });

    expect(store.list().map(scenario => scenario.id)).toEqual(['fall', 'fire']);
  });

  it('resets scenario state', async () => {
    store.require('fall').trigger(100);
    store.require('fire').observe(0.9);

    const one = await post('/api/scenarios/fall/reset');
    expect(one.status).toBe(200);
    expect(await one.json()).toMatchObject({ scenario: { id: 'fall', lastTriggerTime: null } });
    expect(store.require('fire').consecutiveCount).toBe(1);

    const all = await post('/api/scenarios/reset');
    expect(all.status).toBe(200);
    expect(store.require('fire').consecutiveCount).toBe(0);

    const missing = await post('/api/scenarios/smoke/reset');
    expect(missing.status).toBe(404);
  });

  it('lists stored events with a summary', async () => {
    const snapshot = path.join(tempDir, 'fall_1000.png');
    fs.writeFileSync(snapshot, 'png-bytes');
    const fallId = storeEvent({
      ts: 1000,
      source: 'video:test',
      detector: 'scenes',
      severity: 'critical',
      message: 'Fall detected (confidence 0.900)',
      meta: { scenarioId: 'fall', snapshot }
    });
    storeEvent({
      ts: 2000,
      source: 'video:test',
      detector: 'scenes',
      severity: 'warning',
      message: 'Intrusion detected (confidence 0.700)',
      meta: { scenarioId: 'intrusion' }
    });

    const response = await fetch(`${baseUrl}/api/events?limit=10`);
    expect(await response.json()).toMatchObject({
      total: 2,
      items: [{ ts: 2000 }, { ts: 1000, meta: { snapshotUrl: `/api/events/${fallId}/snapshot` } }],
      summary: {
        bySeverity: { critical: 1, warning: 1 },
        byScenario: { fall: 1, intrusion: 1 }
      }
    });

    const filtered = await fetch(`${baseUrl}/api/events?scenario=intrusion`);
    expect(await filtered.json()).toMatchObject({ total: 1 });

    const single = await fetch(`${baseUrl}/api/events/${fallId}`);
    expect(await single.json()).toMatchObject({ event: { id: fallId, message: 'Fall detected (confidence 0.900)' } });

    const image = await fetch(`${baseUrl}/api/events/${fallId}/snapshot`);
    expect(image.status).toBe(200);
    expect(image.headers.get('content-type')).toBe('image/png');
    expect(await image.text()).toBe('png-bytes');

    const missing = await fetch(`${baseUrl}/api/events/9999`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: 'Event not found' });
  });

  it('streams matching events', async () => {
    const controller = new AbortController();
    const response = await fetch(`${baseUrl}/api/events/stream?scenario=fire`, { signal: controller.signal });
    expect(response.headers.get('content-type')).toBe('text/event-stream');
    const reader = response.body?.getReader();
    if (!reader) {
      throw new Error('stream has no body');
    }
    const decoder = new TextDecoder();

    const first = await reader.read();
    expect(decoder.decode(first.value)).toBe(': connected\n\n');

    bus.emitEvent({ ts: 1, source: 'video:test', detector: 'scenes', severity: 'critical', message: 'fall', meta: { scenarioId: 'fall' } });
    bus.emitEvent({ ts: 2, source: 'video:test', detector: 'scenes', severity: 'critical', message: 'fire', meta: { scenarioId: 'fire' } });

    const next = await reader.read();
    const text = decoder.decode(next.value);
    expect(text.startsWith('data: ')).toBe(true);
    expect(JSON.parse(text.slice('data: '.length).trim())).toMatchObject({ ts: 2, message: 'fire' });

    controller.abort();
    await reader.cancel().catch(() => undefined);
  });

  it('serves metrics in JSON and Prometheus formats', async () => {
    metrics.recordScenarioTrigger('fall', 0.9);

    const json = await fetch(`${baseUrl}/api/metrics`);
    expect(await json.json()).toMatchObject({ scenarios: { triggers: { fall: 1 } } });

    const text = await fetch(`${baseUrl}/metrics`);
    expect(text.headers.get('content-type')).toBe('text/plain; version=0.0.4; charset=utf-8');
    expect((await text.text()).split('\n')).toContain('scenewatch_scenario_trigger_total{scenario="fall"} 1');
  });

  it('reports health from the service state and indicators', async () => {
    const starting = await fetch(`${baseUrl}/health`);
    expect(starting.status).toBe(503);
    expect(await starting.json()).toMatchObject({ status: 'starting' });

    markServiceStatus('ok');
    registerHealthIndicator('detector', () => ({ status: 'ok' }));
    const healthy = await fetch(`${baseUrl}/health`);
    expect(healthy.status).toBe(200);
    expect(await healthy.json()).toMatchObject({ status: 'ok', checks: [{ name: 'detector', status: 'ok' }] });

    registerHealthIndicator('camera', () => {
      throw new Error('no frames');
    });
    const degraded = await fetch(`${baseUrl}/health`);
    expect(degraded.status).toBe(503);
    expect(await degraded.json()).toMatchObject({
      status: 'degraded',
      checks: [
        { name: 'detector', status: 'ok' },
        { name: 'camera', status: 'degraded', details: { error: 'no frames' } }
      ]
    });
  });

  it('answers unknown routes with 404', async () => {
    const response = await fetch(`${baseUrl}/nope`);
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });
});
