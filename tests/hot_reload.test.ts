import { EventEmitter } from 'node:events';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ConfigReloadEvent, ScenewatchConfig } from '../src/config/index.js';
import { DetectionEngine } from '../src/detection/engine.js';
import { ScenarioValidationError } from '../src/detection/errors.js';
import { ScenarioHotReloader, reloadScenarios } from '../src/detection/hotReload.js';
import { ScenarioStore } from '../src/detection/scenarioStore.js';
import logger from '../src/logger.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { ScoreProvider } from '../src/models/scoreProvider.js';
import { createTestConfig } from './helpers/config.js';

class InMemoryConfigManager extends EventEmitter {
  unwatch = vi.fn();
  watch = vi.fn(() => this.unwatch);

  constructor(private current: ScenewatchConfig) {
    super();
  }

  setConfig(next: ScenewatchConfig) {
    const previous = this.current;
    this.current = next;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
  }
}

const provider: ScoreProvider<Buffer> = {
  predict: async (_frame, prompts) => ({
    rawScores: prompts.map(() => 0),
    probabilities: prompts.map(() => 1 / prompts.length)
  })
};

function baseScenarios(config: ScenewatchConfig): unknown[] {
  const scenarios = config.detection.scenarios;
  return Array.isArray(scenarios) ? scenarios : [];
}

describe('ScenarioHotReloader', () => {
  let config: ScenewatchConfig;
  let store: ScenarioStore;
  let engine: DetectionEngine<Buffer>;
  let metrics: MetricsRegistry;
  let manager: InMemoryConfigManager;
  let reloader: ScenarioHotReloader<Buffer>;

  beforeEach(() => {
    config = createTestConfig();
    store = new ScenarioStore(config.detection.scenarios);
    metrics = new MetricsRegistry();
    engine = new DetectionEngine<Buffer>(store, provider, { metrics });
    manager = new InMemoryConfigManager(config);
    reloader = new ScenarioHotReloader<Buffer>(engine, manager, { metrics });
  });

  afterEach(async () => {
    await reloader.stop();
    vi.restoreAllMocks();
  });

  it('applies a valid definition set and reports the change', async () => {
    const reloaded = vi.fn();
    reloader.on('reloaded', reloaded);

    const outcome = await reloader.apply(() => [
      { id: 'fall', name: 'Fall', prompt: 'a person on the floor', threshold: 0.5, alertLevel: 'high' },
      { id: 'smoke', prompt: 'smoke', threshold: 0.3 }
    ]);

    const report = { added: ['smoke'], removed: ['fire'], updated: [], unchanged: ['fall'] };
    expect(outcome).toEqual({ ok: true, report });
    expect(reloaded).toHaveBeenCalledWith(report);
    expect(metrics.snapshot().scenarios.reloads).toMatchObject({ total: 1, failures: 0, added: 1, removed: 1 });
  });

  it('keeps the previous set when the new one is invalid', async () => {
    const errorSpy = vi.spyOn(logger, 'error');
    const errors: Error[] = [];
    reloader.on('error', (error: Error) => errors.push(error));

    const outcome = await reloader.apply(() => [{ id: 'fall', prompt: 'p', threshold: 3 }]);

    expect(outcome.ok).toBe(false);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ScenarioValidationError);
    expect(store.list().map(scenario => scenario.id)).toEqual(['fall', 'fire']);
    expect(metrics.snapshot().scenarios.reloads).toMatchObject({
      total: 1,
      failures: 1,
      lastError: 'scenarios[0].threshold must be a number between 0 and 1'
    });
    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        detector: 'scenarios',
        issues: ['scenarios[0].threshold must be a number between 0 and 1']
      }),
      'Scenario reload rejected'
    );
  });

  it('resolves a failed outcome without an error listener', async () => {
    const outcome = await reloader.apply(() => 'not scenarios');
    expect(outcome).toMatchObject({ ok: false });
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('scenarios must be a list of scenario definitions');
    }
  });

  it('follows configuration reloads while started', async () => {
    reloader.start();
    reloader.start();
    expect(manager.watch).toHaveBeenCalledTimes(1);

    manager.setConfig(
      createTestConfig({
        model: { ...config.model, temperature: 0.05 },
        detection: {
          enabled: false,
          scenarios: [{ id: 'fire', name: 'Fire', prompt: 'flames', threshold: 0.5, alertLevel: 'high' }]
        }
      })
    );
    await reloader.stop();

    expect(manager.unwatch).toHaveBeenCalledTimes(1);
    expect(store.list().map(scenario => scenario.id)).toEqual(['fire']);
    expect(engine.isEnabled()).toBe(false);
    expect(engine.getTemperature()).toBe(0.05);
  });

  it('applies a changed history size to existing scenarios', async () => {
    for (const confidence of [0.1, 0.2, 0.3, 0.4, 0.5]) {
      store.require('fall').observe(confidence);
    }
    reloader.start();

    manager.setConfig(createTestConfig({ detection: { ...config.detection, historySize: 3 } }));
    await reloader.stop();

    expect(store.getHistorySize()).toBe(3);
    expect(store.require('fall').state.history).toEqual([0.3, 0.4, 0.5]);
  });

  it('applies queued configuration reloads in order before stopping', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    let calls = 0;
    const prepare = vi.fn((_prompts: readonly string[]) => {
      calls += 1;
      return calls === 1 ? gate : undefined;
    });
    const gatedEngine = new DetectionEngine<Buffer>(store, { ...provider, prepare }, { metrics });
    const gatedReloader = new ScenarioHotReloader<Buffer>(gatedEngine, manager, { metrics });
    gatedReloader.start();

    const smoke = { id: 'smoke', name: 'Smoke', prompt: 'smoke', threshold: 0.5 };
    manager.setConfig(createTestConfig({ detection: { scenarios: [...baseScenarios(config), smoke] } }));
    manager.setConfig(createTestConfig({ detection: { scenarios: [smoke] } }));
    const stopping = gatedReloader.stop();
    release();
    await stopping;

    expect(prepare.mock.calls.map(([prompts]) => prompts)).toEqual([
      ['a person on the floor', 'flames', 'smoke'],
      ['smoke']
    ]);
    expect(store.list().map(scenario => scenario.id)).toEqual(['smoke']);
    expect(metrics.snapshot().scenarios.reloads).toMatchObject({ total: 2, failures: 0 });
  });

  it('rejects a set the score provider cannot prepare for', async () => {
    const prepare = vi.fn((prompts: readonly string[]) => {
      const missing = prompts.filter(prompt => prompt === 'smoke');
      if (missing.length > 0) {
        throw new Error('No embedding for prompt(s) "smoke"');
      }
    });
    const preparedEngine = new DetectionEngine<Buffer>(store, { ...provider, prepare }, { metrics });
    const preparedReloader = new ScenarioHotReloader<Buffer>(preparedEngine, manager, { metrics });

    const outcome = await preparedReloader.apply(() => [
      ...baseScenarios(config),
      { id: 'smoke', prompt: 'smoke', threshold: 0.5 },
      { id: 'blank', prompt: '   ', threshold: 0.5 },
      { id: 'off', prompt: 'off', threshold: 0.5, enabled: false }
    ]);

    expect(prepare).toHaveBeenCalledWith(['a person on the floor', 'flames', 'smoke']);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(ScenarioValidationError);
      expect(outcome.error.message).toBe(
        'score provider rejected the scenarios: No embedding for prompt(s) "smoke"'
      );
    }
    expect(store.list().map(scenario => scenario.id)).toEqual(['fall', 'fire']);
  });

  it('ignores configuration reloads after stopping', async () => {
    reloader.start();
    await reloader.stop();

    manager.setConfig(createTestConfig({ detection: { scenarios: [{ id: 'x', prompt: 'x', threshold: 0.5 }] } }));

    expect(store.list().map(scenario => scenario.id)).toEqual(['fall', 'fire']);
  });
});

describe('reloadScenarios', () => {
  it('reads the source and applies it to the engine', async () => {
    const store = new ScenarioStore([{ id: 'fall', prompt: 'p', threshold: 0.5 }]);
    const engine = new DetectionEngine<Buffer>(store, provider, { metrics: new MetricsRegistry() });

    await expect(reloadScenarios(engine, () => [{ id: 'fall', prompt: 'p', threshold: 0.7 }])).resolves.toEqual({
      added: [],
      removed: [],
      updated: ['fall'],
      unchanged: []
    });
  });
});
