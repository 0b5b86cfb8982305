import { EventEmitter } from 'node:events';
import logger from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { ConfigReloadEvent, ScenewatchConfig } from '../config/index.js';
import type { DetectionEngine } from './engine.js';
import { ScenarioValidationError } from './errors.js';
import { DEFAULT_HISTORY_SIZE } from './scenario.js';
import type { ReloadReport } from './types.js';

export type ScenarioSource = () => unknown;

export type ReloadOutcome =
  | { ok: true; report: ReloadReport }
  | { ok: false; error: Error };

/**
 * Reads a definition set and applies it. Invalid input leaves the engine's
 * scenarios untouched and rejects with ScenarioValidationError.
 */
export async function reloadScenarios<TFrame>(
  engine: DetectionEngine<TFrame>,
  source: ScenarioSource
): Promise<ReloadReport> {
  return engine.reload(source());
}

/** The part of ConfigManager the reloader listens to. */
export interface ConfigReloadSource {
  on(event: 'reload', listener: (event: ConfigReloadEvent) => void): unknown;
  off(event: 'reload', listener: (event: ConfigReloadEvent) => void): unknown;
  watch(): () => void;
}

interface HotReloaderOptions {
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

export class ScenarioHotReloader<TFrame = Buffer> extends EventEmitter {
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;
  private unwatch: (() => void) | null = null;
  private pending: Promise<ReloadOutcome | null> | null = null;
  private readonly handleReload = ({ next }: ConfigReloadEvent) => {
    const previous = this.pending ?? Promise.resolve(null);
    this.pending = previous.then(() => this.applyConfig(next));
  };

  constructor(
    private readonly engine: DetectionEngine<TFrame>,
    private readonly manager: ConfigReloadSource,
    options: HotReloaderOptions = {}
  ) {
    super();
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;
  }

  start() {
    if (this.unwatch) {
      return;
    }
    this.manager.on('reload', this.handleReload);
    this.unwatch = this.manager.watch();
  }

  async stop() {
    if (this.unwatch) {
      this.manager.off('reload', this.handleReload);
      this.unwatch();
      this.unwatch = null;
    }
    if (this.pending) {
      await this.pending;
      this.pending = null;
    }
  }

  /** Resolves with the outcome; never rejects. */
  async apply(source: ScenarioSource): Promise<ReloadOutcome> {
    try {
      const report = await reloadScenarios(this.engine, source);
      this.metrics.recordScenarioReload(report);
      this.log.info(
        {
          detector: 'scenarios',
          added: report.added,
          removed: report.removed,
          updated: report.updated
        },
        'Scenario definitions reloaded'
      );
      this.emit('reloaded', report);
      return { ok: true, report };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.metrics.recordScenarioReload({ error: err.message });
      const issues = err instanceof ScenarioValidationError ? err.issues : undefined;
      this.log.error({ err, detector: 'scenarios', issues }, 'Scenario reload rejected');
      if (this.listenerCount('error') > 0) {
        this.emit('error', err);
      }
      return { ok: false, error: err };
    }
  }

  private async applyConfig(next: ScenewatchConfig): Promise<ReloadOutcome> {
    const outcome = await this.apply(() => next.detection.scenarios);
    if (!outcome.ok) {
      return outcome;
    }
    try {
      this.engine.setEnabled(next.detection.enabled ?? true);
      const temperature = next.model.temperature;
      if (typeof temperature === 'number') {
        this.engine.setTemperature(temperature);
      }
      const historySize = next.detection.historySize ?? DEFAULT_HISTORY_SIZE;
      if (historySize !== this.engine.scenarios.getHistorySize()) {
        this.engine.scenarios.setHistorySize(historySize);
      }
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.log.error({ err, detector: 'scenarios' }, 'Detection settings reload rejected');
      if (this.listenerCount('error') > 0) {
        this.emit('error', err);
      }
      return { ok: false, error: err };
    }
    return outcome;
  }
}
