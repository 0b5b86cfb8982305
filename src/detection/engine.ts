import { performance } from 'node:perf_hooks';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { ScorePrediction, ScoreProvider } from '../models/scoreProvider.js';
import { parseScenarioDefinitions } from './definitions.js';
import { DetectionInProgressError, ScenarioValidationError, ScoreProviderError } from './errors.js';
import { softmax } from './math.js';
import type { Scenario } from './scenario.js';
import type { ScenarioStore } from './scenarioStore.js';
import {
  ALERT_PRIORITY,
  type Detection,
  type DetectionResult,
  type NoDetection,
  type ReloadReport,
  type ScenarioPhase,
  type ScenarioStatistics
} from './types.js';

export const DEFAULT_TEMPERATURE = 0.01;
export const DEFAULT_DETECTOR_NAME = 'scenes';

export interface DetectionEngineOptions {
  enabled?: boolean;
  temperature?: number;
  /** Label used for metrics. */
  detector?: string;
  metrics?: MetricsRegistry;
}

export type DetectorInfo = {
  enabled: boolean;
  temperature: number;
  totalScenarios: number;
  enabledScenarios: number;
  busy: boolean;
  provider: Record<string, unknown> | null;
};

export type Candidate = {
  scenario: Scenario;
  confidence: number;
};

/**
 * Picks the candidate with the highest alert priority, then the highest confidence.
 * A full tie keeps the earliest candidate.
 */
export function selectWinner(candidates: readonly Candidate[]): Candidate | null {
  let best: Candidate | null = null;
  for (const candidate of candidates) {
    if (!best) {
      best = candidate;
      continue;
    }
    const priority = ALERT_PRIORITY[candidate.scenario.alertLevel];
    const bestPriority = ALERT_PRIORITY[best.scenario.alertLevel];
    if (priority > bestPriority || (priority === bestPriority && candidate.confidence > best.confidence)) {
      best = candidate;
    }
  }
  return best;
}

function noDetection(allScores: Record<string, number>): NoDetection {
  const result: NoDetection = { detected: false, allScores: Object.freeze(allScores) };
  return Object.freeze(result);
}

function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export function nowSeconds() {
  return Date.now() / 1000;
}

export class DetectionEngine<TFrame = Buffer> {
  private enabled: boolean;
  private temperature: number;
  private inFlight: Promise<DetectionResult> | null = null;
  private readonly detector: string;
  private readonly metrics: MetricsRegistry;

  constructor(
    private readonly store: ScenarioStore,
    private readonly provider: ScoreProvider<TFrame>,
    options: DetectionEngineOptions = {}
  ) {
    this.enabled = options.enabled ?? true;
    this.temperature = DEFAULT_TEMPERATURE;
    this.setTemperature(options.temperature ?? DEFAULT_TEMPERATURE);
    this.detector = options.detector ?? DEFAULT_DETECTOR_NAME;
    this.metrics = options.metrics ?? metrics;
  }

  get scenarios(): ScenarioStore {
    return this.store;
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  isEnabled() {
    return this.enabled;
  }

  setEnabled(enabled: boolean) {
    this.enabled = enabled;
  }

  getTemperature() {
    return this.temperature;
  }

  setTemperature(temperature: number) {
    if (!Number.isFinite(temperature) || temperature <= 0) {
      throw new Error(`temperature must be a positive number (received ${temperature})`);
    }
    this.temperature = temperature;
  }

  /**
   * Evaluates one frame. `timestamp` is in seconds. Rejects with
   * DetectionInProgressError when another frame is still being evaluated and with
   * ScoreProviderError when scoring fails; neither touches scenario state.
   */
  async detect(frame: TFrame, timestamp: number): Promise<DetectionResult> {
    if (this.inFlight) {
      throw new DetectionInProgressError();
    }
    const run = this.evaluate(frame, timestamp);
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  async detectBatch(frames: readonly TFrame[], timestamp: number): Promise<DetectionResult[]> {
    const results: DetectionResult[] = [];
    for (const frame of frames) {
      results.push(await this.detect(frame, timestamp));
    }
    return results;
  }

  /**
   * Validates the definitions and lets the provider ready itself for their
   * prompts, then waits for the running detection and swaps them in. Any failure rejects with
   * ScenarioValidationError and leaves the current scenarios in place.
   */
  async reload(definitions: unknown): Promise<ReloadReport> {
    const parsed = parseScenarioDefinitions(definitions);
    if (this.provider.prepare) {
      const prompts = parsed
        .filter(definition => definition.enabled && definition.prompt.trim().length > 0)
        .map(definition => definition.prompt);
      try {
        await this.provider.prepare(prompts);
      } catch (error) {
        throw new ScenarioValidationError([`score provider rejected the scenarios: ${describeError(error)}`]);
      }
    }
    while (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
    return this.store.reload(parsed);
  }

  phaseOf(id: string, timestamp = nowSeconds()): ScenarioPhase {
    return this.store.require(id).phaseAt(timestamp);
  }

  getScenarioStatistics(id: string, timestamp = nowSeconds()): ScenarioStatistics {
    return this.store.require(id).statistics(timestamp);
  }

  getAllStatistics(timestamp = nowSeconds()): ScenarioStatistics[] {
    return this.store.list().map(scenario => scenario.statistics(timestamp));
  }

  getDetectorInfo(): DetectorInfo {
    return {
      enabled: this.enabled,
      temperature: this.temperature,
      totalScenarios: this.store.size,
      enabledScenarios: this.store.active().length,
      busy: this.busy,
      provider: this.provider.describe ? this.provider.describe() : null
    };
  }

  resetScenario(id: string) {
    this.store.reset(id);
  }

  resetAllScenarios() {
    this.store.resetAll();
  }

  private async evaluate(frame: TFrame, timestamp: number): Promise<DetectionResult> {
    if (!this.enabled) {
      return noDetection({});
    }

    const eligible = this.store
      .active()
      .filter(scenario => scenario.hasPrompt() && !scenario.isCoolingDown(timestamp));
    this.metrics.setDetectorGauge(this.detector, 'eligible', eligible.length);
    if (eligible.length === 0) {
      return noDetection({});
    }

    const prompts = eligible.map(scenario => scenario.prompt);
    const rawScores = await this.score(frame, prompts);
    const confidences = softmax(rawScores);

    const allScores: Record<string, number> = {};
    const candidates: Candidate[] = [];
    eligible.forEach((scenario, index) => {
      const confidence = confidences[index];
      allScores[scenario.id] = confidence;
      if (scenario.observe(confidence)) {
        candidates.push({ scenario, confidence });
      }
    });
    this.metrics.incrementDetectorCounter(this.detector, 'frames');

    const winner = selectWinner(candidates);
    if (!winner) {
      return noDetection(allScores);
    }

    const { scenario, confidence } = winner;
    scenario.trigger(timestamp);
    this.metrics.incrementDetectorCounter(this.detector, 'triggers');
    this.metrics.recordScenarioTrigger(scenario.id, confidence);

    const result: Detection = {
      detected: true,
      scenarioId: scenario.id,
      scenarioName: scenario.name,
      confidence,
      alertLevel: scenario.alertLevel,
      allScores: Object.freeze(allScores)
    };
    return Object.freeze(result);
  }

  private async score(frame: TFrame, prompts: string[]): Promise<readonly number[]> {
    const started = performance.now();
    let prediction: ScorePrediction;
    try {
      prediction = await this.provider.predict(frame, prompts, this.temperature);
    } catch (error) {
      const message = `Score provider failed: ${describeError(error)}`;
      this.metrics.recordDetectorError(this.detector, message);
      throw new ScoreProviderError('provider-failed', message, { cause: error });
    } finally {
      this.metrics.observeDetectorLatency(this.detector, performance.now() - started);
    }

    const { rawScores } = prediction;
    if (rawScores.length !== prompts.length) {
      const message = `Score provider returned ${rawScores.length} scores for ${prompts.length} prompts`;
      this.metrics.recordDetectorError(this.detector, message);
      throw new ScoreProviderError('length-mismatch', message);
    }
    if (!rawScores.every(value => Number.isFinite(value))) {
      const message = 'Score provider returned a non-finite score';
      this.metrics.recordDetectorError(this.detector, message);
      throw new ScoreProviderError('non-finite-score', message);
    }
    return rawScores;
  }
}
