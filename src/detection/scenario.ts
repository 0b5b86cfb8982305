import { summarize } from './math.js';
import type {
  AlertLevel,
  ScenarioDefinition,
  ScenarioPhase,
  ScenarioStatistics
} from './types.js';

export const DEFAULT_HISTORY_SIZE = 10;

/**
 * Mutable per-scenario counters. The object is carried over by reference when a
 * reload replaces the scenario's static configuration, so a detection that is
 * still holding the previous Scenario instance keeps writing to the same state.
 */
export class ScenarioState {
  lastTriggerTime: number | null = null;
  consecutiveCount = 0;
  readonly history: number[] = [];

  constructor(public historySize = DEFAULT_HISTORY_SIZE) {}

  /** Changes the history capacity, dropping the oldest entries that no longer fit. */
  resize(historySize: number) {
    this.historySize = historySize;
    if (this.history.length > historySize) {
      this.history.splice(0, this.history.length - historySize);
    }
  }

  reset() {
    this.lastTriggerTime = null;
    this.consecutiveCount = 0;
    this.history.splice(0, this.history.length);
  }
}

export class Scenario {
  readonly definition: Readonly<ScenarioDefinition>;
  readonly state: ScenarioState;

  constructor(definition: ScenarioDefinition, state: ScenarioState = new ScenarioState()) {
    this.definition = Object.freeze({ ...definition });
    this.state = state;
  }

  get id(): string {
    return this.definition.id;
  }

  get name(): string {
    return this.definition.name;
  }

  get prompt(): string {
    return this.definition.prompt;
  }

  get threshold(): number {
    return this.definition.threshold;
  }

  get cooldown(): number {
    return this.definition.cooldown;
  }

  get consecutiveFrames(): number {
    return this.definition.consecutiveFrames;
  }

  get alertLevel(): AlertLevel {
    return this.definition.alertLevel;
  }

  get enabled(): boolean {
    return this.definition.enabled;
  }

  get lastTriggerTime(): number | null {
    return this.state.lastTriggerTime;
  }

  get consecutiveCount(): number {
    return this.state.consecutiveCount;
  }

  get history(): readonly number[] {
    return this.state.history;
  }

  withDefinition(definition: ScenarioDefinition): Scenario {
    return new Scenario(definition, this.state);
  }

  hasPrompt(): boolean {
    return this.definition.prompt.trim().length > 0;
  }

  isCoolingDown(timestamp: number): boolean {
    const last = this.state.lastTriggerTime;
    return last !== null && timestamp - last < this.definition.cooldown;
  }

  /**
   * Records one frame's confidence and advances the streak. Returns true when the
   * scenario has reached its required number of consecutive qualifying frames.
   */
  observe(confidence: number): boolean {
    const { history, historySize } = this.state;
    history.push(confidence);
    if (history.length > historySize) {
      history.splice(0, history.length - historySize);
    }

    if (confidence > this.definition.threshold) {
      this.state.consecutiveCount += 1;
    } else {
      this.state.consecutiveCount = 0;
    }

    return this.state.consecutiveCount >= this.definition.consecutiveFrames;
  }

  trigger(timestamp: number) {
    this.state.lastTriggerTime = timestamp;
    this.state.consecutiveCount = 0;
  }

  reset() {
    this.state.reset();
  }

  phaseAt(timestamp: number): ScenarioPhase {
    if (this.isCoolingDown(timestamp)) {
      return timestamp === this.state.lastTriggerTime ? 'triggered' : 'cooldown';
    }
    return this.state.consecutiveCount > 0 ? 'accumulating' : 'idle';
  }

  statistics(timestamp: number): ScenarioStatistics {
    const history = [...this.state.history];
    return {
      id: this.id,
      name: this.name,
      enabled: this.enabled,
      threshold: this.threshold,
      alertLevel: this.alertLevel,
      consecutiveCount: this.state.consecutiveCount,
      lastTriggerTime: this.state.lastTriggerTime,
      phase: this.phaseAt(timestamp),
      history,
      summary: summarize(history)
    };
  }

  toDefinition(): ScenarioDefinition {
    return { ...this.definition };
  }
}
