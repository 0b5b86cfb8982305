export type AlertLevel = 'high' | 'medium' | 'low';

export const ALERT_LEVELS: readonly AlertLevel[] = ['high', 'medium', 'low'];

export const ALERT_PRIORITY: Readonly<Record<AlertLevel, number>> = {
  high: 3,
  medium: 2,
  low: 1
};

export interface ScenarioDefinition {
  id: string;
  name: string;
  prompt: string;
  threshold: number;
  /** Seconds between two triggers of the same scenario. */
  cooldown: number;
  consecutiveFrames: number;
  alertLevel: AlertLevel;
  enabled: boolean;
}

export type ScenarioConfig = Omit<ScenarioDefinition, 'id'>;

/**
 * Conceptual per-scenario state. `triggered` only lasts for the frame that fired;
 * `cooldown` covers the rest of the cooldown window.
 */
export type ScenarioPhase = 'idle' | 'accumulating' | 'triggered' | 'cooldown';

export type ScoreMap = Readonly<Record<string, number>>;

export interface NoDetection {
  readonly detected: false;
  readonly allScores: ScoreMap;
}

export interface Detection {
  readonly detected: true;
  readonly scenarioId: string;
  readonly scenarioName: string;
  readonly confidence: number;
  readonly alertLevel: AlertLevel;
  readonly allScores: ScoreMap;
}

export type DetectionResult = NoDetection | Detection;

export type ConfidenceSummary = {
  count: number;
  mean: number;
  min: number;
  max: number;
  std: number;
};

export type ScenarioStatistics = {
  id: string;
  name: string;
  enabled: boolean;
  threshold: number;
  alertLevel: AlertLevel;
  consecutiveCount: number;
  lastTriggerTime: number | null;
  phase: ScenarioPhase;
  history: number[];
  summary: ConfidenceSummary | null;
};

export type ReloadReport = {
  added: string[];
  removed: string[];
  updated: string[];
  unchanged: string[];
};
