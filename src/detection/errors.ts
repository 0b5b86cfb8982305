import type { NoDetection } from './types.js';

export class ScenarioValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.length > 0 ? issues.join('; ') : 'Invalid scenario definitions');
    this.name = 'ScenarioValidationError';
    this.issues = [...issues];
  }
}

export class UnknownScenarioError extends Error {
  readonly scenarioId: string;

  constructor(scenarioId: string) {
    super(`Unknown scenario "${scenarioId}"`);
    this.name = 'UnknownScenarioError';
    this.scenarioId = scenarioId;
  }
}

const emptyResult: NoDetection = { detected: false, allScores: Object.freeze({}) };
const EMPTY_RESULT = Object.freeze(emptyResult);

/**
 * Base class for failures of a single `detect()` call. The attached result is the
 * negative outcome the frame resolves to; no scenario state was touched.
 */
export class DetectionError extends Error {
  readonly result: NoDetection = EMPTY_RESULT;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DetectionError';
  }
}

export type ScoreProviderFailure = 'provider-failed' | 'length-mismatch' | 'non-finite-score';

export class ScoreProviderError extends DetectionError {
  readonly reason: ScoreProviderFailure;

  constructor(reason: ScoreProviderFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScoreProviderError';
    this.reason = reason;
  }
}

export class DetectionInProgressError extends DetectionError {
  constructor() {
    super('A detection is already running on this engine');
    this.name = 'DetectionInProgressError';
  }
}
