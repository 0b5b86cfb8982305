export type EventSeverity = 'info' | 'warning' | 'critical';

export interface EventPayload {
  ts?: number | Date;
  source: string;
  detector: string;
  severity: EventSeverity;
  message: string;
  meta?: Record<string, unknown>;
}

export interface EventRecord {
  ts: number;
  source: string;
  detector: string;
  severity: EventSeverity;
  message: string;
  meta: Record<string, unknown> | undefined;
}

/** Metadata attached to the events an alert publishes. */
export interface AlertEventMeta extends Record<string, unknown> {
  scenarioId: string;
  scenarioName: string;
  confidence: number;
  alertLevel: string;
  allScores: Record<string, number>;
  snapshot?: string;
}
