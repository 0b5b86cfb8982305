import fs from 'node:fs';
import path from 'node:path';
import eventBus, { type EventBus } from '../eventBus.js';
import logger from '../logger.js';
import type { AlertLevel, Detection, DetectionResult } from '../detection/types.js';
import type { AlertEventMeta, EventSeverity } from '../types.js';

export const DEFAULT_IGNORED_NAMES = ['normal'];
const DEFAULT_HISTORY_LIMIT = 500;

const SEVERITY_BY_LEVEL: Readonly<Record<AlertLevel, EventSeverity>> = {
  high: 'critical',
  medium: 'warning',
  low: 'info'
};

export interface AlertManagerOptions {
  /** Scenario names that never raise an alert. Compared case-insensitively. */
  ignoreNames?: string[];
  saveFrames?: boolean;
  snapshotDir?: string;
  historyLimit?: number;
  source?: string;
  detector?: string;
  bus?: EventBus;
  log?: typeof logger;
}

export type AlertRecord = {
  ts: number;
  scenarioId: string;
  scenarioName: string;
  confidence: number;
  alertLevel: AlertLevel;
  severity: EventSeverity;
  snapshot: string | null;
};

export type AlertStatistics = {
  total: number;
  byScenario: Record<string, number>;
  firstAlertAt: number | null;
  lastAlertAt: number | null;
};

export function severityForLevel(level: AlertLevel): EventSeverity {
  return SEVERITY_BY_LEVEL[level];
}

export class AlertManager {
  private readonly ignored: Set<string>;
  private readonly saveFrames: boolean;
  private readonly snapshotDir: string;
  private readonly historyLimit: number;
  private readonly source: string;
  private readonly detector: string;
  private readonly bus: EventBus;
  private readonly log: typeof logger;
  private history: AlertRecord[] = [];
  private total = 0;
  private readonly byScenario = new Map<string, number>();
  private firstAlertAt: number | null = null;

  constructor(options: AlertManagerOptions = {}) {
    this.ignored = new Set((options.ignoreNames ?? DEFAULT_IGNORED_NAMES).map(name => name.toLowerCase()));
    this.saveFrames = options.saveFrames ?? false;
    this.snapshotDir = path.resolve(options.snapshotDir ?? 'snapshots');
    this.historyLimit = Math.max(1, Math.floor(options.historyLimit ?? DEFAULT_HISTORY_LIMIT));
    this.source = options.source ?? 'video:main';
    this.detector = options.detector ?? 'scenes';
    this.bus = options.bus ?? eventBus;
    this.log = options.log ?? logger;
  }

  isIgnored(scenarioName: string) {
    return this.ignored.has(scenarioName.toLowerCase());
  }

  /**
   * Raises an alert for a positive result. Returns null for negative results and
   * ignored scenario names.
   */
  handle(result: DetectionResult, frame?: Buffer, ts = Date.now()): AlertRecord | null {
    if (!result.detected) {
      return null;
    }
    if (this.isIgnored(result.scenarioName)) {
      this.log.debug({ detector: this.detector, scenarioId: result.scenarioId }, 'Ignoring alert for scenario');
      return null;
    }

    const snapshot = this.saveFrames && frame ? this.saveSnapshot(result, frame, ts) : null;
    const record: AlertRecord = {
      ts,
      scenarioId: result.scenarioId,
      scenarioName: result.scenarioName,
      confidence: result.confidence,
      alertLevel: result.alertLevel,
      severity: severityForLevel(result.alertLevel),
      snapshot
    };

    this.remember(record);
    this.bus.emitEvent({
      ts,
      source: this.source,
      detector: this.detector,
      severity: record.severity,
      message: `${record.scenarioName} detected (confidence ${record.confidence.toFixed(3)})`,
      meta: buildMeta(result, snapshot)
    });
    return record;
  }

  getHistory(limit?: number): AlertRecord[] {
    if (typeof limit === 'number' && limit >= 0) {
      return this.history.slice(Math.max(0, this.history.length - limit));
    }
    return [...this.history];
  }

  getStatistics(): AlertStatistics {
    return {
      total: this.total,
      byScenario: Object.fromEntries(this.byScenario),
      firstAlertAt: this.firstAlertAt,
      lastAlertAt: this.history.at(-1)?.ts ?? null
    };
  }

  clear() {
    this.history = [];
    this.total = 0;
    this.byScenario.clear();
    this.firstAlertAt = null;
  }

  private remember(record: AlertRecord) {
    this.total += 1;
    this.firstAlertAt ??= record.ts;
    this.byScenario.set(record.scenarioId, (this.byScenario.get(record.scenarioId) ?? 0) + 1);
    this.history.push(record);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }

  private saveSnapshot(result: Detection, frame: Buffer, ts: number): string | null {
    const filePath = path.join(this.snapshotDir, `${result.scenarioId}_${ts}.png`);
    try {
      fs.mkdirSync(this.snapshotDir, { recursive: true });
      fs.writeFileSync(filePath, frame);
      return filePath;
    } catch (error) {
      this.log.error({ err: error, detector: this.detector, filePath }, 'Failed to save alert snapshot');
      return null;
    }
  }
}

function buildMeta(result: Detection, snapshot: string | null): AlertEventMeta {
  const meta: AlertEventMeta = {
    scenarioId: result.scenarioId,
    scenarioName: result.scenarioName,
    confidence: result.confidence,
    alertLevel: result.alertLevel,
    allScores: { ...result.allScores }
  };
  if (snapshot) {
    meta.snapshot = snapshot;
  }
  return meta;
}
