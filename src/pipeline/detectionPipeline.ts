import { EventEmitter } from 'node:events';
import logger from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { AlertManager } from '../alerts/alertManager.js';
import { DEFAULT_DETECTOR_NAME, type DetectionEngine } from '../detection/engine.js';
import { DetectionInProgressError, ScoreProviderError } from '../detection/errors.js';
import type { DetectionResult } from '../detection/types.js';

export interface FrameSource {
  on(event: 'frame', listener: (frame: Buffer) => void): unknown;
  off(event: 'frame', listener: (frame: Buffer) => void): unknown;
}

export interface DetectionPipelineOptions {
  minFrameIntervalMs?: number;
  detector?: string;
  now?: () => number;
  log?: typeof logger;
  metrics?: MetricsRegistry;
}

export type PipelineStats = {
  received: number;
  processed: number;
  throttled: number;
  droppedBusy: number;
  detections: number;
  errors: number;
};

export type DetectionEvent = {
  ts: number;
  result: DetectionResult;
};

/**
 * Feeds frames from a source into one engine. At most one frame is evaluated at a
 * time; frames arriving meanwhile are dropped rather than queued.
 */
export class DetectionPipeline extends EventEmitter {
  private readonly minFrameIntervalMs: number;
  private readonly detector: string;
  private readonly now: () => number;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;
  private source: FrameSource | null = null;
  private lastFrameAt: number | null = null;
  private pending: Promise<DetectionResult | null> | null = null;
  private stats: PipelineStats = {
    received: 0,
    processed: 0,
    throttled: 0,
    droppedBusy: 0,
    detections: 0,
    errors: 0
  };
  private readonly onFrame = (frame: Buffer) => {
    this.pending = this.handleFrame(frame);
  };

  constructor(
    private readonly engine: DetectionEngine<Buffer>,
    private readonly alerts: AlertManager,
    options: DetectionPipelineOptions = {}
  ) {
    super();
    this.minFrameIntervalMs = Math.max(0, options.minFrameIntervalMs ?? 0);
    this.detector = options.detector ?? DEFAULT_DETECTOR_NAME;
    this.now = options.now ?? Date.now;
    this.log = options.log ?? logger;
    this.metrics = options.metrics ?? metrics;
  }

  attach(source: FrameSource) {
    this.source?.off('frame', this.onFrame);
    this.source = source;
    source.on('frame', this.onFrame);
  }

  async detach() {
    if (this.source) {
      this.source.off('frame', this.onFrame);
      this.source = null;
    }
    if (this.pending) {
      await this.pending;
      this.pending = null;
    }
  }

  getStats(): PipelineStats {
    return { ...this.stats };
  }

  /** Resolves with the engine's result, or null when the frame was skipped. Never rejects. */
  async handleFrame(frame: Buffer): Promise<DetectionResult | null> {
    this.stats.received += 1;
    const ts = this.now();

    if (this.lastFrameAt !== null && ts - this.lastFrameAt < this.minFrameIntervalMs) {
      this.stats.throttled += 1;
      return null;
    }
    if (this.engine.busy) {
      this.dropBusy();
      return null;
    }
    this.lastFrameAt = ts;

    let result: DetectionResult;
    try {
      result = await this.engine.detect(frame, ts / 1000);
    } catch (error) {
      if (error instanceof DetectionInProgressError) {
        this.dropBusy();
        return null;
      }
      this.stats.errors += 1;
      if (error instanceof ScoreProviderError) {
        this.log.warn({ err: error, detector: this.detector, reason: error.reason }, 'Frame scoring failed');
        return error.result;
      }
      this.log.error({ err: error, detector: this.detector }, 'Detection failed');
      if (this.listenerCount('error') > 0) {
        this.emit('error', error);
      }
      return null;
    }

    this.stats.processed += 1;
    if (result.detected) {
      this.stats.detections += 1;
      this.alerts.handle(result, frame, ts);
    }
    this.emit('detection', { ts, result } satisfies DetectionEvent);
    return result;
  }

  private dropBusy() {
    this.stats.droppedBusy += 1;
    this.metrics.incrementDetectorCounter(this.detector, 'dropped');
  }
}
