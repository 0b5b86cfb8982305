import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { EventRecord } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type HistogramSnapshot = Record<string, number>;

type DetectorSnapshot = {
  counters: CounterMap;
  gauges: CounterMap;
  lastRunAt: string | null;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
  latency: LatencyStats | null;
  latencyHistogram: HistogramSnapshot;
};

type PipelineRestartSnapshot = {
  total: number;
  lastRestartAt: string | null;
  byReason: CounterMap;
  byChannel: CounterMap;
  lastRestart: { channel: string; reason: string; attempt: number | null; delayMs: number | null } | null;
};

type ScenarioReloadSnapshot = {
  total: number;
  failures: number;
  lastReloadAt: string | null;
  lastError: string | null;
  added: number;
  removed: number;
  updated: number;
};

type MetricsSnapshot = {
  createdAt: string;
  events: {
    total: number;
    lastEventAt: string | null;
    byDetector: CounterMap;
    bySeverity: CounterMap;
    storeFailures: number;
    lastStoreError: string | null;
  };
  logs: {
    byLevel: CounterMap;
    byDetector: Record<string, CounterMap>;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
    currentLevel: string;
    lastLevelChangeAt: string | null;
    levelChanges: CounterMap;
  };
  latencies: Record<string, LatencyStats>;
  histograms: Record<string, HistogramSnapshot>;
  pipeline: PipelineRestartSnapshot;
  scenarios: {
    triggers: CounterMap;
    reloads: ScenarioReloadSnapshot;
  };
  detectors: Record<string, DetectorSnapshot>;
};

type HistogramConfig = {
  buckets: number[];
  format: (bucket: number, previous?: number) => string;
};

type PrometheusHistogramOptions = {
  metricName?: string;
  help?: string;
  labels?: Record<string, string>;
};

type PrometheusGaugeOptions = {
  metricName?: string;
  help?: string;
  labels?: Record<string, string>;
};

type PrometheusGaugeSample = {
  value: number;
  labels?: Record<string, string>;
  sortKey?: number | string;
};

type PrometheusLogLevelOptions = {
  levelMetricName?: string;
  levelHelp?: string;
  stateMetricName?: string;
  stateHelp?: string;
  detectorMetricName?: string;
  detectorHelp?: string;
  labels?: Record<string, string>;
};

type PrometheusDetectorOptions = {
  counterMetricName?: string;
  counterHelp?: string;
  gaugeMetricName?: string;
  gaugeHelp?: string;
  labels?: Record<string, string>;
};

const METRIC_PREFIX = 'scenewatch';

function formatRangeBucket(bucket: number, previous?: number) {
  if (typeof previous === 'undefined') {
    return `<${bucket}`;
  }
  return previous === bucket ? `${bucket}` : `${previous}-${bucket}`;
}

const DEFAULT_HISTOGRAM: HistogramConfig = {
  buckets: [25, 50, 100, 250, 500, 1000, 2000, 5000, 10000],
  format: formatRangeBucket
};

const COUNTER_HISTOGRAM: HistogramConfig = {
  buckets: [1, 2, 5, 10, 25, 50, 100, 250, 500, 1000],
  format: formatRangeBucket
};

const CONFIDENCE_HISTOGRAM: HistogramConfig = {
  buckets: [0.1, 0.25, 0.5, 0.75, 0.9, 0.95, 1],
  format: (bucket, previous) => {
    const formatValue = (value: number) =>
      Number.isInteger(value) ? `${value}` : value.toFixed(2).replace(/0+$/, '').replace(/\.$/, '');
    if (typeof previous === 'undefined') {
      return `<${formatValue(bucket)}`;
    }
    const lower = formatValue(previous);
    const upper = formatValue(bucket);
    return previous === bucket ? upper : `${lower}-${upper}`;
  }
};

const PINO_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

type DetectorLatencyState = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
};

type DetectorMetricState = {
  counters: Map<string, number>;
  gauges: Map<string, number>;
  lastRunAt: number | null;
  lastErrorAt: number | null;
  lastErrorMessage: string | null;
  latency: DetectorLatencyState | null;
  latencyHistogram: Map<string, number> | null;
};

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByDetector = new Map<string, Map<string, number>>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private readonly logLevelChangeCounters = new Map<string, number>();
  private readonly eventsByDetector = new Map<string, number>();
  private readonly eventsBySeverity = new Map<string, number>();
  private readonly latencyStats = new Map<string, DetectorLatencyState>();
  private readonly histograms = new Map<string, Map<string, number>>();
  private readonly histogramStats = new Map<string, { sum: number; count: number }>();
  private readonly histogramConfigs = new Map<string, HistogramConfig>();
  private readonly detectorMetrics = new Map<string, DetectorMetricState>();
  private readonly scenarioTriggers = new Map<string, number>();
  private readonly restartReasons = new Map<string, number>();
  private readonly restartsByChannel = new Map<string, number>();
  private lastRestart: PipelineRestartSnapshot['lastRestart'] = null;
  private lastRestartAt: number | null = null;
  private restarts = 0;
  private reloads: ReloadState = createReloadState();
  private totalEvents = 0;
  private lastEventTimestamp: number | null = null;
  private eventStoreFailures = 0;
  private lastEventStoreError: string | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByDetector.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.eventsByDetector.clear();
    this.eventsBySeverity.clear();
    this.latencyStats.clear();
    this.histograms.clear();
    this.histogramStats.clear();
    this.histogramConfigs.clear();
    this.detectorMetrics.clear();
    this.scenarioTriggers.clear();
    this.restartReasons.clear();
    this.restartsByChannel.clear();
    this.lastRestart = null;
    this.lastRestartAt = null;
    this.restarts = 0;
    this.reloads = createReloadState();
    this.totalEvents = 0;
    this.lastEventTimestamp = null;
    this.eventStoreFailures = 0;
    this.lastEventStoreError = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string; detector?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (context?.detector) {
      const detectorMap = this.logLevelByDetector.get(context.detector) ?? new Map<string, number>();
      detectorMap.set(normalized, (detectorMap.get(normalized) ?? 0) + 1);
      this.logLevelByDetector.set(context.detector, detectorMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (!previousNormalized || previousNormalized === normalized) {
      return;
    }
    this.lastLogLevelChangeAt = Date.now();
    this.logLevelChangeCounters.set(normalized, (this.logLevelChangeCounters.get(normalized) ?? 0) + 1);
  }

  recordEvent(event: EventRecord) {
    this.totalEvents += 1;
    this.lastEventTimestamp = event.ts;
    this.eventsByDetector.set(event.detector, (this.eventsByDetector.get(event.detector) ?? 0) + 1);
    this.eventsBySeverity.set(event.severity, (this.eventsBySeverity.get(event.severity) ?? 0) + 1);
  }

  recordEventStoreFailure(error: unknown) {
    this.eventStoreFailures += 1;
    this.lastEventStoreError = error instanceof Error ? error.message : String(error);
  }

  recordScenarioTrigger(scenarioId: string, confidence: number) {
    this.scenarioTriggers.set(scenarioId, (this.scenarioTriggers.get(scenarioId) ?? 0) + 1);
    if (Number.isFinite(confidence)) {
      const normalized = Math.min(1, Math.max(0, confidence));
      this.observeHistogram('scenario.confidence', normalized, CONFIDENCE_HISTOGRAM);
    }
  }

  recordScenarioReload(
    outcome: { added: string[]; removed: string[]; updated: string[] } | { error: string }
  ) {
    this.reloads.total += 1;
    this.reloads.lastReloadAt = Date.now();
    if ('error' in outcome) {
      this.reloads.failures += 1;
      this.reloads.lastError = outcome.error;
      return;
    }
    this.reloads.added += outcome.added.length;
    this.reloads.removed += outcome.removed.length;
    this.reloads.updated += outcome.updated.length;
  }

  recordPipelineRestart(
    channel: string,
    reason: string,
    meta: { attempt?: number; delayMs?: number } = {}
  ) {
    this.restarts += 1;
    this.lastRestartAt = Date.now();
    this.restartReasons.set(reason, (this.restartReasons.get(reason) ?? 0) + 1);
    this.restartsByChannel.set(channel, (this.restartsByChannel.get(channel) ?? 0) + 1);
    this.lastRestart = {
      channel,
      reason,
      attempt: typeof meta.attempt === 'number' ? meta.attempt : null,
      delayMs: typeof meta.delayMs === 'number' ? meta.delayMs : null
    };
    if (typeof meta.delayMs === 'number') {
      this.observeHistogram('pipeline.restart.delay', meta.delayMs);
    }
  }

  incrementDetectorCounter(detector: string, counter: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    const next = (state.counters.get(counter) ?? 0) + amount;
    if (!Number.isFinite(next)) {
      return;
    }
    state.counters.set(counter, next);
    state.lastRunAt = Date.now();
    if (next >= 0) {
      this.observeHistogram(`detector.${detector}.counter.${counter}`, next, COUNTER_HISTOGRAM);
    }
  }

  setDetectorGauge(detector: string, gauge: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.lastRunAt = Date.now();
    state.gauges.set(gauge, value);
  }

  recordDetectorError(detector: string, message: string) {
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    const now = Date.now();
    state.lastRunAt = now;
    state.lastErrorAt = now;
    state.lastErrorMessage = message;
    const next = (state.counters.get('errors') ?? 0) + 1;
    state.counters.set('errors', next);
    this.observeHistogram(`detector.${detector}.counter.errors`, next, COUNTER_HISTOGRAM);
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };
    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  observeHistogram(metric: string, value: number, config: HistogramConfig = DEFAULT_HISTOGRAM) {
    const histogramConfig = this.histogramConfigs.get(metric) ?? config;
    const histogram = this.ensureHistogram(metric, histogramConfig);

    if (Number.isFinite(value)) {
      const stats = this.histogramStats.get(metric);
      if (stats) {
        stats.sum += value;
        stats.count += 1;
      } else {
        this.histogramStats.set(metric, { sum: value, count: 1 });
      }
    }

    const bucketLabel = resolveHistogramBucket(value, histogramConfig);
    histogram.set(bucketLabel, (histogram.get(bucketLabel) ?? 0) + 1);
  }

  observeDetectorLatency(detector: string, durationMs: number) {
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.lastRunAt = Date.now();
    const latency: DetectorLatencyState = state.latency ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };
    latency.count += 1;
    latency.totalMs += durationMs;
    latency.minMs = Math.min(latency.minMs, durationMs);
    latency.maxMs = Math.max(latency.maxMs, durationMs);
    state.latency = latency;
    const histogram = state.latencyHistogram ?? new Map<string, number>();
    const bucketLabel = resolveHistogramBucket(durationMs, DEFAULT_HISTOGRAM);
    histogram.set(bucketLabel, (histogram.get(bucketLabel) ?? 0) + 1);
    state.latencyHistogram = histogram;
    const metricName = `detector.${detector}.latency`;
    this.observeLatency(metricName, durationMs);
    this.observeHistogram(metricName, durationMs);
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  exportHistogramForPrometheus(metric: string, options: PrometheusHistogramOptions = {}): string {
    const histogram = this.histograms.get(metric);
    if (!histogram) {
      return '';
    }
    const histogramConfig = this.histogramConfigs.get(metric) ?? DEFAULT_HISTOGRAM;
    const stats = this.histogramStats.get(metric);
    return formatPrometheusHistogram(metric, histogram, histogramConfig, stats, options);
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      byDetector: mapFromNested(this.logLevelByDetector),
      lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
      lastErrorMessage: this.lastErrorMessage,
      currentLevel: this.currentLogLevel,
      lastLevelChangeAt: this.lastLogLevelChangeAt
        ? new Date(this.lastLogLevelChangeAt).toISOString()
        : null,
      levelChanges: mapFrom(this.logLevelChangeCounters)
    };
  }

  exportLogLevelCountersForPrometheus(options: PrometheusLogLevelOptions = {}) {
    const baseLabels = options.labels ?? {};
    const lines: string[] = [];

    const levelSamples = orderedLogLevelEntries(this.logLevelCounters).map(([level, value], index) => ({
      value,
      labels: { level },
      sortKey: index
    }));
    lines.push(
      formatPrometheusGauge('logs.level.total', levelSamples, {
        metricName: options.levelMetricName ?? `${METRIC_PREFIX}_log_level_total`,
        help: options.levelHelp ?? 'Total log events grouped by Pino level',
        labels: baseLabels
      })
    );

    lines.push(
      formatPrometheusGauge('logs.level.state', [{ value: 1, labels: { level: this.currentLogLevel } }], {
        metricName: options.stateMetricName ?? `${METRIC_PREFIX}_log_level_state`,
        help: options.stateHelp ?? 'Current active Pino log level',
        labels: baseLabels
      })
    );

    const detectorSamples: PrometheusGaugeSample[] = [];
    for (const [detector, counters] of this.logLevelByDetector.entries()) {
      for (const [level, value] of counters.entries()) {
        detectorSamples.push({ value, labels: { detector, level } });
      }
    }
    lines.push(
      formatPrometheusGauge('logs.level.detector.total', detectorSamples, {
        metricName: options.detectorMetricName ?? `${METRIC_PREFIX}_log_level_detector_total`,
        help: options.detectorHelp ?? 'Total log events grouped by Pino level and detector',
        labels: baseLabels
      })
    );

    return lines.filter(Boolean).join('\n');
  }

  exportDetectorCountersForPrometheus(options: PrometheusDetectorOptions = {}) {
    const baseLabels = options.labels ?? {};
    const counterSamples: PrometheusGaugeSample[] = [];
    const gaugeSamples: PrometheusGaugeSample[] = [];

    for (const [detector, state] of this.detectorMetrics.entries()) {
      for (const [counter, value] of state.counters.entries()) {
        counterSamples.push({ value, labels: { detector, counter } });
      }
      for (const [gauge, value] of state.gauges.entries()) {
        gaugeSamples.push({ value, labels: { detector, gauge } });
      }
    }

    const lines = [
      formatPrometheusGauge('detector.counter.total', counterSamples, {
        metricName: options.counterMetricName ?? `${METRIC_PREFIX}_detector_counter_total`,
        help: options.counterHelp ?? 'Detector counter totals grouped by detector and counter name',
        labels: baseLabels
      }),
      formatPrometheusGauge('detector.gauge', gaugeSamples, {
        metricName: options.gaugeMetricName ?? `${METRIC_PREFIX}_detector_gauge`,
        help: options.gaugeHelp ?? 'Detector gauge values grouped by detector and gauge name',
        labels: baseLabels
      }),
      this.exportHistogramForPrometheus('scenario.confidence', {
        metricName: `${METRIC_PREFIX}_scenario_trigger_confidence`,
        help: 'Confidence of triggered scenario detections',
        labels: baseLabels
      })
    ];

    return lines.filter(Boolean).join('\n');
  }

  exportScenarioTriggersForPrometheus(options: PrometheusGaugeOptions = {}) {
    const samples = Array.from(this.scenarioTriggers.entries()).map(([scenario, value]) => ({
      value,
      labels: { scenario }
    }));
    return formatPrometheusGauge('scenario.trigger.total', samples, {
      metricName: options.metricName ?? `${METRIC_PREFIX}_scenario_trigger_total`,
      help: options.help ?? 'Triggered detections grouped by scenario',
      labels: options.labels
    });
  }

  exportPrometheus(options: { labels?: Record<string, string> } = {}) {
    const sections = [
      this.exportLogLevelCountersForPrometheus({ labels: options.labels }),
      this.exportDetectorCountersForPrometheus({ labels: options.labels }),
      this.exportScenarioTriggersForPrometheus({ labels: options.labels })
    ];
    for (const metric of this.detectorMetrics.keys()) {
      sections.push(
        this.exportHistogramForPrometheus(`detector.${metric}.latency`, {
          metricName: `${METRIC_PREFIX}_detector_latency_ms`,
          help: 'Detector latency in milliseconds',
          labels: { ...options.labels, detector: metric }
        })
      );
    }
    return `${sections.filter(Boolean).join('\n')}\n`;
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      events: {
        total: this.totalEvents,
        lastEventAt: this.lastEventTimestamp ? new Date(this.lastEventTimestamp).toISOString() : null,
        byDetector: mapFrom(this.eventsByDetector),
        bySeverity: mapFrom(this.eventsBySeverity),
        storeFailures: this.eventStoreFailures,
        lastStoreError: this.lastEventStoreError
      },
      logs: this.exportLogLevelMetrics(),
      latencies: mapFromLatencies(this.latencyStats),
      histograms: mapFromHistograms(this.histograms),
      pipeline: {
        total: this.restarts,
        lastRestartAt: this.lastRestartAt ? new Date(this.lastRestartAt).toISOString() : null,
        byReason: mapFrom(this.restartReasons),
        byChannel: mapFrom(this.restartsByChannel),
        lastRestart: this.lastRestart ? { ...this.lastRestart } : null
      },
      scenarios: {
        triggers: mapFrom(this.scenarioTriggers),
        reloads: {
          ...this.reloads,
          lastReloadAt: this.reloads.lastReloadAt ? new Date(this.reloads.lastReloadAt).toISOString() : null
        }
      },
      detectors: mapFromDetectors(this.detectorMetrics)
    };
  }

  private ensureHistogram(metric: string, config: HistogramConfig) {
    const histogram = this.histograms.get(metric);
    if (histogram) {
      this.histogramConfigs.set(metric, config);
      return histogram;
    }
    const map = new Map<string, number>();
    this.histograms.set(metric, map);
    this.histogramConfigs.set(metric, config);
    return map;
  }
}

type ReloadState = Omit<ScenarioReloadSnapshot, 'lastReloadAt'> & { lastReloadAt: number | null };

function createReloadState(): ReloadState {
  return {
    total: 0,
    failures: 0,
    lastReloadAt: null,
    lastError: null,
    added: 0,
    removed: 0,
    updated: 0
  };
}

function orderedLogLevelEntries(source: Map<string, number>): Array<[string, number]> {
  const remaining = new Map(source);
  const ordered: Array<[string, number]> = [];
  for (const level of PINO_LEVEL_ORDER) {
    ordered.push([level, remaining.get(level) ?? 0]);
    remaining.delete(level);
  }
  const extras = Array.from(remaining.entries()).sort(([a], [b]) => a.localeCompare(b));
  return ordered.concat(extras);
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  return Object.fromEntries(orderedLogLevelEntries(source));
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromNested(source: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, inner] of ordered) {
    result[key] = mapFrom(inner);
  }
  return result;
}

function toLatencyStats(stats: DetectorLatencyState): LatencyStats {
  return {
    count: stats.count,
    totalMs: stats.totalMs,
    minMs: stats.minMs === Number.POSITIVE_INFINITY ? 0 : stats.minMs,
    maxMs: stats.maxMs,
    averageMs: stats.count === 0 ? 0 : stats.totalMs / stats.count
  };
}

function mapFromLatencies(source: Map<string, DetectorLatencyState>): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [name, stats] of source.entries()) {
    result[name] = toLatencyStats(stats);
  }
  return result;
}

function mapFromHistograms(source: Map<string, Map<string, number>>): Record<string, HistogramSnapshot> {
  const result: Record<string, HistogramSnapshot> = {};
  for (const [metric, histogram] of source.entries()) {
    result[metric] = mapHistogram(histogram);
  }
  return result;
}

function mapHistogram(source: Map<string, number>): HistogramSnapshot {
  const ordered = Array.from(source.entries()).sort(([a], [b]) => compareHistogramKeys(a, b));
  return Object.fromEntries(ordered);
}

function mapFromDetectors(source: Map<string, DetectorMetricState>): Record<string, DetectorSnapshot> {
  const result: Record<string, DetectorSnapshot> = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  for (const [detector, state] of ordered) {
    result[detector] = {
      counters: mapFrom(state.counters),
      gauges: mapFrom(state.gauges),
      lastRunAt: state.lastRunAt ? new Date(state.lastRunAt).toISOString() : null,
      lastErrorAt: state.lastErrorAt ? new Date(state.lastErrorAt).toISOString() : null,
      lastErrorMessage: state.lastErrorMessage,
      latency: state.latency ? toLatencyStats(state.latency) : null,
      latencyHistogram: state.latencyHistogram ? mapHistogram(state.latencyHistogram) : {}
    };
  }
  return result;
}

function getDetectorMetricState(map: Map<string, DetectorMetricState>, detector: string): DetectorMetricState {
  const existing = map.get(detector);
  if (existing) {
    return existing;
  }
  const created: DetectorMetricState = {
    counters: new Map<string, number>(),
    gauges: new Map<string, number>(),
    lastRunAt: null,
    lastErrorAt: null,
    lastErrorMessage: null,
    latency: null,
    latencyHistogram: null
  };
  map.set(detector, created);
  return created;
}

function sanitizeHistogramLabels(labels?: Record<string, string>): Record<string, string> {
  if (!labels) {
    return {};
  }
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(labels)) {
    if (key === 'le') {
      continue;
    }
    result[key] = value;
  }
  return result;
}

function formatPrometheusHistogram(
  metricKey: string,
  histogram: Map<string, number>,
  config: HistogramConfig,
  stats: { sum: number; count: number } | undefined,
  options: PrometheusHistogramOptions
): string {
  const metricName = sanitizePrometheusMetricName(options.metricName ?? `${METRIC_PREFIX}_${metricKey}`);
  const lines: string[] = [];
  if (options.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(options.help)}`);
  }
  lines.push(`# TYPE ${metricName} histogram`);

  const baseLabels = sanitizeHistogramLabels(options.labels);
  const baseLabelString = formatPrometheusLabels(baseLabels);

  let cumulative = 0;
  let previous: number | undefined;
  for (const bucket of config.buckets) {
    cumulative += histogram.get(config.format(bucket, previous)) ?? 0;
    const bucketLabels = { ...baseLabels, le: formatPrometheusValue(bucket) };
    lines.push(`${metricName}_bucket${formatPrometheusLabels(bucketLabels)} ${formatPrometheusValue(cumulative)}`);
    previous = bucket;
  }

  const overflowCount = histogram.get(`${config.buckets[config.buckets.length - 1]}+`) ?? 0;
  const totalCount = Math.max(cumulative + overflowCount, stats?.count ?? 0);
  const infLabels = { ...baseLabels, le: '+Inf' };
  lines.push(`${metricName}_bucket${formatPrometheusLabels(infLabels)} ${formatPrometheusValue(totalCount)}`);
  lines.push(`${metricName}_sum${baseLabelString} ${formatPrometheusValue(stats?.sum ?? 0)}`);
  lines.push(`${metricName}_count${baseLabelString} ${formatPrometheusValue(totalCount)}`);

  return lines.join('\n');
}

function formatPrometheusGauge(
  metricKey: string,
  samples: PrometheusGaugeSample[],
  options: PrometheusGaugeOptions
): string {
  const filtered = samples.filter(sample => Number.isFinite(sample.value));
  if (filtered.length === 0) {
    return '';
  }

  const metricName = sanitizePrometheusMetricName(options.metricName ?? `${METRIC_PREFIX}_${metricKey}`);
  const baseLabels = sanitizeHistogramLabels(options.labels);

  const normalized = filtered.map(sample => ({
    value: sample.value,
    labelString: formatPrometheusLabels({ ...baseLabels, ...sanitizeHistogramLabels(sample.labels) }),
    sortKey: sample.sortKey
  }));

  normalized.sort((a, b) => {
    const sortOrder = compareGaugeSortKey(a.sortKey, b.sortKey);
    if (sortOrder !== 0) {
      return sortOrder;
    }
    return a.labelString.localeCompare(b.labelString);
  });

  const lines: string[] = [];
  if (options.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(options.help)}`);
  }
  lines.push(`# TYPE ${metricName} gauge`);
  for (const sample of normalized) {
    lines.push(`${metricName}${sample.labelString} ${formatPrometheusValue(sample.value)}`);
  }
  return lines.join('\n');
}

function compareGaugeSortKey(a: number | string | undefined, b: number | string | undefined): number {
  if (a === undefined && b === undefined) {
    return 0;
  }
  if (a === undefined) {
    return 1;
  }
  if (b === undefined) {
    return -1;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const aStr = String(a);
  const bStr = String(b);
  if (aStr === bStr) {
    return 0;
  }
  return aStr < bStr ? -1 : 1;
}

function sanitizePrometheusMetricName(name: string): string {
  const collapsed = name
    .replace(/[^A-Za-z0-9_]/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
  if (!collapsed) {
    return `${METRIC_PREFIX}_metric`;
  }
  return /^[0-9]/.test(collapsed) ? `${METRIC_PREFIX}_${collapsed}` : collapsed;
}

function sanitizePrometheusLabelName(name: string): string {
  const collapsed = name
    .replace(/[^A-Za-z0-9_]/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
  if (!collapsed) {
    return 'label';
  }
  return /^[0-9]/.test(collapsed) ? `_${collapsed}` : collapsed;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels).map(([key, value]) => [sanitizePrometheusLabelName(key), value] as const);
  if (entries.length === 0) {
    return '';
  }
  entries.sort(([a], [b]) => a.localeCompare(b));
  return `{${entries.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`).join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

function compareHistogramKeys(a: string, b: string) {
  const extract = (key: string): [number, number] => {
    if (key.startsWith('<')) {
      return [parseFloat(key.slice(1)), -1];
    }
    if (key.endsWith('+')) {
      return [parseFloat(key.slice(0, -1)), Number.POSITIVE_INFINITY];
    }
    const [start, end] = key.split('-').map(Number);
    return [start, end ?? start];
  };

  const [aStart, aEnd] = extract(a);
  const [bStart, bEnd] = extract(b);
  if (aStart === bStart) {
    return aEnd - bEnd;
  }
  return aStart - bStart;
}

function resolveHistogramBucket(value: number, config: HistogramConfig) {
  const { buckets, format } = config;
  let previous: number | undefined;
  for (const bucket of buckets) {
    if (value < bucket) {
      return format(bucket, previous);
    }
    previous = bucket;
  }
  return `${buckets[buckets.length - 1]}+`;
}

const defaultRegistry = new MetricsRegistry();

export type {
  DetectorSnapshot,
  HistogramConfig,
  HistogramSnapshot,
  LatencyStats,
  MetricsSnapshot,
  PrometheusDetectorOptions,
  PrometheusGaugeOptions,
  PrometheusHistogramOptions,
  PrometheusLogLevelOptions
};
export { MetricsRegistry, resolveHistogramBucket };
export default defaultRegistry;
