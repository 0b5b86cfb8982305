import { fileURLToPath } from 'node:url';
import loggerModule, { setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import configManager, {
  loadConfigFromFile,
  type ConfigManager,
  type ConfigReloadEvent,
  type ScenewatchConfig
} from './config/index.js';
import { markServiceStatus, registerHealthIndicator, registerShutdownHook, runShutdownHooks } from './app.js';
import { AlertManager } from './alerts/alertManager.js';
import { DetectionEngine } from './detection/engine.js';
import { ScenarioHotReloader } from './detection/hotReload.js';
import { ScenarioStore } from './detection/scenarioStore.js';
import { ClipScoreProvider } from './models/clipScoreProvider.js';
import type { ScoreProvider } from './models/scoreProvider.js';
import { DetectionPipeline } from './pipeline/detectionPipeline.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import { VideoSource, type RecoverEvent } from './video/source.js';

type DetectorLogger = Pick<typeof loggerModule, 'info' | 'warn' | 'error'>;

export interface DetectorStartOptions {
  configManager?: ConfigManager;
  logger?: DetectorLogger;
  createProvider?: (config: ScenewatchConfig) => Promise<ScoreProvider<Buffer>>;
  createSource?: (config: ScenewatchConfig) => VideoSource;
  /** Skip the HTTP API, e.g. for one-off runs. */
  http?: boolean;
}

export type DetectorRuntime = {
  engine: DetectionEngine<Buffer>;
  store: ScenarioStore;
  pipeline: DetectionPipeline;
  alerts: AlertManager;
  source: VideoSource;
  reloader: ScenarioHotReloader<Buffer>;
  http: HttpServerRuntime | null;
  stop: () => Promise<void>;
};

export function createVideoSource(config: ScenewatchConfig) {
  const ffmpegConfig = config.video.ffmpeg;
  return new VideoSource({
    file: config.video.input,
    framesPerSecond: config.video.framesPerSecond,
    channel: config.video.channel,
    inputArgs: ffmpegConfig?.inputArgs,
    rtspTransport: ffmpegConfig?.rtspTransport,
    binaryPath: ffmpegConfig?.binaryPath,
    idleTimeoutMs: ffmpegConfig?.idleTimeoutMs,
    startTimeoutMs: ffmpegConfig?.startTimeoutMs,
    watchdogTimeoutMs: ffmpegConfig?.watchdogTimeoutMs,
    forceKillTimeoutMs: ffmpegConfig?.forceKillTimeoutMs,
    restartDelayMs: ffmpegConfig?.restartDelayMs,
    restartMaxDelayMs: ffmpegConfig?.restartMaxDelayMs,
    restartJitterFactor: ffmpegConfig?.restartJitterFactor
  });
}

async function createClipProvider(config: ScenewatchConfig): Promise<ScoreProvider<Buffer>> {
  return ClipScoreProvider.create({
    imageModelPath: config.model.imageModelPath,
    promptEmbeddingsPath: config.model.promptEmbeddingsPath,
    imageSize: config.model.imageSize
  });
}

export async function startDetector(options: DetectorStartOptions = {}): Promise<DetectorRuntime> {
  const logger = options.logger ?? loggerModule;
  const manager = options.configManager ?? configManager;
  const config = manager.getConfig();

  const provider = await (options.createProvider ?? createClipProvider)(config);
  const store = new ScenarioStore(config.detection.scenarios, { historySize: config.detection.historySize });
  const engine = new DetectionEngine<Buffer>(store, provider, {
    enabled: config.detection.enabled,
    temperature: config.model.temperature
  });
  const alerts = new AlertManager({
    ignoreNames: config.alerts?.ignoreNames,
    saveFrames: config.alerts?.saveFrames,
    snapshotDir: config.alerts?.snapshotDir,
    historyLimit: config.alerts?.historyLimit,
    source: config.video.channel
  });
  const pipeline = new DetectionPipeline(engine, alerts, {
    minFrameIntervalMs: config.detection.minFrameIntervalMs
  });
  const source = (options.createSource ?? createVideoSource)(config);
  const reloader = new ScenarioHotReloader<Buffer>(engine, manager);

  source.on('error', (error: Error) => {
    logger.warn({ err: error, channel: config.video.channel }, 'Video source error');
  });
  source.on('recover', (event: RecoverEvent) => {
    logger.warn(event, 'Video source restarting');
  });

  const handleConfigReload = ({ previous, next }: ConfigReloadEvent) => {
    if (previous.logging.level === next.logging.level) {
      return;
    }
    try {
      setLogLevel(next.logging.level);
    } catch (error) {
      logger.warn({ err: error, level: next.logging.level }, 'Failed to apply configured log level');
    }
  };
  const handleConfigError = (error: Error) => {
    logger.error({ err: error, path: manager.getPath() }, 'Configuration file rejected; previous version restored');
  };
  manager.on('reload', handleConfigReload);
  manager.on('error', handleConfigError);

  pipeline.attach(source);
  reloader.start();

  let http: HttpServerRuntime | null = null;
  if (options.http !== false) {
    http = await startHttpServer({
      engine,
      reloader,
      scenarioSource: () => loadConfigFromFile(manager.getPath()).detection.scenarios,
      port: config.server?.port,
      host: config.server?.host
    });
  }

  const unregisterHealth = registerHealthIndicator('detector', () => {
    const info = engine.getDetectorInfo();
    return {
      status: info.enabled && info.enabledScenarios > 0 ? 'ok' : 'degraded',
      details: { ...info, pipeline: pipeline.getStats() }
    };
  });

  let stopped = false;
  const stop = async () => {
    if (stopped) {
      return;
    }
    stopped = true;
    source.stop();
    await pipeline.detach();
    await reloader.stop();
    manager.off('reload', handleConfigReload);
    manager.off('error', handleConfigError);
    unregisterHealth();
    if (http) {
      await http.close();
    }
    logger.info('Detector stopped');
  };
  registerShutdownHook('detector', stop);

  source.start();
  markServiceStatus('ok');
  logger.info(
    { scenarios: store.size, enabledScenarios: store.active().length, input: config.video.input },
    'Detector started'
  );

  return { engine, store, pipeline, alerts, source, reloader, http, stop };
}

export async function runUntilSignal(options: DetectorStartOptions = {}) {
  const runtime = await metrics.time('detector.startup.ms', () => startDetector(options));

  await new Promise<void>(resolve => {
    const handleSignal = (signal: NodeJS.Signals) => {
      loggerModule.info({ signal }, 'Stopping detector');
      runShutdownHooks({ reason: 'signal', signal }).then(
        () => resolve(),
        error => {
          loggerModule.error({ err: error }, 'Shutdown failed');
          resolve();
        }
      );
    };
    process.once('SIGINT', handleSignal);
    process.once('SIGTERM', handleSignal);
  });

  return runtime;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  runUntilSignal().catch(error => {
    loggerModule.error({ err: error }, 'Failed to start detector');
    process.exitCode = 1;
  });
}
