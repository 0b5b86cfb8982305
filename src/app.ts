import config from 'config';
import { fileURLToPath } from 'node:url';
import eventBus from './eventBus.js';
import logger from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import { validateConfig, type ScenewatchConfig } from './config/index.js';
import { parseScenarioDefinitions } from './detection/definitions.js';

export type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

export type HealthIndicatorContext = {
  service: {
    status: HealthStatus;
    startedAt: number | null;
  };
  metrics?: MetricsSnapshot;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type HealthCheck = { name: string; status: HealthStatus; details?: Record<string, unknown> };

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

export type ShutdownResult = { name: string; status: 'ok' | 'error'; error?: Error };

type Registered<T> = {
  name: string;
  value: T;
};

const healthIndicators: Registered<HealthIndicator>[] = [];
const shutdownHooks: Registered<ShutdownHook>[] = [];

const service: HealthIndicatorContext['service'] = {
  status: 'starting',
  startedAt: null
};

function register<T>(list: Registered<T>[], name: string, value: T) {
  const existingIndex = list.findIndex(entry => entry.name === name);
  if (existingIndex >= 0) {
    list[existingIndex] = { name, value };
  } else {
    list.push({ name, value });
  }

  return () => {
    const index = list.findIndex(item => item.name === name);
    if (index >= 0) {
      list.splice(index, 1);
    }
  };
}

function toError(error: unknown) {
  return error instanceof Error ? error : new Error(String(error));
}

export function getServiceState() {
  return { ...service };
}

export function markServiceStatus(status: HealthStatus) {
  service.status = status;
  if (status === 'ok' && service.startedAt === null) {
    service.startedAt = Date.now();
  }
}

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  return register(healthIndicators, name, indicator);
}

export async function collectHealthChecks(context: HealthIndicatorContext = { service: getServiceState() }) {
  const results: HealthCheck[] = [];
  const enrichedContext: HealthIndicatorContext = {
    ...context,
    metrics: context.metrics ?? metrics.snapshot()
  };
  for (const entry of healthIndicators) {
    try {
      const result = await entry.value(enrichedContext);
      results.push({ name: entry.name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'degraded',
        details: { error: toError(error).message }
      });
    }
  }
  return results;
}

/** Overall status: the service status unless an indicator reports otherwise. */
export function summarizeHealth(serviceStatus: HealthStatus, checks: HealthCheck[]): HealthStatus {
  if (serviceStatus !== 'ok') {
    return serviceStatus;
  }
  return checks.every(check => check.status === 'ok') ? 'ok' : 'degraded';
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  return register(shutdownHooks, name, hook);
}

/** Runs hooks in reverse registration order; a failing hook does not stop the rest. */
export async function runShutdownHooks(context: ShutdownHookContext) {
  markServiceStatus('stopping');
  const results: ShutdownResult[] = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.value(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      const err = toError(error);
      logger.error({ err, hook: entry.name }, 'Shutdown hook failed');
      results.push({ name: entry.name, status: 'error', error: err });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
  service.status = 'starting';
  service.startedAt = null;
}

export async function bootstrap(): Promise<ScenewatchConfig> {
  logger.info('SceneWatch bootstrap starting');

  const loadedConfig: unknown = config.util.toObject(config);
  validateConfig(loadedConfig);
  const scenarios = parseScenarioDefinitions(loadedConfig.detection.scenarios, 'config.detection.scenarios');

  eventBus.emitEvent({
    source: 'system',
    detector: 'bootstrap',
    severity: 'info',
    message: 'system up',
    meta: {
      scenarios: scenarios.map(scenario => scenario.id),
      enabledScenarios: scenarios.filter(scenario => scenario.enabled).length
    }
  });

  logger.info('Bootstrap completed');
  return loadedConfig;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  bootstrap().catch(error => {
    logger.error({ err: error }, 'Bootstrap failed');
    process.exitCode = 1;
  });
}
