import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import logger from '../logger.js';
import { collectScenarioIssues } from '../detection/definitions.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type VideoFfmpegConfig = {
  inputArgs?: string[];
  rtspTransport?: string;
  startTimeoutMs?: number;
  idleTimeoutMs?: number;
  watchdogTimeoutMs?: number;
  restartDelayMs?: number;
  restartMaxDelayMs?: number;
  restartJitterFactor?: number;
  forceKillTimeoutMs?: number;
  /** Explicit ffmpeg binary; PATH lookup otherwise. */
  binaryPath?: string;
};

export type VideoConfig = {
  input: string;
  channel?: string;
  framesPerSecond: number;
  ffmpeg?: VideoFfmpegConfig;
};

export type ModelConfig = {
  imageModelPath: string;
  promptEmbeddingsPath: string;
  imageSize?: number;
  temperature?: number;
};

export type DetectionConfig = {
  enabled?: boolean;
  historySize?: number;
  minFrameIntervalMs?: number;
  /** Either a list of definitions or a record keyed by scenario id. */
  scenarios: unknown;
};

export type AlertsConfig = {
  ignoreNames?: string[];
  saveFrames?: boolean;
  snapshotDir?: string;
  historyLimit?: number;
};

export type ServerConfig = {
  host?: string;
  port?: number;
};

export type ScenewatchConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  video: VideoConfig;
  model: ModelConfig;
  detection: DetectionConfig;
  alerts?: AlertsConfig;
  server?: ServerConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
};

const ffmpegSchema: JsonSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    inputArgs: { type: 'array', items: { type: 'string' } },
    rtspTransport: { type: 'string', enum: ['tcp', 'udp', 'http', 'https'] },
    startTimeoutMs: { type: 'number', minimum: 0 },
    idleTimeoutMs: { type: 'number', minimum: 0 },
    watchdogTimeoutMs: { type: 'number', minimum: 0 },
    restartDelayMs: { type: 'number', minimum: 0 },
    restartMaxDelayMs: { type: 'number', minimum: 0 },
    restartJitterFactor: { type: 'number', minimum: 0, maximum: 1 },
    forceKillTimeoutMs: { type: 'number', minimum: 0 },
    binaryPath: { type: 'string' }
  }
};

const scenewatchConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'database', 'video', 'model', 'detection'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: {
          type: 'string',
          enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
        }
      }
    },
    database: {
      type: 'object',
      required: ['path'],
      additionalProperties: false,
      properties: {
        path: { type: 'string' }
      }
    },
    video: {
      type: 'object',
      required: ['input', 'framesPerSecond'],
      additionalProperties: false,
      properties: {
        input: { type: 'string' },
        channel: { type: 'string' },
        framesPerSecond: { type: 'number', minimum: 0 },
        ffmpeg: ffmpegSchema
      }
    },
    model: {
      type: 'object',
      required: ['imageModelPath', 'promptEmbeddingsPath'],
      additionalProperties: false,
      properties: {
        imageModelPath: { type: 'string' },
        promptEmbeddingsPath: { type: 'string' },
        imageSize: { type: 'number', minimum: 1 },
        temperature: { type: 'number', minimum: 0 }
      }
    },
    detection: {
      type: 'object',
      required: ['scenarios'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        historySize: { type: 'number', minimum: 1 },
        minFrameIntervalMs: { type: 'number', minimum: 0 },
        scenarios: { type: ['array', 'object'] }
      }
    },
    alerts: {
      type: 'object',
      additionalProperties: false,
      properties: {
        ignoreNames: { type: 'array', items: { type: 'string' } },
        saveFrames: { type: 'boolean' },
        snapshotDir: { type: 'string' },
        historyLimit: { type: 'number', minimum: 1 }
      }
    },
    server: {
      type: 'object',
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535 }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  switch (type) {
    case 'object': {
      if (!isRecord(value)) {
        errors.push(`${pathLabel} must be an object`);
        return errors;
      }

      for (const key of schema.required ?? []) {
        if (!(key in value)) {
          errors.push(`${pathLabel}.${key} is required`);
        }
      }

      const properties = schema.properties ?? {};
      const extra = schema.additionalProperties;
      for (const [key, child] of Object.entries(value)) {
        const childSchema = properties[key];
        if (childSchema) {
          errors.push(...validateAgainstSchema(childSchema, child, `${pathLabel}.${key}`));
        } else if (extra === false) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        } else if (extra && typeof extra === 'object') {
          errors.push(...validateAgainstSchema(extra, child, `${pathLabel}.${key}`));
        }
      }
      return errors;
    }
    case 'array': {
      if (!Array.isArray(value)) {
        errors.push(`${pathLabel} must be an array`);
        return errors;
      }
      const items = schema.items;
      if (items) {
        value.forEach((item, index) => {
          errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
        });
      }
      return errors;
    }
    case 'number': {
      if (typeof value !== 'number' || Number.isNaN(value)) {
        errors.push(`${pathLabel} must be a number`);
        return errors;
      }
      if (typeof schema.minimum === 'number' && value < schema.minimum) {
        errors.push(`${pathLabel} must be >= ${schema.minimum}`);
      }
      if (typeof schema.maximum === 'number' && value > schema.maximum) {
        errors.push(`${pathLabel} must be <= ${schema.maximum}`);
      }
      return errors;
    }
    case 'string': {
      if (typeof value !== 'string') {
        errors.push(`${pathLabel} must be a string`);
        return errors;
      }
      if (schema.enum && !schema.enum.includes(value)) {
        errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
      }
      return errors;
    }
    case 'boolean': {
      if (typeof value !== 'boolean') {
        errors.push(`${pathLabel} must be a boolean`);
      }
      return errors;
    }
  }
}

function matchesSchema(value: unknown, errors: string[]): value is ScenewatchConfig {
  errors.push(...validateAgainstSchema(scenewatchConfigSchema, value, 'config'));
  return errors.length === 0;
}

export function validateConfig(config: unknown): asserts config is ScenewatchConfig {
  const errors: string[] = [];
  if (!matchesSchema(config, errors)) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): ScenewatchConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): ScenewatchConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: ScenewatchConfig) {
  const messages = collectScenarioIssues(config.detection.scenarios, 'config.detection.scenarios');

  const temperature = config.model.temperature;
  if (typeof temperature === 'number' && temperature <= 0) {
    messages.push('config.model.temperature must be greater than 0');
  }

  if (config.video.framesPerSecond <= 0) {
    messages.push('config.video.framesPerSecond must be greater than 0');
  }

  const ffmpeg = config.video.ffmpeg;
  if (
    ffmpeg &&
    typeof ffmpeg.restartDelayMs === 'number' &&
    typeof ffmpeg.restartMaxDelayMs === 'number' &&
    ffmpeg.restartMaxDelayMs < ffmpeg.restartDelayMs
  ) {
    messages.push('config.video.ffmpeg.restartMaxDelayMs must be >= restartDelayMs');
  }

  const historySize = config.detection.historySize;
  if (typeof historySize === 'number' && !Number.isInteger(historySize)) {
    messages.push('config.detection.historySize must be an integer');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env) {
  const configured = env.SCENEWATCH_CONFIG;
  return path.resolve(
    process.cwd(),
    configured && configured.trim().length > 0 ? configured : 'config/default.json'
  );
}

export type ConfigReloadEvent = {
  previous: ScenewatchConfig;
  next: ScenewatchConfig;
};

/**
 * Owns the on-disk configuration file. `watch()` re-reads it on change; an
 * invalid edit is reported through `error` and the last good contents are
 * written back.
 */
export class ConfigManager extends EventEmitter {
  private currentConfig: ScenewatchConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath = resolveConfigPath()) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): ScenewatchConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): ScenewatchConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        this.reportError(error);
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private reportError(error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
      return;
    }
    logger.error({ err, path: this.filePath }, 'Configuration reload failed');
  }

  private recreateWatcher() {
    this.closeWatcher();
    this.watcher = this.createWatcher();
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.recreateWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: ScenewatchConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    const config = parseConfig(contents);
    return { config, raw: contents };
  }

  private restorePreviousConfig() {
    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      this.reportError(error);
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

const defaultManager = new ConfigManager();

export default defaultManager;
export { scenewatchConfigSchema };
