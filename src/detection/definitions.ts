import { ScenarioValidationError } from './errors.js';
import { ALERT_LEVELS, type AlertLevel, type ScenarioDefinition } from './types.js';

export const SCENARIO_DEFAULTS = {
  cooldown: 30,
  consecutiveFrames: 1,
  alertLevel: 'medium',
  enabled: true
} as const satisfies Partial<ScenarioDefinition>;

export type ScenarioInput = {
  id?: string;
  name?: string;
  prompt: string;
  threshold: number;
  cooldown?: number;
  consecutiveFrames?: number;
  alertLevel?: AlertLevel;
  enabled?: boolean;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAlertLevel(value: unknown): value is AlertLevel {
  return ALERT_LEVELS.some(level => level === value);
}

function readNumber(
  value: unknown,
  label: string,
  issues: string[],
  accept: (value: number) => boolean,
  requirement: string
): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value) || !accept(value)) {
    issues.push(`${label} must be ${requirement}`);
    return null;
  }
  return value;
}

/**
 * Reads one scenario entry, pushing every problem found onto `issues`.
 * Returns null when the entry is unusable. `key` is the id implied by the
 * surrounding container when definitions are keyed by id.
 */
export function readScenarioDefinition(
  raw: unknown,
  label: string,
  issues: string[],
  key?: string
): ScenarioDefinition | null {
  if (!isRecord(raw)) {
    issues.push(`${label} must be an object`);
    return null;
  }

  let id: string | null = null;
  const rawId = raw.id ?? key;
  if (typeof rawId !== 'string' || rawId.trim().length === 0) {
    issues.push(`${label}.id must be a non-empty string`);
  } else if (typeof key === 'string' && rawId !== key) {
    issues.push(`${label}.id "${rawId}" does not match its key "${key}"`);
  } else {
    id = rawId;
  }

  let name: string | null = null;
  const rawName = raw.name ?? id;
  if (typeof rawName === 'string') {
    name = rawName;
  } else if (raw.name !== undefined) {
    issues.push(`${label}.name must be a string`);
  }

  let prompt: string | null = null;
  if (raw.prompt === undefined) {
    issues.push(`${label}.prompt is required`);
  } else if (typeof raw.prompt !== 'string') {
    issues.push(`${label}.prompt must be a string`);
  } else {
    prompt = raw.prompt;
  }

  let threshold: number | null = null;
  if (raw.threshold === undefined) {
    issues.push(`${label}.threshold is required`);
  } else {
    threshold = readNumber(
      raw.threshold,
      `${label}.threshold`,
      issues,
      value => value >= 0 && value <= 1,
      'a number between 0 and 1'
    );
  }

  const cooldown = readNumber(
    raw.cooldown ?? SCENARIO_DEFAULTS.cooldown,
    `${label}.cooldown`,
    issues,
    value => value >= 0,
    'a non-negative number of seconds'
  );
  const consecutiveFrames = readNumber(
    raw.consecutiveFrames ?? SCENARIO_DEFAULTS.consecutiveFrames,
    `${label}.consecutiveFrames`,
    issues,
    value => Number.isInteger(value) && value >= 1,
    'a positive integer'
  );

  let alertLevel: AlertLevel | null = null;
  const rawLevel = raw.alertLevel ?? SCENARIO_DEFAULTS.alertLevel;
  if (isAlertLevel(rawLevel)) {
    alertLevel = rawLevel;
  } else {
    issues.push(`${label}.alertLevel must be one of ${ALERT_LEVELS.join(', ')}`);
  }

  let enabled: boolean | null = null;
  const rawEnabled = raw.enabled ?? SCENARIO_DEFAULTS.enabled;
  if (typeof rawEnabled === 'boolean') {
    enabled = rawEnabled;
  } else {
    issues.push(`${label}.enabled must be a boolean`);
  }

  if (
    id === null ||
    name === null ||
    prompt === null ||
    threshold === null ||
    cooldown === null ||
    consecutiveFrames === null ||
    alertLevel === null ||
    enabled === null
  ) {
    return null;
  }

  return { id, name, prompt, threshold, cooldown, consecutiveFrames, alertLevel, enabled };
}

/**
 * Lists every problem with a definition set without throwing. Accepts an array of
 * entries or an object keyed by scenario id.
 */
export function collectScenarioIssues(raw: unknown, label = 'scenarios'): string[] {
  const issues: string[] = [];
  readDefinitionSet(raw, label, issues);
  return issues;
}

export function parseScenarioDefinitions(raw: unknown, label = 'scenarios'): ScenarioDefinition[] {
  const issues: string[] = [];
  const definitions = readDefinitionSet(raw, label, issues);
  if (issues.length > 0) {
    throw new ScenarioValidationError(issues);
  }
  return definitions;
}

export function parseScenarioDefinition(id: string, raw: unknown): ScenarioDefinition {
  const issues: string[] = [];
  const definition = readScenarioDefinition(raw, `scenarios.${id}`, issues, id);
  if (!definition) {
    throw new ScenarioValidationError(issues);
  }
  return definition;
}

function readDefinitionSet(raw: unknown, label: string, issues: string[]): ScenarioDefinition[] {
  let entries: Array<{ value: unknown; label: string; key?: string }>;
  if (Array.isArray(raw)) {
    entries = raw.map((value, index) => ({ value, label: `${label}[${index}]` }));
  } else if (isRecord(raw)) {
    entries = Object.entries(raw).map(([key, value]) => ({ value, label: `${label}.${key}`, key }));
  } else {
    issues.push(`${label} must be a list of scenario definitions`);
    return [];
  }

  if (entries.length === 0) {
    issues.push(`${label} must define at least one scenario`);
    return [];
  }

  const definitions: ScenarioDefinition[] = [];
  const seen = new Set<string>();
  for (const entry of entries) {
    const definition = readScenarioDefinition(entry.value, entry.label, issues, entry.key);
    if (!definition) {
      continue;
    }
    if (seen.has(definition.id)) {
      issues.push(`${label} contains duplicate scenario id "${definition.id}"`);
      continue;
    }
    seen.add(definition.id);
    definitions.push(definition);
  }
  return definitions;
}

export function sameScenarioConfig(a: ScenarioDefinition, b: ScenarioDefinition): boolean {
  return (
    a.id === b.id &&
    a.name === b.name &&
    a.prompt === b.prompt &&
    a.threshold === b.threshold &&
    a.cooldown === b.cooldown &&
    a.consecutiveFrames === b.consecutiveFrames &&
    a.alertLevel === b.alertLevel &&
    a.enabled === b.enabled
  );
}
