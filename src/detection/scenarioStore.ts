import { UnknownScenarioError } from './errors.js';
import {
  parseScenarioDefinition,
  parseScenarioDefinitions,
  sameScenarioConfig,
  type ScenarioInput
} from './definitions.js';
import { DEFAULT_HISTORY_SIZE, Scenario, ScenarioState } from './scenario.js';
import type { ReloadReport, ScenarioDefinition } from './types.js';

export interface ScenarioStoreOptions {
  historySize?: number;
}

/**
 * Owns the id to Scenario table of one stream. Every mutation builds a new table
 * and replaces the old one with a single assignment, so readers never see a
 * partially applied change.
 */
export class ScenarioStore {
  private table: ReadonlyMap<string, Scenario> = new Map();
  private historySize: number;

  constructor(definitions?: unknown, options: ScenarioStoreOptions = {}) {
    this.historySize = checkHistorySize(options.historySize ?? DEFAULT_HISTORY_SIZE);
    if (definitions !== undefined) {
      this.reload(definitions);
    }
  }

  getHistorySize(): number {
    return this.historySize;
  }

  /** Applies to existing scenarios too; their oldest history entries are trimmed. */
  setHistorySize(historySize: number) {
    this.historySize = checkHistorySize(historySize);
    for (const scenario of this.table.values()) {
      scenario.state.resize(this.historySize);
    }
  }

  get size(): number {
    return this.table.size;
  }

  has(id: string): boolean {
    return this.table.has(id);
  }

  get(id: string): Scenario | undefined {
    return this.table.get(id);
  }

  require(id: string): Scenario {
    const scenario = this.table.get(id);
    if (!scenario) {
      throw new UnknownScenarioError(id);
    }
    return scenario;
  }

  list(): Scenario[] {
    return Array.from(this.table.values());
  }

  /** Enabled scenarios in insertion order. */
  active(): Scenario[] {
    return this.list().filter(scenario => scenario.enabled);
  }

  register(id: string, input: ScenarioInput | ScenarioDefinition): Scenario {
    const definition = parseScenarioDefinition(id, { ...input, id });
    const existing = this.table.get(id);
    const scenario = existing
      ? existing.withDefinition(definition)
      : new Scenario(definition, new ScenarioState(this.historySize));
    const next = new Map(this.table);
    next.set(id, scenario);
    this.table = next;
    return scenario;
  }

  remove(id: string): boolean {
    if (!this.table.has(id)) {
      return false;
    }
    const next = new Map(this.table);
    next.delete(id);
    this.table = next;
    return true;
  }

  reload(definitions: unknown): ReloadReport {
    const parsed = parseScenarioDefinitions(definitions);
    const report: ReloadReport = { added: [], removed: [], updated: [], unchanged: [] };
    const next = new Map<string, Scenario>();

    for (const definition of parsed) {
      const existing = this.table.get(definition.id);
      if (!existing) {
        report.added.push(definition.id);
        next.set(definition.id, new Scenario(definition, new ScenarioState(this.historySize)));
        continue;
      }
      if (sameScenarioConfig(existing.definition, definition)) {
        report.unchanged.push(definition.id);
        next.set(definition.id, existing);
      } else {
        report.updated.push(definition.id);
        next.set(definition.id, existing.withDefinition(definition));
      }
    }

    for (const id of this.table.keys()) {
      if (!next.has(id)) {
        report.removed.push(id);
      }
    }

    this.table = next;
    return report;
  }

  setEnabled(id: string, enabled: boolean): Scenario {
    return this.register(id, { ...this.require(id).toDefinition(), enabled });
  }

  setThreshold(id: string, threshold: number): Scenario {
    return this.register(id, { ...this.require(id).toDefinition(), threshold });
  }

  reset(id: string) {
    this.require(id).reset();
  }

  resetAll() {
    for (const scenario of this.table.values()) {
      scenario.reset();
    }
  }

  toDefinitions(): ScenarioDefinition[] {
    return this.list().map(scenario => scenario.toDefinition());
  }
}

function checkHistorySize(historySize: number): number {
  if (!Number.isInteger(historySize) || historySize < 1) {
    throw new Error(`historySize must be a positive integer (received ${historySize})`);
  }
  return historySize;
}
