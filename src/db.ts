import Database from 'better-sqlite3';
import config from 'config';
import fs from 'node:fs';
import path from 'node:path';
import type { EventRecord, EventSeverity } from './types.js';

const IN_MEMORY = ':memory:';

const dbPath = config.get<string>('database.path');
if (dbPath !== IN_MEMORY) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

const db = new Database(dbPath);

export const databasePath = dbPath === IN_MEMORY ? dbPath : path.resolve(dbPath);

db.exec(`
  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    ts INTEGER NOT NULL,
    source TEXT NOT NULL,
    detector TEXT NOT NULL,
    severity TEXT NOT NULL,
    message TEXT NOT NULL,
    meta TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_events_ts ON events (ts);
  CREATE INDEX IF NOT EXISTS idx_events_source_detector ON events (source, detector);
  CREATE INDEX IF NOT EXISTS idx_events_scenario ON events (json_extract(meta, '$.scenarioId'));
`);

type EventRow = {
  id: number;
  ts: number;
  source: string;
  detector: string;
  severity: string;
  message: string;
  meta: string | null;
};

type InsertParams = Omit<EventRow, 'id'>;

export type EventRecordWithId = EventRecord & { id: number };

export interface ListEventsOptions {
  limit?: number;
  offset?: number;
  detector?: string;
  source?: string;
  severity?: EventSeverity;
  scenario?: string;
  since?: number;
  until?: number;
  search?: string;
}

export interface PaginatedEvents {
  items: EventRecordWithId[];
  total: number;
}

const insertStatement = db.prepare<InsertParams>(
  'INSERT INTO events (ts, source, detector, severity, message, meta) VALUES (@ts, @source, @detector, @severity, @message, @meta)'
);

const deleteOlderThanStatement = db.prepare<{ cutoff: number }>('DELETE FROM events WHERE ts < @cutoff');

const getEventStatement = db.prepare<[number], EventRow>(
  'SELECT id, ts, source, detector, severity, message, meta FROM events WHERE id = ?'
);

export function storeEvent(event: EventRecord): number | null {
  const result = insertStatement.run({
    ts: event.ts,
    source: event.source,
    detector: event.detector,
    severity: event.severity,
    message: event.message,
    meta: event.meta ? JSON.stringify(event.meta) : null
  });

  if (typeof result.lastInsertRowid === 'bigint') {
    return Number(result.lastInsertRowid);
  }
  return Number.isFinite(result.lastInsertRowid) ? result.lastInsertRowid : null;
}

export function listEvents(options: ListEventsOptions = {}): PaginatedEvents {
  const filters: string[] = [];
  const params: Record<string, string | number> = {};

  if (options.detector) {
    filters.push('detector = @detector');
    params.detector = options.detector;
  }

  if (options.source) {
    filters.push('source = @source');
    params.source = options.source;
  }

  if (options.severity) {
    filters.push('severity = @severity');
    params.severity = options.severity;
  }

  if (options.scenario) {
    filters.push("json_extract(meta, '$.scenarioId') = @scenario");
    params.scenario = options.scenario;
  }

  if (typeof options.since === 'number') {
    filters.push('ts >= @since');
    params.since = options.since;
  }

  if (typeof options.until === 'number') {
    filters.push('ts <= @until');
    params.until = options.until;
  }

  if (options.search) {
    filters.push(
      `(
        LOWER(message) LIKE @search ESCAPE '\\' OR
        LOWER(detector) LIKE @search ESCAPE '\\' OR
        LOWER(source) LIKE @search ESCAPE '\\'
      )`
    );
    params.search = `%${escapeLike(options.search.toLowerCase())}%`;
  }

  const whereClause = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';

  const rows = db
    .prepare<Record<string, string | number>, EventRow>(
      `SELECT id, ts, source, detector, severity, message, meta
       FROM events
       ${whereClause}
       ORDER BY ts DESC, id DESC
       LIMIT @limit OFFSET @offset`
    )
    .all({ ...params, limit: clampLimit(options.limit), offset: clampOffset(options.offset) });
  const totalRow = db
    .prepare<Record<string, string | number>, { count: number }>(
      `SELECT COUNT(*) AS count FROM events ${whereClause}`
    )
    .get(params);

  return {
    items: rows.map(row => mapRow(row)),
    total: totalRow?.count ?? 0
  };
}

export function getEventById(id: number): EventRecordWithId | null {
  const row = getEventStatement.get(id);
  return row ? mapRow(row) : null;
}

export function clearEvents() {
  db.prepare('DELETE FROM events').run();
}

export function pruneEventsOlderThan(cutoffTs: number): number {
  return deleteOlderThanStatement.run({ cutoff: cutoffTs }).changes;
}

function mapRow(row: EventRow): EventRecordWithId {
  return {
    id: row.id,
    ts: row.ts,
    source: row.source,
    detector: row.detector,
    severity: toSeverity(row.severity),
    message: row.message,
    meta: row.meta ? parseMeta(row.meta) : undefined
  };
}

function toSeverity(value: string): EventSeverity {
  return value === 'critical' || value === 'warning' ? value : 'info';
}

function parseMeta(raw: string): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return { ...parsed };
  }
  return undefined;
}

function clampLimit(limit?: number) {
  if (typeof limit !== 'number' || Number.isNaN(limit)) {
    return 25;
  }
  return Math.min(Math.max(Math.floor(limit), 1), 100);
}

function clampOffset(offset?: number) {
  if (typeof offset !== 'number' || Number.isNaN(offset)) {
    return 0;
  }
  return Math.max(Math.floor(offset), 0);
}

function escapeLike(value: string) {
  return value.replace(/([_%\\])/g, '\\$1');
}

export default db;
