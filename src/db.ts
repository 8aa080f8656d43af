import Database from 'better-sqlite3';
import config from 'config';
import fs from 'node:fs';
import path from 'node:path';
import type {
  EventOrigin,
  EventRecordingMetadata,
  FinalizedRecording,
  RecorderEvent,
  RecordingKind,
  SegmentMetadata
} from './types.js';

const dbPath = config.has('database.path') ? config.get<string>('database.path') : 'data/recordings.sqlite';
const inMemory = dbPath === ':memory:';
if (!inMemory) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

const db = new Database(dbPath);

export const databasePath = inMemory ? dbPath : path.resolve(dbPath);

db.exec(`
  CREATE TABLE IF NOT EXISTS recordings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    camera_id TEXT NOT NULL,
    kind TEXT NOT NULL,
    file_path TEXT NOT NULL UNIQUE,
    metadata_path TEXT NOT NULL,
    start_ts REAL NOT NULL,
    end_ts REAL NOT NULL,
    frame_count INTEGER NOT NULL,
    bytes INTEGER NOT NULL,
    event_type TEXT,
    keep INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL,
    meta TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    camera_id TEXT NOT NULL,
    event_type TEXT NOT NULL,
    ts REAL NOT NULL,
    origin TEXT NOT NULL,
    status TEXT NOT NULL,
    metadata TEXT,
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_recordings_camera_start ON recordings (camera_id, start_ts);
  CREATE INDEX IF NOT EXISTS idx_recordings_kind ON recordings (kind);
  CREATE INDEX IF NOT EXISTS idx_events_camera_ts ON events (camera_id, ts);
`);

type RecordingRow = {
  id: number;
  camera_id: string;
  kind: string;
  file_path: string;
  metadata_path: string;
  start_ts: number;
  end_ts: number;
  frame_count: number;
  bytes: number;
  event_type: string | null;
  keep: number;
  created_at: number;
  meta: string;
};

type EventRow = {
  id: number;
  camera_id: string;
  event_type: string;
  ts: number;
  origin: string;
  status: string;
  metadata: string | null;
  created_at: number;
};

type CountRow = { count: number };

export type CatalogRecording = {
  id: number;
  cameraId: string;
  kind: RecordingKind;
  filePath: string;
  metadataPath: string;
  start: number;
  end: number;
  frameCount: number;
  bytes: number;
  eventType: string | null;
  keep: boolean;
  createdAt: number;
  metadata: Record<string, unknown>;
};

export type CatalogEventStatus = 'dispatched' | 'duplicate';

export type CatalogEvent = {
  id: number;
  cameraId: string;
  eventType: string;
  timestamp: number;
  origin: EventOrigin;
  status: CatalogEventStatus;
  metadata: Record<string, unknown>;
  createdAt: number;
};

export interface ListRecordingsOptions {
  cameraId?: string;
  kind?: RecordingKind;
  since?: number;
  until?: number;
  limit?: number;
  offset?: number;
}

export interface ListEventsOptions {
  cameraId?: string;
  eventType?: string;
  since?: number;
  until?: number;
  limit?: number;
  offset?: number;
}

export interface Paginated<T> {
  items: T[];
  total: number;
}

type AnyRecording = FinalizedRecording<SegmentMetadata> | FinalizedRecording<EventRecordingMetadata>;

const insertRecordingStatement = db.prepare(`
  INSERT INTO recordings (
    camera_id, kind, file_path, metadata_path, start_ts, end_ts, frame_count, bytes, event_type, keep, created_at, meta
  ) VALUES (
    @cameraId, @kind, @filePath, @metadataPath, @start, @end, @frameCount, @bytes, @eventType, @keep, @createdAt, @meta
  )
  ON CONFLICT(file_path) DO UPDATE SET
    metadata_path = excluded.metadata_path,
    start_ts = excluded.start_ts,
    end_ts = excluded.end_ts,
    frame_count = excluded.frame_count,
    bytes = excluded.bytes,
    event_type = excluded.event_type,
    keep = excluded.keep,
    meta = excluded.meta
`);

const selectRecordingIdStatement = db.prepare<[string], { id: number }>(
  'SELECT id FROM recordings WHERE file_path = ?'
);

const deleteRecordingStatement = db.prepare('DELETE FROM recordings WHERE file_path = ?');

const insertEventStatement = db.prepare(`
  INSERT INTO events (camera_id, event_type, ts, origin, status, metadata, created_at)
  VALUES (@cameraId, @eventType, @ts, @origin, @status, @metadata, @createdAt)
`);

export function storeRecording(recording: AnyRecording): number {
  const { metadata } = recording;
  const row =
    metadata.type === 'continuous'
      ? { kind: 'continuous', start: metadata.start, end: metadata.end, eventType: null, keep: 0 }
      : {
          kind: 'event',
          start: metadata.pre_event_start ?? metadata.post_event_start,
          end: metadata.post_event_end,
          eventType: metadata.event_type,
          keep: metadata.keep ? 1 : 0
        };

  insertRecordingStatement.run({
    cameraId: recording.cameraId,
    filePath: recording.filePath,
    metadataPath: recording.metadataPath,
    frameCount: metadata.frame_count,
    bytes: metadata.bytes,
    createdAt: Date.now(),
    meta: JSON.stringify(metadata),
    ...row
  });
  return selectRecordingIdStatement.get(recording.filePath)?.id ?? 0;
}

export function listRecordings(options: ListRecordingsOptions = {}): Paginated<CatalogRecording> {
  const filters: string[] = [];
  const params: Record<string, string | number> = {};

  if (options.cameraId) {
    filters.push('camera_id = @cameraId');
    params.cameraId = options.cameraId;
  }

  if (options.kind) {
    filters.push('kind = @kind');
    params.kind = options.kind;
  }

  if (typeof options.since === 'number') {
    filters.push('end_ts >= @since');
    params.since = options.since;
  }

  if (typeof options.until === 'number') {
    filters.push('start_ts <= @until');
    params.until = options.until;
  }

  const whereClause = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
  const rows = db
    .prepare<Record<string, string | number>, RecordingRow>(
      `SELECT * FROM recordings ${whereClause} ORDER BY start_ts DESC, id DESC LIMIT @limit OFFSET @offset`
    )
    .all({ ...params, limit: clampLimit(options.limit), offset: clampOffset(options.offset) });
  const totalRow = db
    .prepare<Record<string, string | number>, CountRow>(`SELECT COUNT(*) AS count FROM recordings ${whereClause}`)
    .get(params);

  return { items: rows.map(mapRecordingRow), total: totalRow?.count ?? 0 };
}

export function deleteRecordingByPath(filePath: string): boolean {
  return deleteRecordingStatement.run(filePath).changes > 0;
}

export function storeEvent(event: RecorderEvent, status: CatalogEventStatus = 'dispatched'): number {
  const result = insertEventStatement.run({
    cameraId: event.cameraId,
    eventType: event.eventType,
    ts: event.timestamp,
    origin: event.origin,
    status,
    metadata: Object.keys(event.metadata).length > 0 ? JSON.stringify(event.metadata) : null,
    createdAt: Date.now()
  });
  return Number(result.lastInsertRowid);
}

export function listEvents(options: ListEventsOptions = {}): Paginated<CatalogEvent> {
  const filters: string[] = [];
  const params: Record<string, string | number> = {};

  if (options.cameraId) {
    filters.push('camera_id = @cameraId');
    params.cameraId = options.cameraId;
  }

  if (options.eventType) {
    filters.push('event_type = @eventType');
    params.eventType = options.eventType;
  }

  if (typeof options.since === 'number') {
    filters.push('ts >= @since');
    params.since = options.since;
  }

  if (typeof options.until === 'number') {
    filters.push('ts <= @until');
    params.until = options.until;
  }

  const whereClause = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
  const rows = db
    .prepare<Record<string, string | number>, EventRow>(
      `SELECT * FROM events ${whereClause} ORDER BY ts DESC, id DESC LIMIT @limit OFFSET @offset`
    )
    .all({ ...params, limit: clampLimit(options.limit), offset: clampOffset(options.offset) });
  const totalRow = db
    .prepare<Record<string, string | number>, CountRow>(`SELECT COUNT(*) AS count FROM events ${whereClause}`)
    .get(params);

  return { items: rows.map(mapEventRow), total: totalRow?.count ?? 0 };
}

export function clearCatalog() {
  db.exec('DELETE FROM recordings; DELETE FROM events;');
}

function mapRecordingRow(row: RecordingRow): CatalogRecording {
  return {
    id: row.id,
    cameraId: row.camera_id,
    kind: row.kind === 'event' ? 'event' : 'continuous',
    filePath: row.file_path,
    metadataPath: row.metadata_path,
    start: row.start_ts,
    end: row.end_ts,
    frameCount: row.frame_count,
    bytes: row.bytes,
    eventType: row.event_type,
    keep: row.keep === 1,
    createdAt: row.created_at,
    metadata: safeParseObject(row.meta) ?? {}
  };
}

function mapEventRow(row: EventRow): CatalogEvent {
  return {
    id: row.id,
    cameraId: row.camera_id,
    eventType: row.event_type,
    timestamp: row.ts,
    origin: row.origin === 'monitor' ? 'monitor' : 'manual',
    status: row.status === 'duplicate' ? 'duplicate' : 'dispatched',
    metadata: row.metadata ? safeParseObject(row.metadata) ?? {} : {},
    createdAt: row.created_at
  };
}

function safeParseObject(raw: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    return undefined;
  }
  return undefined;
}

function clampLimit(limit?: number) {
  if (typeof limit !== 'number' || Number.isNaN(limit)) {
    return 25;
  }
  return Math.min(Math.max(Math.floor(limit), 1), 500);
}

function clampOffset(offset?: number) {
  if (typeof offset !== 'number' || Number.isNaN(offset)) {
    return 0;
  }
  return Math.max(Math.floor(offset), 0);
}

export default db;
