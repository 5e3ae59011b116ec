/**
 * Database client — Supabase mirror, SQLite local queue.
 *
 * Supabase is optional. When it is configured but unreachable, upserts are
 * queued in SQLite. Every later write first replays the queue in insertion
 * order and is itself queued while anything older is still pending, so a
 * replayed row never lands on top of a newer one.
 */
import * as fs from 'fs';
import * as path from 'path';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type BetterSqlite3 from 'better-sqlite3';
import { env, FEATURES } from '../config.js';
import { errorMessage, logger } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';

export type Row = Record<string, unknown>;

// ─── Supabase singleton ───────────────────────────────────────────────────────

let _supabase: SupabaseClient | null = null;
let supabaseDown = false;

function getSupabase(): SupabaseClient | null {
  if (!FEATURES.supabase || !env.SUPABASE_URL || !env.SUPABASE_SERVICE_KEY) return null;
  if (!_supabase) {
    _supabase = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY, {
      auth: { persistSession: false },
    });
  }
  return _supabase;
}

export const isSupabaseConfigured = (): boolean => getSupabase() !== null;

// ─── Connection error detection ───────────────────────────────────────────────

export function isConnError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.message.includes('ECONNREFUSED') ||
      err.message.includes('fetch failed') ||
      err.message.includes('network timeout') ||
      err.message.includes('ETIMEDOUT') ||
      err.message.includes('ENOTFOUND'))
  );
}

// ─── CRUD helpers ─────────────────────────────────────────────────────────────

// Writes and replays run one at a time so queue order is the write order.
const writeLock = new Mutex();

/** Upsert rows; queued locally when Supabase is unreachable. No-op when unconfigured. */
export async function dbUpsert(table: string, rows: Row[], onConflict: string): Promise<void> {
  const sb = getSupabase();
  if (!sb || rows.length === 0) return;
  await writeLock.runExclusive(() => upsertInOrder(sb, table, rows, onConflict));
}

async function upsertInOrder(sb: SupabaseClient, table: string, rows: Row[], onConflict: string): Promise<void> {
  try {
    if (!(await replayQueue(sb))) {
      await localQueue(table, rows, onConflict);
      return;
    }
    const { error } = await sb.from(table).upsert(rows, { onConflict });
    if (error) throw new Error(error.message);
    if (supabaseDown) {
      supabaseDown = false;
      logger.info('Supabase reachable again');
    }
  } catch (err) {
    if (isConnError(err)) {
      if (!supabaseDown) {
        supabaseDown = true;
        logger.warn('Supabase down — queueing writes in SQLite', { table });
      }
      await localQueue(table, rows, onConflict);
      return;
    }
    throw err;
  }
}

/** Select a single row by column equality; null when absent, unconfigured or unreachable. */
export async function dbSelectOne(table: string, column: string, value: string): Promise<Row | null> {
  const sb = getSupabase();
  if (!sb) return null;
  try {
    const { data, error } = await sb.from(table).select('*').eq(column, value).maybeSingle();
    if (error) throw new Error(error.message);
    return isRow(data) ? data : null;
  } catch (err) {
    if (isConnError(err)) {
      logger.warn('Supabase unavailable for SELECT — returning empty result', { table });
      return null;
    }
    throw err;
  }
}

export async function dbSelectAll(table: string): Promise<Row[]> {
  const sb = getSupabase();
  if (!sb) return [];
  try {
    const { data, error } = await sb.from(table).select('*');
    if (error) throw new Error(error.message);
    return Array.isArray(data) ? data.filter(isRow) : [];
  } catch (err) {
    if (isConnError(err)) {
      logger.warn('Supabase unavailable for SELECT — returning empty result', { table });
      return [];
    }
    throw err;
  }
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── SQLite queue ─────────────────────────────────────────────────────────────

let _localDb: BetterSqlite3.Database | null = null;
// Unknown after a restart, so the first write checks.
let queueMayHaveRows = true;

async function getDb(): Promise<BetterSqlite3.Database> {
  if (!_localDb) {
    const { default: Database } = await import('better-sqlite3');
    const dbPath = path.join(env.OUTPUT_DIR, 'cache', 'pending_sync.db');
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    _localDb = new Database(dbPath);
    _localDb.exec(`
      CREATE TABLE IF NOT EXISTS pending_sync (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        table_name  TEXT    NOT NULL,
        on_conflict TEXT    NOT NULL,
        record_data TEXT    NOT NULL,
        created_at  TEXT    NOT NULL DEFAULT (datetime('now'))
      )
    `);
  }
  return _localDb;
}

async function localQueue(table: string, rows: Row[], onConflict: string): Promise<void> {
  const db = await getDb();
  db.prepare(
    'INSERT INTO pending_sync (table_name, on_conflict, record_data) VALUES (?, ?, ?)',
  ).run(table, onConflict, JSON.stringify(rows));
  queueMayHaveRows = true;
}

interface PendingRow {
  id: number;
  table_name: string;
  on_conflict: string;
  record_data: string;
}

function isPendingRow(value: unknown): value is PendingRow {
  return (
    isRow(value) &&
    typeof value['id'] === 'number' &&
    typeof value['table_name'] === 'string' &&
    typeof value['on_conflict'] === 'string' &&
    typeof value['record_data'] === 'string'
  );
}

// ─── Sync recovery ────────────────────────────────────────────────────────────

/**
 * Replay queued writes oldest first. Returns false when Supabase is still
 * unreachable and rows remain queued. A row Supabase rejects outright is
 * logged and dropped.
 */
export async function syncPendingToSupabase(): Promise<boolean> {
  const sb = getSupabase();
  if (!sb) return true;
  return writeLock.runExclusive(() => replayQueue(sb));
}

async function replayQueue(sb: SupabaseClient): Promise<boolean> {
  if (!queueMayHaveRows) return true;
  const db = await getDb();
  const pending = db.prepare('SELECT * FROM pending_sync ORDER BY id ASC').all().filter(isPendingRow);
  if (pending.length) logger.info(`Syncing ${pending.length} queued write(s) to Supabase`);

  for (const row of pending) {
    try {
      const payload: unknown = JSON.parse(row.record_data);
      const rows = Array.isArray(payload) ? payload.filter(isRow) : [];
      const { error } = await sb.from(row.table_name).upsert(rows, { onConflict: row.on_conflict });
      if (error) throw new Error(error.message);
    } catch (err) {
      if (isConnError(err)) {
        logger.warn('Sync replay stopped — Supabase still unreachable', { id: row.id, table: row.table_name });
        return false;
      }
      logger.error('Sync: queued write rejected — dropping it', {
        id: row.id,
        table: row.table_name,
        error: errorMessage(err),
      });
    }
    db.prepare('DELETE FROM pending_sync WHERE id = ?').run(row.id);
  }

  queueMayHaveRows = false;
  if (pending.length) logger.info('SQLite sync queue drained — Supabase is current');
  return true;
}
