/**
 * Database client — Supabase primary, SQLite local fallback.
 *
 * Inserts and storage uploads made while Supabase is unreachable are queued
 * in a local SQLite `pending_sync` table and replayed via syncPending() on
 * the first successful write after recovery.
 */
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('db');

export type Row = Record<string, unknown>;

export interface DbClientOptions {
  url:          string;
  serviceKey:   string;
  /** SQLite file for the pending-sync queue; ':memory:' is accepted. */
  fallbackPath: string;
}

export interface DbClient {
  insert(table: string, data: Row): Promise<Row>;
  select(table: string, filters?: Record<string, string>, orderBy?: string): Promise<Row[]>;
  upload(bucket: string, path: string, body: string, contentType: string): Promise<void>;
  /** Replays queued inserts; resolves with the number still pending. */
  syncPending(): Promise<number>;
}

// pending_sync.table_name marker for queued storage uploads.
const STORAGE_QUEUE = '@storage';

const RecordSchema = z.record(z.unknown());

const PendingUploadSchema = z.object({
  bucket:      z.string(),
  path:        z.string(),
  body:        z.string(),
  contentType: z.string(),
});

type PendingUpload = z.infer<typeof PendingUploadSchema>;

interface PendingRow {
  id:          number;
  table_name:  string;
  record_data: string;
}

// ─── Connection error detection ───────────────────────────────────────────────

export function isConnError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.message.includes('ECONNREFUSED') ||
      err.message.includes('fetch failed') ||
      err.message.includes('network timeout') ||
      err.message.includes('ETIMEDOUT'))
  );
}

// ─── Client ───────────────────────────────────────────────────────────────────

export function createDbClient(options: DbClientOptions): DbClient {
  let supabase: SupabaseClient | null = null;
  let supabaseDown = false;
  let localDb: import('better-sqlite3').Database | null = null;

  function getSupabase(): SupabaseClient {
    if (!supabase) {
      supabase = createClient(options.url, options.serviceKey);
    }
    return supabase;
  }

  async function getDb(): Promise<import('better-sqlite3').Database> {
    if (!localDb) {
      const { default: Database } = await import('better-sqlite3');
      if (options.fallbackPath !== ':memory:') {
        mkdirSync(dirname(options.fallbackPath), { recursive: true });
      }
      localDb = new Database(options.fallbackPath);
      localDb.exec(`
        CREATE TABLE IF NOT EXISTS pending_sync (
          id          INTEGER PRIMARY KEY AUTOINCREMENT,
          table_name  TEXT    NOT NULL,
          record_data TEXT    NOT NULL,
          created_at  TEXT    NOT NULL DEFAULT (datetime('now'))
        )
      `);
    }
    return localDb;
  }

  async function enqueue(tableName: string, data: Row | PendingUpload): Promise<void> {
    const db = await getDb();
    db.prepare('INSERT INTO pending_sync (table_name, record_data) VALUES (?, ?)')
      .run(tableName, JSON.stringify(data));
  }

  async function localInsert(table: string, data: Row): Promise<Row> {
    log.warn('Writing INSERT to SQLite fallback', { table });
    await enqueue(table, data);
    return { ...data, _fallback: true };
  }

  function markDown(what: string): void {
    if (!supabaseDown) {
      supabaseDown = true;
      log.error('Supabase down — using SQLite fallback', { what });
    }
  }

  function markUp(): void {
    if (supabaseDown) {
      supabaseDown = false;
      replayAfterRecovery();
    }
  }

  async function putObject({ bucket, path, body, contentType }: PendingUpload): Promise<void> {
    const { error } = await getSupabase()
      .storage
      .from(bucket)
      .upload(path, body, { contentType, upsert: true });
    if (error) throw new Error(error.message);
  }

  async function replay(row: PendingRow): Promise<void> {
    const payload: unknown = JSON.parse(row.record_data);
    if (row.table_name === STORAGE_QUEUE) {
      await putObject(PendingUploadSchema.parse(payload));
      return;
    }
    const { error } = await getSupabase().from(row.table_name).upsert(RecordSchema.parse(payload));
    if (error) throw new Error(error.message);
  }

  async function syncPending(): Promise<number> {
    const db = await getDb();
    const pending = db
      .prepare<[], PendingRow>('SELECT id, table_name, record_data FROM pending_sync ORDER BY id ASC')
      .all();

    if (!pending.length) return 0;

    log.info(`Syncing ${pending.length} local SQLite record(s) to Supabase`);

    for (const row of pending) {
      try {
        await replay(row);
        db.prepare('DELETE FROM pending_sync WHERE id = ?').run(row.id);
      } catch (err) {
        // Left in the queue for the next recovery.
        log.warn('Sync retry failed — will retry on next recovery', { id: row.id, table: row.table_name, err });
      }
    }

    const remaining = db
      .prepare<[], { cnt: number }>('SELECT COUNT(*) as cnt FROM pending_sync')
      .get()?.cnt ?? 0;

    if (remaining === 0) {
      log.info('SQLite sync queue fully drained — Supabase is current');
    } else {
      log.warn(`${remaining} record(s) still pending sync`);
    }
    return remaining;
  }

  function replayAfterRecovery(): void {
    syncPending().catch((err: unknown) => {
      log.error('Pending sync failed', { err });
    });
  }

  async function insert(table: string, data: Row): Promise<Row> {
    try {
      const { data: result, error } = await getSupabase()
        .from(table)
        .insert(data)
        .select()
        .single();
      if (error) throw new Error(error.message);
      markUp();
      return result;
    } catch (err) {
      if (isConnError(err)) {
        markDown(table);
        return localInsert(table, data);
      }
      throw err;
    }
  }

  async function select(table: string, filters: Record<string, string> = {}, orderBy?: string): Promise<Row[]> {
    try {
      let q = getSupabase().from(table).select('*');
      for (const [k, v] of Object.entries(filters)) {
        q = q.eq(k, v);
      }
      const { data, error } = orderBy ? await q.order(orderBy, { ascending: true }) : await q;
      if (error) throw new Error(error.message);
      return data ?? [];
    } catch (err) {
      if (isConnError(err)) {
        log.warn('Supabase unavailable for SELECT — returning empty result', { table });
        return [];
      }
      throw err;
    }
  }

  async function upload(bucket: string, path: string, body: string, contentType: string): Promise<void> {
    const object = { bucket, path, body, contentType };
    try {
      await putObject(object);
      markUp();
    } catch (err) {
      if (isConnError(err)) {
        markDown(`${bucket}/${path}`);
        log.warn('Queueing storage upload in SQLite fallback', { bucket, path });
        await enqueue(STORAGE_QUEUE, object);
        return;
      }
      throw err;
    }
  }

  return { insert, select, upload, syncPending };
}
