/**
 * Validation result storage — keyed by validation_id, listable by project.
 *
 * The Supabase store writes the `validations` table and uploads the full
 * document to the results bucket at validations/<project_id>/<validation_id>.json.
 * The memory store serves local runs without Supabase, and tests; it holds a
 * bounded number of results.
 */
import type { Env } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { ValidationResultSchema, type ValidationResult } from '../validation/types.js';
import { createDbClient, type DbClient, type Row } from './client.js';

const log = createLogger('store');

const TABLE = 'validations';

export interface ValidationStore {
  save(result: ValidationResult): Promise<void>;
  get(validationId: string): Promise<ValidationResult | null>;
  /** Oldest first. */
  listByProject(projectId: string): Promise<ValidationResult[]>;
}

// ─── Memory ───────────────────────────────────────────────────────────────────

export const MEMORY_STORE_LIMIT = 1_000;

/** Keeps the newest `limit` results; older ones are evicted in save order. */
export function createMemoryStore(limit = MEMORY_STORE_LIMIT): ValidationStore {
  const byId = new Map<string, ValidationResult>();
  const byProject = new Map<string, string[]>();

  function evictOldest(): void {
    const oldest = byId.keys().next();
    if (oldest.done) return;
    const evicted = byId.get(oldest.value);
    byId.delete(oldest.value);
    if (!evicted) return;
    const remaining = (byProject.get(evicted.project_id) ?? []).filter(id => id !== oldest.value);
    if (remaining.length) byProject.set(evicted.project_id, remaining);
    else byProject.delete(evicted.project_id);
  }

  return {
    async save(result) {
      if (!byId.has(result.validation_id)) {
        const ids = byProject.get(result.project_id) ?? [];
        ids.push(result.validation_id);
        byProject.set(result.project_id, ids);
      }
      byId.set(result.validation_id, result);
      while (byId.size > limit) evictOldest();
    },
    async get(validationId) {
      return byId.get(validationId) ?? null;
    },
    async listByProject(projectId) {
      const ids = byProject.get(projectId) ?? [];
      return ids.flatMap(id => byId.get(id) ?? []);
    },
  };
}

// ─── Supabase ─────────────────────────────────────────────────────────────────

export function blobPath(result: Pick<ValidationResult, 'project_id' | 'validation_id'>): string {
  return `validations/${result.project_id}/${result.validation_id}.json`;
}

export function toRow(result: ValidationResult): Row {
  return {
    validation_id:     result.validation_id,
    project_id:        result.project_id,
    validation_status: result.validation_status,
    created_at:        result.timestamp,
    result,
  };
}

export function fromRow(row: Row): ValidationResult | null {
  const parsed = ValidationResultSchema.safeParse(row['result']);
  if (!parsed.success) {
    log.warn('Skipping unreadable validation row', { validationId: row['validation_id'] });
    return null;
  }
  return parsed.data;
}

export function createSupabaseStore(db: DbClient, bucket: string): ValidationStore {
  return {
    async save(result) {
      await db.insert(TABLE, toRow(result));
      await db.upload(bucket, blobPath(result), JSON.stringify(result, null, 2), 'application/json');
    },
    async get(validationId) {
      const rows = await db.select(TABLE, { validation_id: validationId });
      const row = rows[0];
      return row ? fromRow(row) : null;
    },
    async listByProject(projectId) {
      const rows = await db.select(TABLE, { project_id: projectId }, 'created_at');
      return rows.flatMap(row => fromRow(row) ?? []);
    },
  };
}

/** Supabase when configured, otherwise process memory. */
export function createValidationStore(config: Env): ValidationStore {
  if (!config.SUPABASE_URL || !config.SUPABASE_SERVICE_KEY) {
    log.warn(
      `SUPABASE_URL / SUPABASE_SERVICE_KEY not set — only the latest ${MEMORY_STORE_LIMIT} validation results are kept, in memory`,
    );
    return createMemoryStore();
  }
  const db = createDbClient({
    url:          config.SUPABASE_URL,
    serviceKey:   config.SUPABASE_SERVICE_KEY,
    fallbackPath: config.LOCAL_FALLBACK_DB,
  });
  return createSupabaseStore(db, config.SUPABASE_BUCKET);
}
