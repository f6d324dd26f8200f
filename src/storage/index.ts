import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';
import { z } from 'zod';

import { type Task, TaskSchema } from '../types/index.js';
import { DEFAULT_DB_PATH } from '../utils/config.js';
import { generateId } from '../utils/id.js';
import { logger } from '../utils/logger.js';

export type SaveOutcome = 'created' | 'exists';

/**
 * Task persistence keyed by idempotency key. Saving an existing key is a no-op.
 */
export interface TaskRepository {
  saveTask(task: Task, userId: string, key: string): SaveOutcome;
}

export interface CachedTaskSet {
  tasks: Task[];
  costUsd: number;
  cachedAt: string;
  expiresAt: string;
}

/**
 * Generated task sets keyed by (profile feature hash, generation type).
 */
export interface TaskCacheStore {
  getCachedTasks(profileHash: string, generationType: string, now?: Date): CachedTaskSet | undefined;
  cacheTasks(profileHash: string, generationType: string, tasks: Task[], costUsd: number, ttlDays: number, now?: Date): void;
}

export interface CostEntry {
  userId: string;
  operation: string;
  model: string;
  costUsd: number;
  inputTokens?: number;
  outputTokens?: number;
}

/**
 * Per-user record of LLM spend.
 */
export interface CostLedger {
  recordCost(entry: CostEntry): void;
  getUserSpend(userId: string): number;
}

export interface CacheStats {
  entries: number;
  expired: number;
  hits: number;
  /** Dollars saved by cache hits, at the cost each entry was generated for */
  savedUsd: number;
}

export interface StoredTask {
  key: string;
  userId: string;
  scheduledDate: string | null;
  task: Task;
  createdAt: string;
}

const DataRowSchema = z.object({ data: z.string() });

const StoredTaskRowSchema = z.object({
  idempotency_key: z.string(),
  user_id: z.string(),
  scheduled_date: z.string().nullable(),
  data: z.string(),
  created_at: z.string(),
});

const CacheRowSchema = z.object({
  tasks: z.string(),
  cost_usd: z.number(),
  cached_at: z.string(),
  expires_at: z.string(),
});

const SumRowSchema = z.object({ total: z.number().nullable() });

const CacheStatsRowSchema = z.object({
  entries: z.number(),
  expired: z.number().nullable(),
  hits: z.number().nullable(),
  saved: z.number().nullable(),
});

const DAY_MS = 24 * 60 * 60 * 1000;

function parseTaskJson(json: string): Task | null {
  const parsed = TaskSchema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    logger.error('Failed to validate task from database', parsed.error);
    return null;
  }
  return parsed.data;
}

/**
 * SQLite storage for the planner: scheduled tasks, the generation cache and
 * the LLM cost ledger.
 */
export class Storage implements TaskRepository, TaskCacheStore, CostLedger {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? DEFAULT_DB_PATH;
    this.ensureDirectory(path);
    this.db = new Database(path);
    this.initialize();
  }

  private ensureDirectory(dbPath: string): void {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private initialize(): void {
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        idempotency_key TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        scheduled_date TEXT,
        title TEXT NOT NULL,
        source TEXT NOT NULL,
        data TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS task_cache (
        profile_hash TEXT NOT NULL,
        generation_type TEXT NOT NULL,
        tasks TEXT NOT NULL,
        cost_usd REAL NOT NULL DEFAULT 0,
        hit_count INTEGER NOT NULL DEFAULT 0,
        cached_at TEXT NOT NULL,
        expires_at TEXT NOT NULL,
        PRIMARY KEY (profile_hash, generation_type)
      );

      CREATE TABLE IF NOT EXISTS llm_costs (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        operation TEXT NOT NULL,
        model TEXT NOT NULL,
        cost_usd REAL NOT NULL,
        input_tokens INTEGER,
        output_tokens INTEGER,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_user ON tasks(user_id, scheduled_date);
      CREATE INDEX IF NOT EXISTS idx_task_cache_expires ON task_cache(expires_at);
      CREATE INDEX IF NOT EXISTS idx_llm_costs_user ON llm_costs(user_id);
    `);
  }

  // Task operations

  saveTask(task: Task, userId: string, key: string): SaveOutcome {
    const stmt = this.db.prepare(`
      INSERT OR IGNORE INTO tasks (idempotency_key, user_id, scheduled_date, title, source, data, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    const result = stmt.run(
      key,
      userId,
      task.scheduledDate ?? null,
      task.title,
      task.source,
      JSON.stringify(task),
      new Date().toISOString()
    );
    if (result.changes === 0) {
      logger.debug('Task already stored', undefined, { key });
      return 'exists';
    }
    return 'created';
  }

  getTask(key: string): Task | undefined {
    const row = DataRowSchema.safeParse(
      this.db.prepare('SELECT data FROM tasks WHERE idempotency_key = ?').get(key)
    );
    if (!row.success) return undefined;
    return parseTaskJson(row.data.data) ?? undefined;
  }

  listTasksForUser(userId: string): StoredTask[] {
    const rows = this.db
      .prepare(
        `SELECT idempotency_key, user_id, scheduled_date, data, created_at
         FROM tasks WHERE user_id = ? ORDER BY scheduled_date ASC, created_at ASC`
      )
      .all(userId);

    const stored: StoredTask[] = [];
    for (const raw of rows) {
      const row = StoredTaskRowSchema.safeParse(raw);
      if (!row.success) continue;
      const task = parseTaskJson(row.data.data);
      if (!task) continue;
      stored.push({
        key: row.data.idempotency_key,
        userId: row.data.user_id,
        scheduledDate: row.data.scheduled_date,
        task,
        createdAt: row.data.created_at,
      });
    }
    return stored;
  }

  deleteTasksForUser(userId: string): number {
    return this.db.prepare('DELETE FROM tasks WHERE user_id = ?').run(userId).changes;
  }

  // Cache operations

  getCachedTasks(profileHash: string, generationType: string, now: Date = new Date()): CachedTaskSet | undefined {
    const row = CacheRowSchema.safeParse(
      this.db
        .prepare(
          `SELECT tasks, cost_usd, cached_at, expires_at FROM task_cache
           WHERE profile_hash = ? AND generation_type = ? AND expires_at > ?`
        )
        .get(profileHash, generationType, now.toISOString())
    );
    if (!row.success) return undefined;

    const parsed = z.array(TaskSchema).safeParse(JSON.parse(row.data.tasks));
    if (!parsed.success) {
      logger.error('Failed to validate cached tasks', parsed.error, { profileHash, generationType });
      return undefined;
    }

    this.db
      .prepare('UPDATE task_cache SET hit_count = hit_count + 1 WHERE profile_hash = ? AND generation_type = ?')
      .run(profileHash, generationType);

    return {
      tasks: parsed.data,
      costUsd: row.data.cost_usd,
      cachedAt: row.data.cached_at,
      expiresAt: row.data.expires_at,
    };
  }

  cacheTasks(
    profileHash: string,
    generationType: string,
    tasks: Task[],
    costUsd: number,
    ttlDays: number,
    now: Date = new Date()
  ): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO task_cache (profile_hash, generation_type, tasks, cost_usd, hit_count, cached_at, expires_at)
      VALUES (?, ?, ?, ?, 0, ?, ?)
    `);
    stmt.run(
      profileHash,
      generationType,
      JSON.stringify(tasks),
      costUsd,
      now.toISOString(),
      new Date(now.getTime() + ttlDays * DAY_MS).toISOString()
    );
  }

  purgeExpiredCache(now: Date = new Date()): number {
    return this.db.prepare('DELETE FROM task_cache WHERE expires_at <= ?').run(now.toISOString()).changes;
  }

  getCacheStats(now: Date = new Date()): CacheStats {
    const row = CacheStatsRowSchema.parse(
      this.db
        .prepare(
          `SELECT COUNT(*) AS entries,
                  SUM(CASE WHEN expires_at <= ? THEN 1 ELSE 0 END) AS expired,
                  SUM(hit_count) AS hits,
                  SUM(hit_count * cost_usd) AS saved
           FROM task_cache`
        )
        .get(now.toISOString())
    );
    return {
      entries: row.entries,
      expired: row.expired ?? 0,
      hits: row.hits ?? 0,
      savedUsd: Math.round((row.saved ?? 0) * 10_000) / 10_000,
    };
  }

  // Cost ledger

  recordCost(entry: CostEntry): void {
    const stmt = this.db.prepare(`
      INSERT INTO llm_costs (id, user_id, operation, model, cost_usd, input_tokens, output_tokens, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    stmt.run(
      generateId('cost'),
      entry.userId,
      entry.operation,
      entry.model,
      entry.costUsd,
      entry.inputTokens ?? null,
      entry.outputTokens ?? null,
      new Date().toISOString()
    );
  }

  getUserSpend(userId: string): number {
    const row = SumRowSchema.parse(
      this.db.prepare('SELECT SUM(cost_usd) AS total FROM llm_costs WHERE user_id = ?').get(userId)
    );
    return Math.round((row.total ?? 0) * 10_000) / 10_000;
  }

  // Utility

  /**
   * Cheap liveness probe used by the health tool.
   */
  ping(): boolean {
    return z.object({ ok: z.literal(1) }).safeParse(this.db.prepare('SELECT 1 AS ok').get()).success;
  }

  /**
   * Execute operations within a transaction.
   * If any operation fails, the entire transaction is rolled back.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}
