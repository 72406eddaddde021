import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import initSqlJs, { type Database, type SqlJsStatic } from 'sql.js';
import { z } from 'zod';
import {
  GenerationMethodSchema,
  PlanSchema,
  StoreError,
  type GenerationMethod,
  type Plan,
  type StoredPlanRecord,
} from '@taskplanner/shared';
import { runMigrations } from './migrations';

export interface PlanStoreOptions {
  /** Database file, or `:memory:` for a throwaway store. */
  dbPath: string;
}

/**
 * Append/read store for generated plans. Records are immutable once written.
 */
export interface PlanStore {
  init(options: PlanStoreOptions): Promise<void>;
  /** Persists a plan and returns its id; ids strictly increase. */
  save(goal: string, plan: Plan, method: GenerationMethod): number;
  load(id: number): StoredPlanRecord | null;
  close(): void;
}

const PlanDbRowSchema = z.object({
  id: z.number(),
  goal: z.string(),
  plan: z.string(),
  llm_method: z.string().nullable(),
  created_at: z.string(),
});
type PlanDbRow = z.infer<typeof PlanDbRowSchema>;

let sqlJs: Promise<SqlJsStatic> | null = null;

/** Loads the SQLite WASM engine once per process. */
export function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs().catch((error: unknown) => {
      sqlJs = null;
      throw error;
    });
  }
  return sqlJs;
}

/**
 * SQLite-backed plan store. The database lives in memory and is written
 * back to `dbPath` after every change.
 */
export function createPlanStore(): PlanStore {
  let db: Database | null = null;
  let filePath: string | null = null;

  const requireDb = (): Database => {
    if (!db) throw new StoreError('Database not initialized');
    return db;
  };

  const persist = (conn: Database): void => {
    if (filePath) {
      writeFileSync(filePath, conn.export());
    }
  };

  const init = async (options: PlanStoreOptions): Promise<void> => {
    try {
      const SQL = await loadSqlJs();
      let conn: Database;
      if (options.dbPath === ':memory:') {
        conn = new SQL.Database();
        filePath = null;
      } else {
        mkdirSync(dirname(options.dbPath), { recursive: true });
        conn = existsSync(options.dbPath)
          ? new SQL.Database(readFileSync(options.dbPath))
          : new SQL.Database();
        filePath = options.dbPath;
      }
      runMigrations(conn);
      persist(conn);
      db = conn;
    } catch (error) {
      throw new StoreError(`Failed to open plan store at ${options.dbPath}`, { cause: error });
    }
  };

  const close = (): void => {
    if (db) {
      db.close();
      db = null;
    }
  };

  const save = (goal: string, plan: Plan, method: GenerationMethod): number => {
    const conn = requireDb();
    try {
      conn.run('INSERT INTO task_plans (goal, plan, llm_method) VALUES (?, ?, ?)', [
        goal,
        JSON.stringify(plan),
        method,
      ]);
      const [result] = conn.exec('SELECT last_insert_rowid()');
      const id = Number(result?.values[0]?.[0]);
      persist(conn);
      return id;
    } catch (error) {
      throw new StoreError('Failed to save plan', { cause: error });
    }
  };

  const rowToRecord = (row: PlanDbRow): StoredPlanRecord => {
    let rawPlan: unknown;
    try {
      rawPlan = JSON.parse(row.plan);
    } catch (error) {
      throw new StoreError(`Stored plan ${row.id} is not valid JSON`, { cause: error });
    }

    const plan = PlanSchema.safeParse(rawPlan);
    if (!plan.success) {
      throw new StoreError(`Stored plan ${row.id} does not match the plan format`, {
        details: { issues: plan.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
      });
    }

    const method = GenerationMethodSchema.safeParse(row.llm_method);
    if (!method.success) {
      throw new StoreError(`Stored plan ${row.id} has unknown method "${row.llm_method}"`);
    }

    return {
      id: row.id,
      goal: row.goal,
      plan: plan.data,
      llm_method: method.data,
      created_at: row.created_at,
    };
  };

  const load = (id: number): StoredPlanRecord | null => {
    const conn = requireDb();
    let raw: Record<string, unknown> | undefined;
    try {
      const stmt = conn.prepare(
        'SELECT id, goal, plan, llm_method, created_at FROM task_plans WHERE id = ?',
      );
      try {
        stmt.bind([id]);
        raw = stmt.step() ? stmt.getAsObject() : undefined;
      } finally {
        stmt.free();
      }
    } catch (error) {
      throw new StoreError(`Failed to load plan ${id}`, { cause: error });
    }
    if (!raw) return null;

    const row = PlanDbRowSchema.safeParse(raw);
    if (!row.success) {
      throw new StoreError(`Stored plan ${id} has an unexpected row shape`);
    }
    return rowToRecord(row.data);
  };

  return { init, close, save, load };
}
