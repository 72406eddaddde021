import type { Database } from 'sql.js';

interface Migration {
  version: number;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    sql: `
      CREATE TABLE IF NOT EXISTS task_plans (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        goal TEXT NOT NULL,
        plan TEXT NOT NULL,
        llm_method TEXT DEFAULT 'unknown',
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );
    `,
  },
];

export function getSchemaVersion(db: Database): number {
  const [result] = db.exec('PRAGMA user_version');
  return Number(result?.values[0]?.[0] ?? 0);
}

/**
 * Applies pending migrations, tracking progress in `PRAGMA user_version`.
 */
export function runMigrations(db: Database): void {
  const current = getSchemaVersion(db);

  for (const migration of MIGRATIONS) {
    if (migration.version <= current) continue;
    db.exec('BEGIN');
    try {
      db.exec(migration.sql);
      db.exec(`PRAGMA user_version = ${migration.version}`);
      db.exec('COMMIT');
    } catch (error) {
      db.exec('ROLLBACK');
      throw error;
    }
  }
}
