import { mkdtempSync, rmSync, existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { StoreError, type Plan } from '@taskplanner/shared';
import { createPlanStore, loadSqlJs, type PlanStore } from './store';
import { getSchemaVersion } from './migrations';

const samplePlan: Plan = {
  goal: 'Organize a team workshop',
  estimated_duration: '14 days',
  tasks: [
    {
      id: 1,
      title: 'Event Concept & Planning',
      description: 'Define the agenda',
      estimated_hours: 8,
      dependencies: [],
      deadline: '2025-03-03',
      priority: 'High',
      category: 'Planning',
    },
    {
      id: 2,
      title: 'Venue Selection & Booking',
      description: 'Book a room',
      estimated_hours: 12,
      dependencies: [1],
      deadline: '2025-03-04',
      priority: 'High',
      category: 'Logistics',
    },
  ],
  timeline: {
    start_date: '2025-03-01',
    end_date: '2025-03-15',
    milestones: [
      { name: 'Project Kickoff & Planning Complete', date: '2025-03-01', tasks_completed: [] },
      { name: 'Project Completion & Delivery', date: '2025-03-15', tasks_completed: [1, 2] },
    ],
  },
};

async function insertRaw(dbPath: string, sql: string, params: string[]): Promise<void> {
  const SQL = await loadSqlJs();
  const raw = new SQL.Database(readFileSync(dbPath));
  raw.run(sql, params);
  writeFileSync(dbPath, raw.export());
  raw.close();
}

describe('SQLite PlanStore', () => {
  let store: PlanStore;
  let dbPath: string;
  let tempDir: string;

  beforeEach(async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'taskplanner-test-'));
    dbPath = join(tempDir, 'nested', 'tasks.db');
    store = createPlanStore();
    await store.init({ dbPath });
  });

  afterEach(() => {
    store.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('creates parent directories and the database file', () => {
    expect(existsSync(dbPath)).toBe(true);
  });

  it('records the schema version in the database file', async () => {
    const SQL = await loadSqlJs();
    const raw = new SQL.Database(readFileSync(dbPath));
    expect(getSchemaVersion(raw)).toBe(1);
    raw.close();
  });

  it('round-trips a saved plan', () => {
    const id = store.save(samplePlan.goal, samplePlan, 'fallback');
    const record = store.load(id);

    expect(record).not.toBeNull();
    expect(record?.id).toBe(id);
    expect(record?.goal).toBe('Organize a team workshop');
    expect(record?.llm_method).toBe('fallback');
    expect(record?.plan).toEqual(samplePlan);
    expect(record?.created_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it('assigns strictly increasing ids', () => {
    const first = store.save('a', samplePlan, 'fallback');
    const second = store.save('b', samplePlan, 'ollama');
    expect(second).toBeGreaterThan(first);
  });

  it('returns null for an unknown id', () => {
    expect(store.load(9999)).toBeNull();
  });

  it('keeps records across reopen', async () => {
    const id = store.save(samplePlan.goal, samplePlan, 'ollama');
    store.close();

    const reopened = createPlanStore();
    await reopened.init({ dbPath });
    expect(reopened.load(id)?.llm_method).toBe('ollama');
    reopened.close();
  });

  it('rejects a stored row that no longer matches the plan format', async () => {
    store.close();
    await insertRaw(dbPath, 'INSERT INTO task_plans (goal, plan, llm_method) VALUES (?, ?, ?)', [
      'x',
      '{"goal":1}',
      'fallback',
    ]);

    await store.init({ dbPath });
    expect(() => store.load(1)).toThrow('Stored plan 1 does not match the plan format');
  });

  it('rejects an unknown stored method', async () => {
    store.close();
    await insertRaw(dbPath, 'INSERT INTO task_plans (goal, plan) VALUES (?, ?)', [
      'x',
      JSON.stringify(samplePlan),
    ]);

    await store.init({ dbPath });
    expect(() => store.load(1)).toThrow('Stored plan 1 has unknown method "unknown"');
  });
});

describe('uninitialized PlanStore', () => {
  it('throws StoreError on use', () => {
    const store = createPlanStore();
    expect(() => store.load(1)).toThrow(StoreError);
    expect(() => store.save('g', samplePlan, 'fallback')).toThrow('Database not initialized');
  });

  it('works against an in-memory database', async () => {
    const store = createPlanStore();
    await store.init({ dbPath: ':memory:' });
    const id = store.save('g', samplePlan, 'fallback');
    expect(id).toBe(1);
    expect(store.load(id)?.plan.tasks).toHaveLength(2);
    store.close();
  });

  it('wraps open failures in StoreError', async () => {
    const tempDir = mkdtempSync(join(tmpdir(), 'taskplanner-test-'));
    const dbPath = join(tempDir, 'broken.db');
    writeFileSync(dbPath, 'not a sqlite database\n'.repeat(100));

    const store = createPlanStore();
    await expect(store.init({ dbPath })).rejects.toThrow(`Failed to open plan store at ${dbPath}`);
    expect(() => store.load(1)).toThrow('Database not initialized');
    rmSync(tempDir, { recursive: true, force: true });
  });
});
