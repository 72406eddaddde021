import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { NotFoundError, UsageError } from '@taskplanner/shared';
import { createProgram } from '../program';

describe('plan and show commands', () => {
  let tempDir: string;
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'taskplanner-cli-'));
    vi.stubEnv('TASKPLANNER_DB_PATH', join(tempDir, 'tasks.db'));
    vi.stubEnv('TASKPLANNER_LLM_DISABLED', 'true');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  const run = (...args: string[]) =>
    createProgram().parseAsync(['node', 'taskplanner', ...args]);

  const lastJsonOutput = (): unknown => {
    const call = logSpy.mock.calls.at(-1);
    return JSON.parse(String(call?.[0]));
  };

  it('creates a plan and prints it as JSON', async () => {
    await run('--json', 'plan', 'Launch a mobile app in 3 weeks');

    expect(lastJsonOutput()).toMatchObject({
      id: 1,
      llm_method: 'fallback',
      plan: { goal: 'Launch a mobile app in 3 weeks', estimated_duration: '21 days' },
    });
  });

  it('shows a stored plan', async () => {
    await run('--json', 'plan', 'Organize a conference');
    await run('--json', 'show', '1');

    expect(lastJsonOutput()).toMatchObject({
      id: 1,
      goal: 'Organize a conference',
      llm_method: 'fallback',
      plan: { estimated_duration: '14 days' },
    });
  });

  it('does not store plans with --no-save', async () => {
    await run('--json', 'plan', '--no-save', 'Renovate the kitchen');

    const output = lastJsonOutput();
    expect(output).toMatchObject({ llm_method: 'fallback', plan: { goal: 'Renovate the kitchen' } });
    expect(output).not.toHaveProperty('id');

    await expect(run('--json', 'show', '1')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('renders a readable plan without --json', async () => {
    await run('plan', 'Write a research paper in 10 days');

    const output = logSpy.mock.calls.map((c) => String(c[0])).join('\n');
    expect(output).toContain('Plan #1 created.');
    expect(output).toContain('Write a research paper in 10 days');
    expect(output).toContain('Topic Selection & Literature Review');
    expect(output).toContain('Project Completion & Delivery');
    expect(output).toContain('taskplanner show 1');
  });

  it('rejects an empty goal', async () => {
    await expect(run('--json', 'plan', '   ')).rejects.toThrow('Goal is required');
  });

  it('requires a goal in JSON mode', async () => {
    await expect(run('--json', 'plan')).rejects.toBeInstanceOf(UsageError);
  });

  it('rejects a malformed id', async () => {
    await expect(run('show', 'abc')).rejects.toThrow(
      'Invalid plan id "abc". Must be a positive integer.',
    );
  });
});
