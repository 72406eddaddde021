import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsonlLogger } from './jsonlLogger';
import { ConsoleLogger } from './consoleLogger';
import type { PlanRequested, PlanSaved } from '../types/events';

describe('JsonlLogger', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'taskplanner-logger-test-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const requested: PlanRequested = {
    schemaVersion: 1,
    timestamp: '2023-01-01T00:00:00Z',
    runId: 'run-1',
    type: 'PlanRequested',
    payload: { goal: 'test', method: 'fallback' },
  };

  it('creates the parent directory and appends events in JSONL format', async () => {
    const logPath = path.join(tmpDir, 'nested', 'trace.jsonl');
    const logger = new JsonlLogger(logPath, new ConsoleLogger());

    const saved: PlanSaved = {
      ...requested,
      type: 'PlanSaved',
      payload: { planId: 3, method: 'fallback' },
    };

    await logger.log(requested);
    await logger.log(saved);

    const lines = (await fs.readFile(logPath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(requested);
    expect(JSON.parse(lines[1])).toEqual(saved);
  });

  it('reports write failures through the console logger instead of throwing', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    // A directory cannot be appended to.
    const logger = new JsonlLogger(tmpDir, new ConsoleLogger());

    await expect(logger.log(requested)).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith(
      `Failed to write to trace file at ${tmpDir}`,
      expect.any(Error),
    );
  });

  it('forwards levelled messages with child bindings', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new JsonlLogger(path.join(tmpDir, 'trace.jsonl'), new ConsoleLogger());

    logger.child({ runId: 'r1' }).info('hello');

    expect(infoSpy).toHaveBeenCalledWith('[runId=r1] hello');
  });
});
