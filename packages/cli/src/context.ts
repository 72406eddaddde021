import path from 'path';
import {
  ConsoleLogger,
  JsonlLogger,
  type Config,
  type ConfigInput,
  type Logger,
} from '@taskplanner/shared';
import { ConfigLoader, PlannerService, createDefaultRegistry } from '@taskplanner/core';
import { createPlanStore, type PlanStore } from '@taskplanner/store';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

export interface CliContext {
  config: Config;
  logger: Logger;
  store: PlanStore;
  service: PlannerService;
  close(): void;
}

export function loadConfig(globals: GlobalOptions, flags: ConfigInput = {}): Config {
  return ConfigLoader.load({ configPath: globals.config, flags });
}

export function createLogger(globals: GlobalOptions, config: Config): Logger {
  // JSON output owns stdout; only errors reach the console.
  const level = globals.json ? 'error' : globals.verbose ? 'debug' : config.logging.level;
  const consoleLogger = new ConsoleLogger({ level });
  return config.logging.tracePath
    ? new JsonlLogger(path.resolve(config.logging.tracePath), consoleLogger)
    : consoleLogger;
}

/**
 * Loads config, opens the plan store and starts the planner service.
 * Callers must `close()` the context when done.
 */
export async function createCliContext(
  globals: GlobalOptions,
  flags: ConfigInput = {},
): Promise<CliContext> {
  const config = loadConfig(globals, flags);
  const logger = createLogger(globals, config);

  const store = createPlanStore();
  await store.init({ dbPath: path.resolve(config.store.path) });

  try {
    const adapter = createDefaultRegistry(config).getAdapter();
    const service = await PlannerService.create({ config, store, adapter, logger });
    return { config, logger, store, service, close: () => store.close() };
  } catch (error) {
    store.close();
    throw error;
  }
}
