import { Command } from 'commander';
import path from 'path';
import chalk from 'chalk';
import { ConsoleLogger, type Config, type Logger } from '@taskplanner/shared';
import { createDefaultRegistry } from '@taskplanner/core';
import type { ProviderAdapter } from '@taskplanner/adapters';
import { loadConfig, type GlobalOptions } from '../context';

export type CheckStatus = 'ok' | 'warn' | 'fail';

export interface StatusCheck {
  status: CheckStatus;
  message: string;
}

const CHECKS: Record<CheckStatus, string> = {
  ok: chalk.green('✔'),
  warn: chalk.yellow('!'),
  fail: chalk.red('✖'),
};

async function checkLlm(
  config: Config,
  adapter: ProviderAdapter,
  logger: Logger,
): Promise<StatusCheck> {
  if (!config.llm.enabled) {
    return { status: 'warn', message: 'LLM generation is disabled; plans are rule-based.' };
  }
  const available = await adapter.probe({ runId: 'status', logger });
  if (available) {
    return {
      status: 'ok',
      message: `${adapter.id()} is reachable at ${config.llm.baseUrl} (model ${adapter.model()}).`,
    };
  }
  return {
    status: 'warn',
    message: `${adapter.id()} is not reachable at ${config.llm.baseUrl}; plans will be rule-based. Install Ollama and run: ollama pull llama2`,
  };
}

/** Configuration and LLM availability checks, in display order. */
export async function runStatusChecks(
  config: Config,
  adapter: ProviderAdapter,
  logger: Logger,
): Promise<StatusCheck[]> {
  return [
    { status: 'ok', message: 'Configuration loaded.' },
    await checkLlm(config, adapter, logger),
    { status: 'ok', message: `Plans are stored in ${path.resolve(config.store.path)}.` },
    {
      status: 'ok',
      message: `HTTP API listens on ${config.server.host}:${config.server.port}.`,
    },
  ];
}

export function registerStatusCommand(program: Command) {
  program
    .command('status')
    .description('Check LLM availability and configuration')
    .action(async () => {
      const globals = program.opts<GlobalOptions>();

      let checks: StatusCheck[];
      try {
        const config = loadConfig(globals);
        const adapter = createDefaultRegistry(config).getAdapter();
        checks = await runStatusChecks(config, adapter, new ConsoleLogger({ level: 'error' }));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        checks = [{ status: 'fail', message: `Failed to load configuration: ${message}` }];
      }

      if (globals.json) {
        console.log(JSON.stringify({ checks }, null, 2));
      } else {
        console.log(chalk.bold('Task Planner Status'));
        console.log('---------------------------------');
        checks.forEach(({ status, message }) => console.log(`${CHECKS[status]} ${message}`));
        console.log('---------------------------------');
      }

      if (checks.some((check) => check.status === 'fail')) {
        process.exitCode = 2;
      }
    });
}
