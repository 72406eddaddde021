import { Command } from 'commander';
import { version } from '../package.json';
import { registerPlanCommand } from './commands/plan';
import { registerShowCommand } from './commands/show';
import { registerServeCommand } from './commands/serve';
import { registerStatusCommand } from './commands/status';
import type { ConsoleUI } from './ui/console';

export const name = '@taskplanner/cli';

export interface ProgramOptions {
  ui?: ConsoleUI;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('taskplanner')
    .description('Break goals down into scheduled task plans')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerPlanCommand(program, options.ui);
  registerShowCommand(program);
  registerServeCommand(program);
  registerStatusCommand(program);

  return program;
}
