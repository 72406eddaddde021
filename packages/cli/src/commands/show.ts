import { Command } from 'commander';
import { UsageError } from '@taskplanner/shared';
import { createCliContext, type GlobalOptions } from '../context';
import { OutputRenderer } from '../output/renderer';

export function parsePlanId(raw: string): number {
  const id = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new UsageError(`Invalid plan id "${raw}". Must be a positive integer.`);
  }
  return id;
}

export function registerShowCommand(program: Command) {
  program
    .command('show')
    .argument('<id>', 'Id of a stored plan')
    .description('Print a stored plan')
    .action(async (rawId: string) => {
      const globals = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globals.json);
      const id = parsePlanId(rawId);

      const ctx = await createCliContext(globals);
      try {
        renderer.renderRecord(ctx.service.getPlan(id));
      } finally {
        ctx.close();
      }
    });
}
