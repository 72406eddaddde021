import { Command } from 'commander';
import { UsageError } from '@taskplanner/shared';
import { createCliContext, type GlobalOptions } from '../context';
import { OutputRenderer } from '../output/renderer';
import { ConsoleUI } from '../ui/console';

interface PlanCommandOptions {
  save: boolean;
}

export function registerPlanCommand(program: Command, ui: ConsoleUI = new ConsoleUI()) {
  program
    .command('plan')
    .argument('[goal]', 'The goal to plan (prompted for when omitted)')
    .description('Generate a task plan for a goal and store it')
    .option('--no-save', 'Print the plan without storing it')
    .action(async (goalArg: string | undefined, options: PlanCommandOptions) => {
      const globals = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globals.json);

      let goal = goalArg;
      if (goal === undefined) {
        if (globals.json || !process.stdin.isTTY) {
          throw new UsageError('A goal argument is required when not running interactively.');
        }
        goal = await ui.askGoal();
      }

      if (globals.verbose) renderer.log(`Planning goal: "${goal}"`);

      const ctx = await createCliContext(globals);
      try {
        if (options.save) {
          const created = await ctx.service.createPlan(goal);
          renderer.renderPlan(created);
        } else {
          const { plan, method } = await ctx.service.generateTaskPlan(goal);
          renderer.renderPlan({ plan, llm_method: method });
        }
      } finally {
        ctx.close();
      }
    });
}
