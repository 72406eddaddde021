import pc from 'picocolors';
import type { GenerationMethod, Plan, StoredPlanRecord } from '@taskplanner/shared';
import { printTable } from './table';

export interface PlanOutput {
  /** Present when the plan was stored. */
  id?: number;
  plan: Plan;
  llm_method: GenerationMethod;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderPlan(output: PlanOutput): void {
    if (this.isJson) {
      console.log(JSON.stringify(output, null, 2));
      return;
    }

    const heading =
      output.id !== undefined ? `✅ Plan #${output.id} created.` : '✅ Plan generated (not saved).';
    console.log(`\n${pc.green(heading)}`);
    this.renderPlanBody(output.plan, output.llm_method);

    if (output.id !== undefined) {
      console.log(pc.bold('\nNext steps:'));
      console.log(`  - To view this plan again, run: ${pc.cyan(`taskplanner show ${output.id}`)}`);
    }
  }

  renderRecord(record: StoredPlanRecord): void {
    if (this.isJson) {
      console.log(JSON.stringify(record, null, 2));
      return;
    }

    console.log(`\n${pc.bold(`Plan #${record.id}`)} ${pc.gray(`created ${record.created_at}`)}`);
    this.renderPlanBody(record.plan, record.llm_method);
  }

  private renderPlanBody(plan: Plan, method: GenerationMethod): void {
    const { start_date, end_date, milestones } = plan.timeline;
    console.log(`  ${pc.bold('Goal:')} ${plan.goal}`);
    console.log(`  ${pc.bold('Duration:')} ${plan.estimated_duration} (${start_date} → ${end_date})`);
    console.log(`  ${pc.bold('Method:')} ${method}`);

    console.log(pc.bold('\nTasks:'));
    printTable(
      plan.tasks.map((task) => ({
        id: task.id,
        title: task.title,
        category: task.category,
        hours: task.estimated_hours,
        after: task.dependencies.join(', ') || '-',
        deadline: task.deadline,
        priority: task.priority,
      })),
    );

    console.log(pc.bold('\nMilestones:'));
    for (const milestone of milestones) {
      const done = milestone.tasks_completed.length;
      console.log(
        `  ${milestone.date}  ${milestone.name} ${pc.gray(`(${done} task${done === 1 ? '' : 's'})`)}`,
      );
    }
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }
}
