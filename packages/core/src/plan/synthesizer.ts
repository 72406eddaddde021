import { addDays, formatIsoDate, type Task } from '@taskplanner/shared';
import {
  DEFAULT_TEMPLATES,
  interpolate,
  type DeadlineRule,
  type TemplateFamily,
  type TemplateTable,
} from './templates';
import { DEFAULT_SUBJECT } from './classifier';

function rawOffset(rule: DeadlineRule, totalDays: number): number {
  switch (rule.kind) {
    case 'divide':
      return Math.max(rule.floor, Math.floor(totalDays / rule.divisor));
    case 'ratio':
      return Math.max(rule.floor, Math.trunc(totalDays * rule.ratio));
    case 'end':
      return totalDays;
  }
}

/**
 * Day offset of a deadline rule, clamped to `totalDays` so no deadline falls
 * after the end of the timeline.
 */
export function deadlineOffset(rule: DeadlineRule, totalDays: number): number {
  return Math.min(rawOffset(rule, totalDays), totalDays);
}

/** Number of tasks in a generic plan: `totalDays / 3`, kept within 4..7. */
export function genericTaskCount(totalDays: number): number {
  return Math.max(4, Math.min(7, Math.floor(totalDays / 3)));
}

export interface SynthesizeOptions {
  goal: string;
  family: TemplateFamily;
  subject: string | null;
  totalDays: number;
  startDate: Date;
  templates?: TemplateTable;
}

/**
 * Builds the task list for a classified goal from the template table.
 * Ids run from 1 in list order and every dependency points at an earlier id.
 */
export function synthesizeTasks(options: SynthesizeOptions): Task[] {
  const { goal, family, totalDays, startDate } = options;
  const templates = options.templates ?? DEFAULT_TEMPLATES;

  if (family === 'generic') {
    return synthesizeGenericTasks(goal, totalDays, startDate, templates);
  }

  const values = { subject: options.subject ?? DEFAULT_SUBJECT, goal };
  return templates.families[family].map((template, index) => ({
    id: index + 1,
    title: interpolate(template.title, values),
    description: interpolate(template.description, values),
    estimated_hours: template.estimated_hours,
    dependencies: [...template.dependencies],
    deadline: formatIsoDate(addDays(startDate, deadlineOffset(template.deadline, totalDays))),
    priority: template.priority,
    category: template.category,
  }));
}

function synthesizeGenericTasks(
  goal: string,
  totalDays: number,
  startDate: Date,
  templates: TemplateTable,
): Task[] {
  const { phases, priorities } = templates.generic;
  const numTasks = genericTaskCount(totalDays);
  const taskDuration = totalDays / numTasks;
  const tasks: Task[] = [];

  for (let i = 0; i < numTasks; i++) {
    const phase = phases[Math.min(i, phases.length - 1)];
    const priority = priorities[Math.min(i, priorities.length - 1)];
    if (!phase || !priority) break;
    // The last phase closes the plan on its end date.
    const offset = i === numTasks - 1 ? totalDays : Math.trunc(i * taskDuration);

    tasks.push({
      id: i + 1,
      title: phase.name,
      description: interpolate(phase.description, { goal }),
      estimated_hours: 10 + (i % 3) * 6,
      dependencies: i > 0 ? [i] : [],
      deadline: formatIsoDate(addDays(startDate, offset)),
      priority,
      category: phase.category,
    });
  }

  return tasks;
}
