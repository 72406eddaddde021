import { z } from 'zod';
import { PrioritySchema } from '@taskplanner/shared';
import rawTemplates from './templates.json';

/**
 * Deadline offset (in days from the start date) as a function of the plan's
 * total duration.
 *
 * - `divide`: `max(floor, ⌊total / divisor⌋)`
 * - `ratio`:  `max(floor, trunc(total × ratio))`
 * - `end`:    `total`
 */
export const DeadlineRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('divide'),
    floor: z.number().int().nonnegative(),
    divisor: z.number().int().positive(),
  }),
  z.object({
    kind: z.literal('ratio'),
    floor: z.number().int().nonnegative(),
    ratio: z.number().positive(),
  }),
  z.object({ kind: z.literal('end') }),
]);
export type DeadlineRule = z.infer<typeof DeadlineRuleSchema>;

export const TaskTemplateSchema = z.object({
  title: z.string(),
  description: z.string(),
  estimated_hours: z.number().int().positive(),
  dependencies: z.array(z.number().int().positive()),
  priority: PrioritySchema,
  category: z.string(),
  deadline: DeadlineRuleSchema,
});
export type TaskTemplate = z.infer<typeof TaskTemplateSchema>;

export const PhaseTemplateSchema = z.object({
  name: z.string(),
  description: z.string(),
  category: z.string(),
});
export type PhaseTemplate = z.infer<typeof PhaseTemplateSchema>;

export const TemplateFamilySchema = z.enum(['product', 'event', 'learning', 'research', 'generic']);
export type TemplateFamily = z.infer<typeof TemplateFamilySchema>;

/** Families backed by a fixed task list. */
export type NamedFamily = Exclude<TemplateFamily, 'generic'>;

export const TemplateTableSchema = z.object({
  families: z.object({
    product: z.array(TaskTemplateSchema).min(1),
    event: z.array(TaskTemplateSchema).min(1),
    learning: z.array(TaskTemplateSchema).min(1),
    research: z.array(TaskTemplateSchema).min(1),
  }),
  generic: z.object({
    phases: z.array(PhaseTemplateSchema).min(1),
    priorities: z.array(PrioritySchema).min(1),
  }),
});
export type TemplateTable = z.infer<typeof TemplateTableSchema>;

/** The built-in table shipped with the planner. */
export const DEFAULT_TEMPLATES: TemplateTable = TemplateTableSchema.parse(rawTemplates);

/** Replaces `{name}` placeholders; unknown names are left untouched. */
export function interpolate(text: string, values: Record<string, string>): string {
  return text.replace(/\{(\w+)\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}
