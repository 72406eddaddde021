import { z } from 'zod';
import { parseIsoDate } from '../dates';

export const PrioritySchema = z.enum(['High', 'Medium', 'Low']);
export type Priority = z.infer<typeof PrioritySchema>;

/** Generation methods a stored plan can be tagged with. `huggingface` is reserved. */
export const GenerationMethodSchema = z.enum(['ollama', 'fallback', 'huggingface']);
export type GenerationMethod = z.infer<typeof GenerationMethodSchema>;

export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine((value) => parseIsoDate(value) !== null, 'Expected a calendar date');

export const TaskSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  description: z.string(),
  estimated_hours: z.number().int().positive(),
  dependencies: z.array(z.number().int().positive()),
  deadline: IsoDateSchema,
  priority: PrioritySchema,
  category: z.string(),
});
export type Task = z.infer<typeof TaskSchema>;

export const MilestoneSchema = z.object({
  name: z.string(),
  date: IsoDateSchema,
  tasks_completed: z.array(z.number().int().positive()),
});
export type Milestone = z.infer<typeof MilestoneSchema>;

export const TimelineSchema = z.object({
  start_date: IsoDateSchema,
  end_date: IsoDateSchema,
  milestones: z.array(MilestoneSchema),
});
export type Timeline = z.infer<typeof TimelineSchema>;

/**
 * Wire contract for a plan. Field names are part of the JSON format shared
 * with the LLM prompt, the store and the HTTP API.
 */
export const PlanSchema = z
  .object({
    goal: z.string(),
    estimated_duration: z.string(),
    tasks: z.array(TaskSchema),
    timeline: TimelineSchema,
  })
  .superRefine((plan, ctx) => {
    plan.tasks.forEach((task, index) => {
      for (const dep of task.dependencies) {
        if (dep >= task.id) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['tasks', index, 'dependencies'],
            message: `Task ${task.id} depends on task ${dep}; dependencies must reference earlier tasks`,
          });
        }
      }
    });
  });
export type Plan = z.infer<typeof PlanSchema>;

export interface StoredPlanRecord {
  id: number;
  goal: string;
  plan: Plan;
  llm_method: GenerationMethod;
  created_at: string;
}
