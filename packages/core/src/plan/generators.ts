import {
  PlanSchema,
  ProviderUnavailableError,
  addDays,
  extractJsonObject,
  formatIsoDate,
  type GenerationMethod,
  type Logger,
  type Plan,
} from '@taskplanner/shared';
import type { ProviderAdapter } from '@taskplanner/adapters';
import { extractTimeframe } from './timeframe';
import { classify } from './classifier';
import { synthesizeTasks } from './synthesizer';
import { synthesizeMilestones } from './milestones';
import { buildPlanPrompt } from './prompt';
import { DEFAULT_TEMPLATES, type TemplateTable } from './templates';

export interface GenerationContext {
  runId: string;
  logger: Logger;
  /** Start date of the plan; also the date quoted in the LLM prompt. */
  today: Date;
}

/**
 * One way of turning a goal into a plan. `method` is recorded with every
 * stored plan the generator produced.
 */
export interface PlanGenerator {
  readonly method: GenerationMethod;
  generate(goal: string, ctx: GenerationContext): Promise<Plan>;
}

/**
 * Deterministic plan for a goal: timeframe, family and subject are read from
 * the goal text and the tasks come from the template table.
 */
export function buildRuleBasedPlan(
  goal: string,
  today: Date,
  templates: TemplateTable = DEFAULT_TEMPLATES,
): Plan {
  const totalDays = extractTimeframe(goal);
  const { family, subject } = classify(goal);
  const endDate = addDays(today, totalDays);

  const tasks = synthesizeTasks({ goal, family, subject, totalDays, startDate: today, templates });

  return {
    goal,
    estimated_duration: `${totalDays} days`,
    tasks,
    timeline: {
      start_date: formatIsoDate(today),
      end_date: formatIsoDate(endDate),
      milestones: synthesizeMilestones(tasks, today, endDate, totalDays),
    },
  };
}

export class RuleBasedGenerator implements PlanGenerator {
  readonly method: GenerationMethod = 'fallback';

  constructor(private readonly templates: TemplateTable = DEFAULT_TEMPLATES) {}

  async generate(goal: string, ctx: GenerationContext): Promise<Plan> {
    return buildRuleBasedPlan(goal, ctx.today, this.templates);
  }
}

export interface RemoteGeneratorOptions {
  temperature: number;
  topP: number;
  timeoutMs: number;
}

/**
 * Asks an LLM server for the plan. Every failure, including a reply that does
 * not hold a valid plan object, surfaces as `ProviderUnavailableError`; no
 * partial plan is ever returned.
 */
export class RemoteGenerator implements PlanGenerator {
  readonly method: GenerationMethod = 'ollama';

  constructor(
    private readonly adapter: ProviderAdapter,
    private readonly options: RemoteGeneratorOptions,
  ) {}

  async generate(goal: string, ctx: GenerationContext): Promise<Plan> {
    const prompt = buildPlanPrompt(goal, ctx.today);

    let text: string;
    try {
      const response = await this.adapter.generate(
        { prompt, temperature: this.options.temperature, topP: this.options.topP },
        { runId: ctx.runId, logger: ctx.logger, timeoutMs: this.options.timeoutMs },
      );
      text = response.text;
    } catch (error) {
      throw new ProviderUnavailableError(
        `${this.adapter.id()} request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    let candidate: Record<string, unknown>;
    try {
      candidate = extractJsonObject(text, this.adapter.id());
    } catch (error) {
      throw new ProviderUnavailableError(
        error instanceof Error ? error.message : String(error),
        { cause: error },
      );
    }

    const parsed = PlanSchema.safeParse(candidate);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new ProviderUnavailableError(`${this.adapter.id()} returned an invalid plan`, {
        details: { issues },
      });
    }
    return parsed.data;
  }
}
