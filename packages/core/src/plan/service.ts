import { randomUUID } from 'node:crypto';
import {
  InvalidInputError,
  NotFoundError,
  ProviderUnavailableError,
  logger as defaultLogger,
  startOfDay,
  type Config,
  type GenerationMethod,
  type Logger,
  type Plan,
  type StoredPlanRecord,
} from '@taskplanner/shared';
import type { ProviderAdapter } from '@taskplanner/adapters';
import type { PlanStore } from '@taskplanner/store';
import {
  RemoteGenerator,
  RuleBasedGenerator,
  type GenerationContext,
  type PlanGenerator,
} from './generators';
import type { TemplateTable } from './templates';

/**
 * Generation strategy chosen once at startup. Never changes for the lifetime
 * of the service.
 */
export interface PlannerSettings {
  readonly primary: PlanGenerator;
  readonly fallback: RuleBasedGenerator;
  /** Method reported by `health()` and `llmStatus()`. */
  readonly method: GenerationMethod;
}

export interface PlannerServiceOptions {
  config: Config;
  store: PlanStore;
  /** LLM provider; when absent, or disabled in config, only the rule-based path runs. */
  adapter?: ProviderAdapter;
  logger?: Logger;
  /** Source of "today". Default: the system clock */
  clock?: () => Date;
  templates?: TemplateTable;
}

export interface GeneratedPlan {
  plan: Plan;
  method: GenerationMethod;
}

interface GenerationRun {
  result: GeneratedPlan;
  runId: string;
  /** Logger bound to the run. */
  logger: Logger;
}

export interface CreatedPlan {
  id: number;
  plan: Plan;
  llm_method: GenerationMethod;
}

export interface HealthReport {
  status: 'healthy';
  llm_method: GenerationMethod;
  timestamp: string;
}

export interface LlmStatusReport {
  current_method: GenerationMethod;
  available_methods: { ollama: boolean; huggingface: boolean; fallback: boolean };
  recommendations: { ollama: string; huggingface: string };
}

const RECOMMENDATIONS = {
  ollama: 'Install Ollama and run: ollama pull llama2',
  huggingface: 'Enhanced fallback provides better results for most use cases',
};

export class PlannerService {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private constructor(
    private readonly settings: PlannerSettings,
    private readonly options: PlannerServiceOptions,
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Probes the LLM provider once and fixes the primary generator.
   */
  static async create(options: PlannerServiceOptions): Promise<PlannerService> {
    const logger = options.logger ?? defaultLogger;
    const fallback = new RuleBasedGenerator(options.templates);
    const { adapter, config } = options;

    let primary: PlanGenerator = fallback;
    if (adapter && config.llm.enabled) {
      const available = await probeProvider(adapter, logger, 'startup');
      if (available) {
        primary = new RemoteGenerator(adapter, {
          temperature: config.llm.temperature,
          topP: config.llm.topP,
          timeoutMs: config.llm.generateTimeoutMs,
        });
      }
    }

    if (primary === fallback) {
      await logger.info('Using rule-based plan generator');
    } else {
      await logger.info(`Using ${adapter?.id() ?? 'remote'} LLM server (${adapter?.model() ?? ''})`);
    }

    return new PlannerService({ primary, fallback, method: primary.method }, options);
  }

  get method(): GenerationMethod {
    return this.settings.method;
  }

  /**
   * Generates a plan with the primary strategy, falling back to the
   * rule-based generator when the remote one is unavailable.
   *
   * @throws {InvalidInputError} when the goal is empty after trimming
   */
  async generateTaskPlan(goal: string): Promise<GeneratedPlan> {
    const { result } = await this.runGeneration(goal);
    return result;
  }

  private async runGeneration(goal: string): Promise<GenerationRun> {
    const trimmed = goal.trim();
    if (!trimmed) {
      throw new InvalidInputError();
    }

    const runId = randomUUID();
    const logger = this.logger.child({ runId: runId.slice(0, 8) });
    const ctx: GenerationContext = { runId, logger, today: startOfDay(this.clock()) };
    const { primary, fallback } = this.settings;

    await logger.log({
      type: 'PlanRequested',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId,
      payload: { goal: trimmed, method: primary.method },
    });

    let result: GeneratedPlan;
    try {
      result = { plan: await primary.generate(trimmed, ctx), method: primary.method };
    } catch (error) {
      if (!(error instanceof ProviderUnavailableError) || primary === fallback) {
        throw error;
      }
      await logger.warn(`${error.message}; using rule-based generator`);
      await logger.log({
        type: 'FallbackUsed',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId,
        payload: { goal: trimmed, reason: error.message },
      });
      result = { plan: await fallback.generate(trimmed, ctx), method: fallback.method };
    }

    await logger.log({
      type: 'PlanGenerated',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId,
      payload: {
        method: result.method,
        taskCount: result.plan.tasks.length,
        estimatedDuration: result.plan.estimated_duration,
      },
    });

    return { result, runId, logger };
  }

  /**
   * Generates a plan and persists it. The stored method is the one that
   * produced the plan.
   */
  async createPlan(goal: string): Promise<CreatedPlan> {
    const { result, runId, logger } = await this.runGeneration(goal);
    const { plan, method } = result;
    const id = this.options.store.save(goal.trim(), plan, method);

    await logger.log({
      type: 'PlanSaved',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId,
      payload: { planId: id, method },
    });

    return { id, plan, llm_method: method };
  }

  /**
   * @throws {NotFoundError} when no plan has this id
   */
  getPlan(id: number): StoredPlanRecord {
    const record = this.options.store.load(id);
    if (!record) {
      throw new NotFoundError(`Plan ${id} not found`);
    }
    return record;
  }

  health(): HealthReport {
    return {
      status: 'healthy',
      llm_method: this.settings.method,
      timestamp: this.clock().toISOString(),
    };
  }

  /** Re-probes the provider; the primary generator is not changed. */
  async llmStatus(): Promise<LlmStatusReport> {
    const { adapter, config } = this.options;
    const ollama =
      adapter !== undefined && config.llm.enabled
        ? await probeProvider(adapter, this.logger, 'status')
        : false;

    return {
      current_method: this.settings.method,
      available_methods: { ollama, huggingface: false, fallback: true },
      recommendations: { ...RECOMMENDATIONS },
    };
  }
}

async function probeProvider(
  adapter: ProviderAdapter,
  logger: Logger,
  runId: string,
): Promise<boolean> {
  const start = Date.now();
  const available = await adapter.probe({ runId, logger });
  await logger.log({
    type: 'ProviderProbed',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId,
    payload: { provider: adapter.id(), available, durationMs: Date.now() - start },
  });
  return available;
}
