import { ProviderError } from '@taskplanner/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext, GenerateRequest, GenerateResponse } from '../types';
import { executeProviderRequest } from '../common';

export interface FakeAdapterOptions {
  /** Result of `probe()`. Default: true */
  available?: boolean;
  /**
   * Completion text, or a function of the prompt. When a list is given the
   * entries are returned in order and the last one repeats.
   */
  responses?: string | string[] | ((prompt: string) => string);
  /** When set, every `generate()` call rejects with this error. */
  failWith?: Error;
}

/**
 * In-process stand-in for an LLM server. Selected with `llm.provider: fake`
 * and used by tests.
 */
export class FakeAdapter implements ProviderAdapter {
  readonly prompts: string[] = [];
  private cursor = 0;

  constructor(private readonly options: FakeAdapterOptions = {}) {}

  id(): string {
    return 'fake';
  }

  model(): string {
    return 'fake-model';
  }

  async probe(_ctx: AdapterContext): Promise<boolean> {
    return this.options.available ?? true;
  }

  async generate(req: GenerateRequest, ctx: AdapterContext): Promise<GenerateResponse> {
    return executeProviderRequest(ctx, this.id(), this.model(), async () => {
      this.prompts.push(req.prompt);
      if (this.options.failWith) {
        throw this.options.failWith;
      }
      return { text: this.nextResponse(req.prompt) };
    });
  }

  private nextResponse(prompt: string): string {
    const { responses } = this.options;
    if (responses === undefined) {
      throw new ProviderError('FakeAdapter has no scripted response');
    }
    if (typeof responses === 'function') return responses(prompt);
    if (typeof responses === 'string') return responses;

    const index = Math.min(this.cursor, responses.length - 1);
    this.cursor++;
    const text = responses[index];
    if (text === undefined) {
      throw new ProviderError('FakeAdapter has no scripted response');
    }
    return text;
  }
}
