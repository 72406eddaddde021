import { z } from 'zod';
import { ProviderError } from '@taskplanner/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterContext, GenerateRequest, GenerateResponse } from '../types';
import { executeProviderRequest } from '../common';

export interface OllamaAdapterConfig {
  baseUrl: string;
  model: string;
  temperature?: number;
  topP?: number;
  /** Timeout for the liveness probe. Default: 2000 */
  probeTimeoutMs?: number;
}

// Only `response` is read; Ollama also returns timing and context fields.
const GenerateBodySchema = z.object({
  response: z.string().default(''),
});

/**
 * Adapter for a local Ollama server (`/api/tags`, `/api/generate`).
 */
export class OllamaAdapter implements ProviderAdapter {
  private readonly baseUrl: string;

  constructor(private readonly config: OllamaAdapterConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  id(): string {
    return 'ollama';
  }

  model(): string {
    return this.config.model;
  }

  async probe(ctx: AdapterContext): Promise<boolean> {
    const timeoutMs = this.config.probeTimeoutMs ?? 2000;
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(timeoutMs),
      });
      return response.status === 200;
    } catch (error) {
      await ctx.logger.debug(
        `Ollama probe at ${this.baseUrl} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  async generate(req: GenerateRequest, ctx: AdapterContext): Promise<GenerateResponse> {
    return executeProviderRequest(ctx, this.id(), this.config.model, async (signal) => {
      const response = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          prompt: req.prompt,
          stream: false,
          options: {
            temperature: req.temperature ?? this.config.temperature ?? 0.7,
            top_p: req.topP ?? this.config.topP ?? 0.9,
          },
        }),
        signal,
      });

      if (response.status !== 200) {
        throw new ProviderError(`Ollama API error: ${response.status}`, {
          status: response.status,
        });
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new ProviderError('Ollama returned a non-JSON body', { cause: error });
      }

      const parsed = GenerateBodySchema.safeParse(body);
      if (!parsed.success) {
        throw new ProviderError('Ollama response has no text completion', {
          details: { issues: parsed.error.issues.map((i) => i.message) },
        });
      }
      return { text: parsed.data.response, raw: body };
    });
  }
}
