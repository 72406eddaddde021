import type { AdapterContext, GenerateRequest, GenerateResponse } from './types';

/**
 * Interface for LLM provider adapters.
 *
 * @example
 * ```typescript
 * class MyAdapter implements ProviderAdapter {
 *   id() { return 'my-adapter'; }
 *   model() { return 'my-model'; }
 *   async probe() { return true; }
 *   async generate(req, ctx) { return { text: '{"goal": "..."}' }; }
 * }
 * ```
 */
export interface ProviderAdapter {
  /** Unique identifier for this adapter; doubles as the generation method tag. */
  id(): string;
  model(): string;
  /**
   * Liveness check. Resolves to false instead of rejecting when the server
   * cannot be reached.
   */
  probe(ctx: AdapterContext): Promise<boolean>;
  /**
   * Generate a completion for a single prompt.
   * Rejects on transport failure, non-200 status or timeout.
   */
  generate(req: GenerateRequest, ctx: AdapterContext): Promise<GenerateResponse>;
}
