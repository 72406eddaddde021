import { TimeoutError } from '@taskplanner/shared';
import type { AdapterContext } from '../types';

/**
 * Executes a single provider request with timeout and abort handling.
 *
 * Failures are not retried: callers treat one failed attempt as final and
 * switch to the rule-based generator. A `ProviderRequestStarted` event is
 * logged before the call and a `ProviderRequestFinished` event after it,
 * carrying `success`, `durationMs` and the error message on failure.
 *
 * When `ctx.timeoutMs` elapses the request signal is aborted and the call
 * rejects with a `TimeoutError`, whatever the request function threw.
 *
 * ```typescript
 * const body = await executeProviderRequest(ctx, 'ollama', 'llama2', (signal) =>
 *   fetch(url, { method: 'POST', body, signal }),
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const startTime = Date.now();

  await ctx.logger.log({
    type: 'ProviderRequestStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: { provider, model },
  });

  const abortController = new AbortController();
  const abortHandler = () => abortController.abort(ctx.abortSignal?.reason);

  if (ctx.abortSignal) {
    if (ctx.abortSignal.aborted) {
      abortHandler();
    } else {
      ctx.abortSignal.addEventListener('abort', abortHandler);
    }
  }

  let timedOut = false;
  let timeoutId: NodeJS.Timeout | undefined;
  if (ctx.timeoutMs) {
    const timeoutMs = ctx.timeoutMs;
    timeoutId = setTimeout(() => {
      timedOut = true;
      abortController.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  }

  const finish = async (success: boolean, error?: unknown) => {
    if (timeoutId) clearTimeout(timeoutId);
    if (ctx.abortSignal) ctx.abortSignal.removeEventListener('abort', abortHandler);

    await ctx.logger.log({
      type: 'ProviderRequestFinished',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId: ctx.runId,
      payload: {
        provider,
        durationMs: Date.now() - startTime,
        success,
        ...(error !== undefined
          ? { error: error instanceof Error ? error.message : String(error) }
          : {}),
      },
    });
  };

  try {
    const result = await requestFn(abortController.signal);
    await finish(true);
    return result;
  } catch (error: unknown) {
    const failure = timedOut
      ? new TimeoutError(`Request timed out after ${ctx.timeoutMs}ms`, { cause: error })
      : error;
    await finish(false, failure);
    throw failure;
  }
}
