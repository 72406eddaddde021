import type { Logger } from '@taskplanner/shared';

/**
 * Context passed to adapter methods for each request.
 */
export interface AdapterContext {
  /** Identifier of the request being served */
  runId: string;
  /** Logger instance for this request */
  logger: Logger;
  /** Signal to cancel the request */
  abortSignal?: AbortSignal;
  /** Maximum time in milliseconds for the request */
  timeoutMs?: number;
}

export interface GenerateRequest {
  prompt: string;
  temperature?: number;
  topP?: number;
}

export interface GenerateResponse {
  /** Raw completion text; may contain prose around any JSON. */
  text: string;
  raw?: unknown;
}
