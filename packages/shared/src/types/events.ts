import type { GenerationMethod } from './plan';

/**
 * Base interface for all planner events.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the request that produced the event */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when plan generation is requested */
export interface PlanRequested extends BaseEvent {
  type: 'PlanRequested';
  payload: {
    goal: string;
    method: GenerationMethod;
  };
}

/** Emitted after the startup liveness check of the LLM server */
export interface ProviderProbed extends BaseEvent {
  type: 'ProviderProbed';
  payload: {
    provider: string;
    available: boolean;
    durationMs: number;
  };
}

export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    error?: string;
  };
}

/** Emitted when the remote generator failed and the rule-based one took over */
export interface FallbackUsed extends BaseEvent {
  type: 'FallbackUsed';
  payload: {
    goal: string;
    reason: string;
  };
}

export interface PlanGenerated extends BaseEvent {
  type: 'PlanGenerated';
  payload: {
    method: GenerationMethod;
    taskCount: number;
    estimatedDuration: string;
  };
}

export interface PlanSaved extends BaseEvent {
  type: 'PlanSaved';
  payload: {
    planId: number;
    method: GenerationMethod;
  };
}

export type PlannerEvent =
  | PlanRequested
  | ProviderProbed
  | ProviderRequestStarted
  | ProviderRequestFinished
  | FallbackUsed
  | PlanGenerated
  | PlanSaved;

