/**
 * Base interface for all termwise events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the CLI invocation that produced the event */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a provider API request starts */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/**
 * Emitted when a provider API request completes (success or failure).
 */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    error?: string;
    /** Number of retry attempts made (0 = succeeded on first try) */
    retries: number;
  };
}

/**
 * Emitted once the final safety verdict for a generated command is known.
 * `reason` and `source` are copied verbatim from the classification result.
 */
export interface SafetyVerdictReached extends BaseEvent {
  type: 'SafetyVerdictReached';
  payload: {
    command: string;
    level: string;
    reason: string;
    source: string;
    exitCode: number;
  };
}

export type TermwiseEvent = ProviderRequestStarted | ProviderRequestFinished | SafetyVerdictReached;

export type TermwiseEventType = TermwiseEvent['type'];
