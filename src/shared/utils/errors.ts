/**
 * Custom error classes
 */

export class SwitchboardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SwitchboardError';
  }
}

export class ConfigurationError extends SwitchboardError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ProviderError extends SwitchboardError {
  constructor(
    message: string,
    public readonly provider?: string
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export class NetworkError extends SwitchboardError {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'NetworkError';
  }
}

export class RateLimitError extends SwitchboardError {
  constructor(
    message: string,
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

/**
 * The request was aborted by the caller (client disconnect or explicit cancel)
 */
export class RequestCancelledError extends SwitchboardError {
  constructor(message = 'Request was cancelled') {
    super(message);
    this.name = 'RequestCancelledError';
  }
}

export type StateDecodeReason = 'not_an_object' | 'unknown_marker' | 'invalid_payload';

/**
 * A stored conversation state object did not match any known agent shape
 */
export class StateDecodeError extends SwitchboardError {
  constructor(
    message: string,
    public readonly reason: StateDecodeReason
  ) {
    super(message);
    this.name = 'StateDecodeError';
  }
}

export type DecisionParseReason = 'empty_response' | 'invalid_json' | 'schema_violation';

/**
 * The routing model replied with something that is not a coordination decision
 */
export class DecisionParseError extends SwitchboardError {
  constructor(
    message: string,
    public readonly reason: DecisionParseReason
  ) {
    super(message);
    this.name = 'DecisionParseError';
  }
}

export class DelegationError extends SwitchboardError {
  constructor(
    message: string,
    public readonly agentId: string
  ) {
    super(message);
    this.name = 'DelegationError';
  }
}

export function isCancellation(error: unknown): boolean {
  return error instanceof RequestCancelledError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
