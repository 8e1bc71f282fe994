/**
 * Global error types for the telemetry dashboard
 * Custom errors for configuration and payload failures
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when dashboard configuration is invalid
 */
export class ConfigValidationError extends ValidationError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.problems = problems;
  }
}

/**
 * Error thrown when a fault description table cannot be used
 */
export class FaultTableValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'FaultTableValidationError';
  }
}

/**
 * Base error for payloads that did not produce a snapshot
 */
export class PayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadError';
  }
}

/**
 * No payload was available this cycle (timeout, no message yet, placeholder)
 */
export class EmptyPayloadError extends PayloadError {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyPayloadError';
  }
}

/**
 * A payload was received but is not well-formed structured data
 */
export class MalformedPayloadError extends PayloadError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedPayloadError';
  }
}

/**
 * Snapshot parsed but its timestamp is missing or unparsable
 */
export class UnresolvedTimestampError extends Error {
  readonly rawTimestamp: unknown;

  constructor(message: string, rawTimestamp: unknown) {
    super(message);
    this.name = 'UnresolvedTimestampError';
    this.rawTimestamp = rawTimestamp;
  }
}

/**
 * Transport-level failure (network, timeout, HTTP status)
 * Never crosses the transport boundary; transports map it to an empty payload
 */
export class TransportError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'TransportError';
    this.status = status;
  }
}
