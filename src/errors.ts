import type { LinkDirection } from './types.js';

export class ThroughputTestError extends Error {
  code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ThroughputTestError';
    this.code = code;
  }
}

export class ScenarioValidationError extends ThroughputTestError {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scenario parameters: ${issues.join('; ')}`, 'INVALID_SCENARIO');
    this.name = 'ScenarioValidationError';
    this.issues = issues;
  }
}

/** The test bed rejected the radio configuration. Raised before anything attaches. */
export class ConfigurationError extends ThroughputTestError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIGURATION_REJECTED', options);
    this.name = 'ConfigurationError';
  }
}

export type AttachFailureReason = 'timeout' | 'rejected';

export class AttachError extends ThroughputTestError {
  target: string;
  reason: AttachFailureReason;

  constructor(target: string, reason: AttachFailureReason, message: string, options?: ErrorOptions) {
    super(message, reason === 'timeout' ? 'ATTACH_TIMEOUT' : 'ATTACH_REJECTED', options);
    this.name = 'AttachError';
    this.target = target;
    this.reason = reason;
  }
}

/**
 * Raised by a traffic tool when a session could not carry traffic. The
 * measurement phase turns it into a failed verdict, not an error.
 */
export class TransportError extends ThroughputTestError {
  direction?: LinkDirection;
  endpointId?: string;

  constructor(message: string, details: { direction?: LinkDirection; endpointId?: string } = {}, options?: ErrorOptions) {
    super(message, 'TRANSPORT_FAILURE', options);
    this.name = 'TransportError';
    this.direction = details.direction;
    this.endpointId = details.endpointId;
  }
}

export class MeasurementTimeoutError extends ThroughputTestError {
  budgetMs: number;
  directions: LinkDirection[];

  constructor(budgetMs: number, directions: LinkDirection[]) {
    super(
      `Traffic sessions (${directions.join(', ')}) did not finish within ${budgetMs}ms`,
      'MEASUREMENT_TIMEOUT',
    );
    this.name = 'MeasurementTimeoutError';
    this.budgetMs = budgetMs;
    this.directions = directions;
  }
}

export class TeardownError extends ThroughputTestError {
  target: string;

  constructor(target: string, message: string, options?: ErrorOptions) {
    super(message, 'TEARDOWN_FAILURE', options);
    this.name = 'TeardownError';
    this.target = target;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

export function errorCode(error: unknown): string {
  if (error instanceof ThroughputTestError) {
    return error.code;
  }
  return 'UNEXPECTED_ERROR';
}
