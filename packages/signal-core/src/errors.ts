// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------
// Every failure is raised at the call boundary. Nothing here is retried:
// the caller has to supply corrected input or configuration.

export type MonitorErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'INVALID_CONFIGURATION'
  | 'INVALID_INPUT';

/** Base class for all errors raised by the monitoring pipeline. */
export class MonitorError extends Error {
  constructor(
    public readonly code: MonitorErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'MonitorError';
  }
}

/** The outlier screen was given a baseline with fewer than 2 points. */
export class InsufficientDataError extends MonitorError {
  constructor(
    public readonly required: number,
    public readonly actual: number,
  ) {
    super(
      'INSUFFICIENT_DATA',
      `Need at least ${required} baseline points, got ${actual}.`,
    );
    this.name = 'InsufficientDataError';
  }
}

/** An option is outside its domain (unknown quantize mode, alpha ∉ (0,1), ...). */
export class InvalidConfigurationError extends MonitorError {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super('INVALID_CONFIGURATION', `Invalid configuration for ${field}: ${message}`);
    this.name = 'InvalidConfigurationError';
  }
}

/** A sample is missing, non-numeric or non-finite. */
export class InvalidInputError extends MonitorError {
  constructor(
    message: string,
    public readonly index?: number,
  ) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Throws InvalidInputError unless `value` is a finite number.
 * `label` names the value in the error message.
 */
export function assertFiniteSample(value: unknown, label: string, index?: number): asserts value is number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    const where = index === undefined ? '' : ` at index ${index}`;
    throw new InvalidInputError(
      `${label}${where} must be a finite number, got ${String(value)}`,
      index,
    );
  }
}
