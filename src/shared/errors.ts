/**
 * Error taxonomy for cloud-sweep.
 *
 * Errors that abort a run (TransportError, ConfigurationError) are thrown.
 * Errors local to one record (EnrichmentError, RetryError) are carried as
 * values and reported next to the record they belong to.
 */

/**
 * Raised when a remote list call fails outright (network, auth, throttling).
 * Terminates the discovery sequence.
 */
export class TransportError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
    this.operation = operation;
  }
}

/**
 * A per-record secondary lookup (tags, describe, last run) failed.
 */
export class EnrichmentError extends Error {
  readonly step: string;
  readonly resource: string;

  constructor(step: string, resource: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EnrichmentError';
    this.step = step;
    this.resource = resource;
  }
}

/**
 * A single start-execution call failed.
 */
export class RetryError extends Error {
  readonly executionArn: string;

  constructor(executionArn: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RetryError';
    this.executionArn = executionArn;
  }

  /**
   * Name of the remote error behind this failure (e.g. "AccessDeniedException").
   */
  get remoteName(): string {
    return this.cause instanceof Error ? this.cause.name : 'Error';
  }
}

/**
 * Malformed filter input or CLI configuration. Raised before any remote call.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when the SSM parameter holding the configuration is not found.
 */
export class ParameterNotFoundError extends ConfigurationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ParameterNotFoundError';
  }
}

/**
 * Raised when the configuration is missing required fields or is invalid.
 */
export class ConfigValidationError extends ConfigurationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Renders any thrown value as a message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
