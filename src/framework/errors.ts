/**
 * Error types raised by the simulation core.
 */

/**
 * Thrown when parameters or scenario files fail validation.
 * `field` names the first offending parameter.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly issues: readonly string[] = [message]
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when an aggregate is requested over no data
 * (e.g. the average completed fertility of an empty cohort window).
 */
export class NoDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NoDataError';
  }
}
