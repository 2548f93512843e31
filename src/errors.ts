export type StepViewErrorCode = 'MISSING_FIELD' | 'INVALID_CONFIG';

/**
 * Base class for every failure the renderer reports. None are retried:
 * the CLI prints the message and exits.
 */
export class StepViewError extends Error {
  constructor(
    message: string,
    public readonly code: StepViewErrorCode,
    public readonly filePath?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'StepViewError';
  }

  static isStepViewError(error: unknown): error is StepViewError {
    return error instanceof StepViewError;
  }
}

/**
 * A required record field is absent. Only `source` has no default.
 */
export class MissingFieldError extends StepViewError {
  constructor(
    public readonly field: string,
    filePath?: string
  ) {
    super(
      `Step configuration is missing required field "${field}"${filePath ? ` (${filePath})` : ''}`,
      'MISSING_FIELD',
      filePath
    );
    this.name = 'MissingFieldError';
  }
}

/**
 * The configuration source could not be read, parsed, or does not match
 * the step record schema.
 */
export class ConfigParseError extends StepViewError {
  constructor(message: string, filePath?: string, options?: ErrorOptions) {
    super(filePath ? `${filePath}: ${message}` : message, 'INVALID_CONFIG', filePath, options);
    this.name = 'ConfigParseError';
  }
}
