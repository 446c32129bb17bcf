/**
 * Error raised when the input document does not match the expected shape.
 */
export class InputSchemaError extends Error {
  readonly code = 'INVALID_INPUT_SCHEMA';

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'InputSchemaError';
  }
}

/**
 * Error raised for malformed command line flags
 */
export class CliUsageError extends Error {
  readonly code = 'CLI_USAGE';

  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}
