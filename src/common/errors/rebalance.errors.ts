export type RebalanceErrorCode =
  | 'CONFIG_MISSING_KEY'
  | 'INVALID_CONFIG'
  | 'MALFORMED_NUMBER'
  | 'FILE_NOT_FOUND';

// Base for every failure the rebalancer reports to a caller.
// The CLI prints the message; the HTTP filter maps `code` to a status.
export abstract class RebalanceError extends Error {
  abstract readonly code: RebalanceErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Required configuration key is absent, e.g. `target_allocation.Bonds` */
export class ConfigMissingKeyError extends RebalanceError {
  readonly code = 'CONFIG_MISSING_KEY';

  constructor(readonly key: string) {
    super(`Missing required configuration key: ${key}`);
  }
}

export class InvalidConfigError extends RebalanceError {
  readonly code = 'INVALID_CONFIG';

  constructor(message: string) {
    super(message);
  }
}

export class MalformedNumberError extends RebalanceError {
  readonly code = 'MALFORMED_NUMBER';

  constructor(
    readonly input: string,
    readonly context: string,
    reason = 'is not a valid number',
  ) {
    super(`${context}: "${input}" ${reason}`);
  }
}

/** Lists every path that was tried, in the order they were tried */
export class FileNotFoundError extends RebalanceError {
  readonly code = 'FILE_NOT_FOUND';

  constructor(
    readonly description: string,
    readonly attemptedPaths: string[],
  ) {
    super(`${description} not found (tried: ${attemptedPaths.join(', ')})`);
  }
}
