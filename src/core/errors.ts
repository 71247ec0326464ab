/**
 * Error types for the indexing engine and its collaborators.
 *
 * Every error has a stable `name` and `code` and accepts a `cause`.
 */

export abstract class MailIndexError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when a message is rejected before it is stored
 */
export class InvalidInputError extends MailIndexError {
  readonly code = "INVALID_INPUT";

  constructor(
    public readonly field: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid ${field}: ${reason}`, options);
  }
}

/**
 * Thrown when a record identifier is unknown
 */
export class RecordNotFoundError extends MailIndexError {
  readonly code = "NOT_FOUND";

  constructor(
    public readonly id: number,
    options?: ErrorOptions,
  ) {
    super(`Message not found: ${id}`, options);
  }
}

/**
 * Thrown when an index update fails after its record was stored.
 * The engine that raised it refuses all further calls.
 */
export class InternalInvariantError extends MailIndexError {
  readonly code = "INTERNAL_INVARIANT";
}

/**
 * Thrown when a message file cannot be read
 */
export class MessageFileError extends MailIndexError {
  readonly code = "MESSAGE_FILE";

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to read message file: ${filePath}`, options);
  }
}

/**
 * Thrown when an environment setting has an invalid value
 */
export class ConfigError extends MailIndexError {
  readonly code = "CONFIG";

  constructor(
    public readonly variable: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`${variable} ${reason}`, options);
  }
}
