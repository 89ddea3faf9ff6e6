/**
 * Application error taxonomy.
 *
 * AppError carries a stable machine code and the HTTP status the global
 * error handler replies with.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode = 500, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Missing column, parameter outside its domain, inconsistent budget settings.
 * Always raised before any selection is computed.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('CONFIGURATION_ERROR', message, 400, details);
  }
}

/** Duplicate identifiers, empty record sets, non-finite values, misaligned columns. */
export class DataIntegrityError extends AppError {
  constructor(message: string, details?: unknown) {
    super('DATA_INTEGRITY_ERROR', message, 422, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}
