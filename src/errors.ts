/**
 * Registry error taxonomy.
 *
 * Absence is never an error: lookups on a missing id return null/false.
 */

/**
 * Base error for everything the registry raises on purpose.
 */
export class RegistryError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Additional context about the error */
  readonly context: Record<string, unknown> | undefined;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
    this.context = context;

    Object.setPrototypeOf(this, RegistryError.prototype);
  }
}

/**
 * A field failed model validation. Raised before anything is persisted.
 */
export class ValidationError extends RegistryError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message, "VALIDATION_ERROR", { field });
    this.name = "ValidationError";
    this.field = field;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export type ConflictReason = "duplicate_name" | "duplicate_id";

/**
 * Uniqueness violation: a (name, species) pair or an identifier already exists.
 *
 * Import tooling matches on the "duplicate name" marker in the message.
 */
export class ConflictError extends RegistryError {
  readonly reason: ConflictReason;

  constructor(reason: ConflictReason, message: string, context?: Record<string, unknown>) {
    super(message, "CONFLICT", { ...context, reason });
    this.name = "ConflictError";
    this.reason = reason;
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export const DUPLICATE_NAME_MESSAGE = "duplicate name within species is not allowed";
export const DUPLICATE_ID_MESSAGE = "monkey_id already exists";

/**
 * True when the error is a (name, species) uniqueness conflict.
 */
export function isDuplicateNameConflict(err: unknown): err is ConflictError {
  return err instanceof ConflictError && err.message.toLowerCase().includes("duplicate name");
}

/**
 * A backend call failed and no fallback could absorb it.
 */
export class BackendError extends RegistryError {
  constructor(message: string, cause: unknown, context?: Record<string, unknown>) {
    super(message, "BACKEND_ERROR", context);
    this.name = "BackendError";
    this.cause = cause;
    Object.setPrototypeOf(this, BackendError.prototype);
  }
}

/**
 * Invalid explicit configuration, e.g. an unknown backend name.
 */
export class ConfigurationError extends RegistryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", context);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * An import file could not be read or is not a JSON array.
 */
export class ImportFileError extends RegistryError {
  constructor(message: string, filePath: string) {
    super(message, "IMPORT_FILE_ERROR", { filePath });
    this.name = "ImportFileError";
    Object.setPrototypeOf(this, ImportFileError.prototype);
  }
}

/**
 * An export target exists and overwriting was not requested.
 */
export class OutputExistsError extends RegistryError {
  constructor(filePath: string) {
    super(`${filePath} already exists. use --force to overwrite.`, "OUTPUT_EXISTS", { filePath });
    this.name = "OutputExistsError";
    Object.setPrototypeOf(this, OutputExistsError.prototype);
  }
}
