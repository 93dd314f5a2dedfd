/**
 * Error taxonomy for dispatch
 *
 * The core never recovers from these; they propagate to whatever shell wraps
 * the dispatcher, which decides how to present them.
 */

export const DispatchErrorCodes = {
  MISSING_FIELD: "missing_field",
  VALIDATION_FAILED: "validation_failed",
  UNSUPPORTED_DISCRIMINANT: "unsupported_discriminant",
  PROCESSING_FAILED: "processing_failed",
  CONFIGURATION_ERROR: "configuration_error",
} as const;

export type DispatchErrorCode =
  (typeof DispatchErrorCodes)[keyof typeof DispatchErrorCodes];

/**
 * Base class for every error raised by the dispatch core
 */
export abstract class DispatchError extends Error {
  abstract readonly code: DispatchErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A required request field is absent or blank
 */
export class MissingFieldError extends DispatchError {
  readonly code = DispatchErrorCodes.MISSING_FIELD;

  constructor(readonly field: string) {
    super(`${field} is required`);
  }
}

/**
 * One or more business rules rejected the request
 */
export class ValidationError extends DispatchError {
  readonly code = DispatchErrorCodes.VALIDATION_FAILED;
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(errors.join(", "));
    this.errors = Object.freeze([...errors]);
  }
}

/**
 * No handler is registered for the requested discriminant
 */
export class UnsupportedDiscriminantError extends DispatchError {
  readonly code = DispatchErrorCodes.UNSUPPORTED_DISCRIMINANT;

  constructor(
    readonly key: string | null | undefined,
    label: string
  ) {
    super(`${label} ${String(key)} is not currently supported`);
  }
}

/**
 * The (simulated) downstream provider failed while executing
 */
export class ProcessingError extends DispatchError {
  readonly code = DispatchErrorCodes.PROCESSING_FAILED;

  constructor(
    readonly key: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The registry was built from an incomplete or conflicting handler list
 */
export class RegistryConfigurationError extends DispatchError {
  readonly code = DispatchErrorCodes.CONFIGURATION_ERROR;
}

/**
 * Type guard for dispatch errors
 */
export function isDispatchError(error: unknown): error is DispatchError {
  return error instanceof DispatchError;
}
