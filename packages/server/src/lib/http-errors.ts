/**
 * Map dispatch errors onto HTTP responses
 *
 *   400 { status: "FAILED", errors: [...] }   request problems
 *   500 { status: "FAILED", error: "..." }    processing and unexpected errors
 */

import {
  MissingFieldError,
  ProcessingError,
  UnsupportedDiscriminantError,
  ValidationError,
} from "@switchyard/core";

/**
 * The request body is not JSON or does not have the expected shape
 */
export class RequestBodyError extends Error {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(errors.join(", "));
    this.name = "RequestBodyError";
    this.errors = errors;
  }
}

export type ErrorBody =
  | { status: "FAILED"; errors: string[] }
  | { status: "FAILED"; error: string; message?: string };

export interface ErrorResponse {
  status: 400 | 500;
  body: ErrorBody;
}

export interface ErrorResponseOptions {
  /** Domain name used in processing errors ("Payment", "Notification") */
  domain: string;
  /** Hide the message of unexpected errors */
  isProduction: boolean;
}

export const UNEXPECTED_ERROR = "An unexpected error occurred";

export function toErrorResponse(error: unknown, options: ErrorResponseOptions): ErrorResponse {
  if (error instanceof ValidationError || error instanceof RequestBodyError) {
    return { status: 400, body: { status: "FAILED", errors: [...error.errors] } };
  }

  if (error instanceof MissingFieldError || error instanceof UnsupportedDiscriminantError) {
    return { status: 400, body: { status: "FAILED", errors: [error.message] } };
  }

  if (error instanceof ProcessingError) {
    return {
      status: 500,
      body: { status: "FAILED", error: `${options.domain} processing failed: ${error.message}` },
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    status: 500,
    body: {
      status: "FAILED",
      error: UNEXPECTED_ERROR,
      ...(!options.isProduction && { message }),
    },
  };
}
