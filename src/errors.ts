/**
 * Error types raised synchronously at the service boundaries.
 *
 * Delivery problems are never thrown to submitters; they are recorded on
 * the push record (see PushError in schemas/push.ts).
 */

import type { ZodError } from "zod";

export interface ErrorJSON {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export abstract class PushRelayError extends Error {
  abstract readonly code: string;

  toJSON(): ErrorJSON {
    return { code: this.code, message: this.message };
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Malformed submission or catalog entry; never enters the state machine. */
export class ValidationError extends PushRelayError {
  readonly code = "VALIDATION_ERROR";

  constructor(
    message: string,
    readonly issues: ValidationIssue[] = [],
  ) {
    super(message);
    this.name = "ValidationError";
  }

  static fromZod(subject: string, error: ZodError): ValidationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join("; ");
    return new ValidationError(`Invalid ${subject}: ${summary}`, issues);
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { issues: this.issues } };
  }
}

/** Catalog entry already exists under that key. */
export class ConflictError extends PushRelayError {
  readonly code = "CONFLICT";

  constructor(message: string) {
    super(message);
    this.name = "ConflictError";
  }
}

/** Referenced rule or push does not exist. */
export class NotFoundError extends PushRelayError {
  readonly code = "NOT_FOUND";

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/** Service is not accepting work (stopped or shutting down). */
export class UnavailableError extends PushRelayError {
  readonly code = "UNAVAILABLE";

  constructor(message: string) {
    super(message);
    this.name = "UnavailableError";
  }
}
