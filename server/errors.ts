import type { ZodError } from "zod";

export interface FieldIssue {
  field?: string;
  message: string;
}

/**
 * Base class for every failure the services surface to callers.
 * The error handler in app.ts maps `status` and `code` onto the API envelope.
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;
}

export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR";
  readonly status = 422;
  constructor(readonly issues: FieldIssue[]) {
    super(issues.map((i) => (i.field ? `${i.field}: ${i.message}` : i.message)).join("; "));
    this.name = "ValidationError";
  }

  static fromZod(error: ZodError): ValidationError {
    return new ValidationError(
      error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join(".") : undefined,
        message: issue.message,
      })),
    );
  }

  static field(field: string, message: string): ValidationError {
    return new ValidationError([{ field, message }]);
  }
}

export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND";
  readonly status = 404;
  constructor(
    readonly resource: string,
    readonly id: number,
  ) {
    super(`${resource} ${id} not found`);
    this.name = "NotFoundError";
  }
}

export class ConstraintViolationError extends AppError {
  readonly code: string = "CONSTRAINT_VIOLATION";
  readonly status = 409;
  constructor(
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = "ConstraintViolationError";
  }
}

export class DuplicateUsernameError extends ConstraintViolationError {
  override readonly code = "DUPLICATE_USERNAME";
  constructor(readonly username: string) {
    super("Username is already taken");
    this.name = "DuplicateUsernameError";
  }
}

// Same message for unknown users and wrong passwords.
export class InvalidCredentialsError extends AppError {
  readonly code = "INVALID_CREDENTIALS";
  readonly status = 401;
  constructor() {
    super("Invalid username or password");
    this.name = "InvalidCredentialsError";
  }
}

export class UnauthenticatedError extends AppError {
  readonly code = "UNAUTHENTICATED";
  readonly status = 401;
  constructor(message = "Authentication required") {
    super(message);
    this.name = "UnauthenticatedError";
  }
}

export class StorageUnavailableError extends AppError {
  readonly code = "STORAGE_UNAVAILABLE";
  readonly status = 503;
  constructor(
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = "StorageUnavailableError";
  }
}

export class AiUnavailableError extends AppError {
  readonly code = "AI_UNAVAILABLE";
  readonly status = 503;
  constructor(message: string) {
    super(message);
    this.name = "AiUnavailableError";
  }
}
