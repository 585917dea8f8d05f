// Domain errors. Each carries a stable code so the HTTP layer can map it to a
// status without string matching; see handleApiError in api-runtime.ts.

export type ErrorCategory =
  | "not_found"
  | "validation"
  | "auth"
  | "rate_limit"
  | "conflict";

export interface FieldIssue {
  path: string;
  message: string;
}

export abstract class DomainError extends Error {
  abstract readonly status: number;
  abstract readonly category: ErrorCategory;
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Absent, or present but owned by someone else. The two are never distinguished. */
export class NotFoundError extends DomainError {
  readonly status = 404;
  readonly category = "not_found";

  static habit(): NotFoundError {
    return new NotFoundError("HABIT_NOT_FOUND", "Habit not found.");
  }

  static log(): NotFoundError {
    return new NotFoundError("LOG_NOT_FOUND", "Daily log not found.");
  }
}

export class InvalidDateRangeError extends DomainError {
  readonly status = 400;
  readonly category = "validation";

  constructor(message: string) {
    super("INVALID_DATE_RANGE", message);
  }
}

export class ValidationError extends DomainError {
  readonly status = 400;
  readonly category = "validation";
  readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[] = []) {
    super("VALIDATION_ERROR", message);
    this.issues = issues;
  }
}

export class RateLimitedError extends DomainError {
  readonly status = 429;
  readonly category = "rate_limit";
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super("RATE_LIMITED", "Rate limit exceeded. Please try again later.");
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class UnauthorizedError extends DomainError {
  readonly status = 401;
  readonly category = "auth";

  static invalidCredentials(): UnauthorizedError {
    return new UnauthorizedError("INVALID_CREDENTIALS", "Invalid username/email or password.");
  }

  static invalidToken(message = "Invalid token."): UnauthorizedError {
    return new UnauthorizedError("INVALID_TOKEN", message);
  }

  static missingToken(): UnauthorizedError {
    return new UnauthorizedError("UNAUTHORIZED", "Authentication required.");
  }
}

export class ConflictError extends DomainError {
  readonly status = 409;
  readonly category = "conflict";
}

/**
 * Raised by a log store when the (habit_id, log_date) unique constraint
 * rejects a write. The reconciler turns it into a retry; it never reaches
 * a client.
 */
export class UniqueViolationError extends Error {
  constructor(message = "daily_logs (habit_id, log_date) already exists") {
    super(message);
    this.name = "UniqueViolationError";
  }
}
