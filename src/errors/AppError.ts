export class AppError extends Error {
  public readonly status: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(code: string, message: string, status = 500, details?: unknown) {
    super(message);
    this.code = code;
    this.status = status;
    this.details = details;
    this.name = "AppError";

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type FieldIssue = {
  field: string;
  message: string;
};

export class ValidationError extends AppError {
  public readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[] = []) {
    super("validation_error", message, 400, issues.length > 0 ? { issues } : undefined);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super("not_found", `${resource} ${id} not found.`, 404, { resource, id });
    this.name = "NotFoundError";
  }
}

export class InvalidTransitionError extends AppError {
  constructor(message: string, details?: unknown) {
    super("invalid_transition", message, 409, details);
    this.name = "InvalidTransitionError";
  }
}
