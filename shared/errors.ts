export type ErrorCode = "VALIDATION_FAILED" | "NOT_FOUND" | "STORAGE_FAILURE";

/**
 * Base class for every error the task store raises on purpose.
 */
export class TodoError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TodoError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** A required field is missing or empty. */
export class ValidationError extends TodoError {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message, "VALIDATION_FAILED");
    this.name = "ValidationError";
  }
}

export class NotFoundError extends TodoError {
  constructor(public readonly taskId: number) {
    super(`Task ${taskId} not found`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/**
 * The database rejected or failed a statement. The driver error is kept as `cause`.
 */
export class StorageError extends TodoError {
  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(
      `Storage failure during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`,
      "STORAGE_FAILURE",
      { cause }
    );
    this.name = "StorageError";
  }
}
