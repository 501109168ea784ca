/**
 * Base class for errors that map onto a single HTTP status.
 * Services throw these; the error middleware renders them.
 */
export class ApiError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string, details?: unknown) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

/** 400 - malformed ids, missing or invalid fields */
export class InvalidInputError extends ApiError {
  constructor(message: string = "Validation failed", details?: unknown) {
    super(message, 400, "INVALID_INPUT", details);
    this.name = "InvalidInputError";
  }
}

/** 401 - rejected credentials */
export class UnauthorizedError extends ApiError {
  constructor(message: string = "Invalid username or password") {
    super(message, 401, "UNAUTHORIZED");
    this.name = "UnauthorizedError";
  }
}

/** 404 - a referenced entity does not exist */
export class NotFoundError extends ApiError {
  public readonly resource: string;

  constructor(resource: string = "Resource") {
    super(`${resource} not found`, 404, "NOT_FOUND");
    this.name = "NotFoundError";
    this.resource = resource;
  }
}

/** 409 - uniqueness violation */
export class ConflictError extends ApiError {
  constructor(message: string = "Resource already exists") {
    super(message, 409, "CONFLICT");
    this.name = "ConflictError";
  }
}

const UNIQUE_VIOLATION = "23505";

function hasCode(value: unknown): value is { code: unknown } {
  return typeof value === "object" && value !== null && "code" in value;
}

/**
 * True for a Postgres unique-constraint violation, whether the driver error
 * is thrown directly or wrapped by the query builder as `cause`.
 */
export function isUniqueViolation(err: unknown): boolean {
  if (hasCode(err) && err.code === UNIQUE_VIOLATION) return true;
  if (err instanceof Error && err.cause !== undefined) {
    return isUniqueViolation(err.cause);
  }
  return false;
}
