/**
 * Domain errors carry the HTTP status and error code the error middleware
 * answers with, so services never touch the response object.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, statusCode: number, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, 404, 'NOT_FOUND', { entity, id });
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: string = 'CONFLICT', details?: unknown) {
    super(message, 409, code, details);
  }
}

export class InvalidTransitionError extends ConflictError {
  readonly from: string;
  readonly to: string;

  constructor(entity: string, from: string, to: string) {
    super(`Cannot move ${entity} from '${from}' to '${to}'`, 'INVALID_STATUS_TRANSITION', { from, to });
    this.from = from;
    this.to = to;
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
