/**
 * Error classes for the household inventory service layer
 *
 * Every error raised on purpose by a service extends AppError and carries
 * a stable code plus the HTTP status the response layer maps it to.
 */

export type EntityType = 'User' | 'Household' | 'HouseholdMember' | 'Location' | 'Product';

/**
 * Base class for classified failures
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
    };
  }
}

/**
 * Bad caller input. `field` names the offending request field when known.
 */
export class ValidationError extends AppError {
  override readonly code = 'VALIDATION_ERROR';
  override readonly statusCode = 400;

  constructor(message: string, public readonly field?: string) {
    super(message);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      ...(this.field !== undefined ? { field: this.field } : {}),
    };
  }
}

export class AuthenticationRequiredError extends AppError {
  override readonly code = 'UNAUTHORIZED';
  override readonly statusCode = 401;

  constructor(message = 'Authentication required', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Authenticated, but not a member of the household.
 */
export class ForbiddenError extends AppError {
  override readonly code = 'FORBIDDEN';
  override readonly statusCode = 403;

  constructor(message = 'Access denied') {
    super(message);
  }
}

/**
 * Authenticated member whose role is not high enough for the operation.
 */
export class InsufficientPermissionError extends AppError {
  override readonly code = 'INSUFFICIENT_PERMISSION';
  override readonly statusCode = 403;
}

export class NotFoundError extends AppError {
  override readonly code = 'NOT_FOUND';
  override readonly statusCode = 404;

  constructor(
    public readonly entityType: EntityType,
    public readonly entityId?: string
  ) {
    super(
      entityId === undefined
        ? `${entityType} not found`
        : `${entityType} with ID "${entityId}" not found`
    );
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      entityType: this.entityType,
      ...(this.entityId !== undefined ? { entityId: this.entityId } : {}),
    };
  }
}

/**
 * Uniqueness violation (location name, product UPC, user email)
 */
export class ConflictError extends AppError {
  override readonly code = 'CONFLICT';
  override readonly statusCode = 409;
}

export class BusinessRuleViolationError extends AppError {
  override readonly code = 'BUSINESS_RULE_VIOLATION';
  override readonly statusCode = 422;
}

/**
 * Persistence failure during save or delete
 */
export class DataIntegrityError extends AppError {
  override readonly code = 'DATA_INTEGRITY_ERROR';
  override readonly statusCode = 500;
}

export class ConfigurationError extends AppError {
  override readonly code = 'CONFIGURATION_ERROR';
  override readonly statusCode = 500;

  constructor(
    public readonly setting: string,
    reason: string
  ) {
    super(`Invalid configuration for ${setting}: ${reason}`);
  }
}

/**
 * Malformed payload from a third-party API
 */
export class ParsingError extends AppError {
  override readonly code = 'PARSING_ERROR';
  override readonly statusCode = 502;
}

/**
 * Third-party API unreachable or answering with an error
 */
export class ExternalServiceError extends AppError {
  override readonly code: string = 'EXTERNAL_SERVICE_ERROR';
  override readonly statusCode: number = 502;

  constructor(
    public readonly serviceName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${serviceName}: ${message}`, options);
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      service: this.serviceName,
    };
  }
}

export class ServiceUnavailableError extends ExternalServiceError {
  override readonly code = 'SERVICE_UNAVAILABLE';
  override readonly statusCode = 503;
}

export class RateLimitExceededError extends ExternalServiceError {
  override readonly code = 'RATE_LIMIT_EXCEEDED';
  override readonly statusCode = 429;
}

/**
 * Wrap anything unclassified so the original cause travels with it
 */
export class UnexpectedError extends AppError {
  override readonly code = 'INTERNAL_SERVER_ERROR';
  override readonly statusCode = 500;

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

/**
 * Normalise a caught value to an Error instance for logging
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
