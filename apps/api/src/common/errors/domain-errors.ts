// apps/api/src/common/errors/domain-errors.ts
import { HttpException, HttpStatus } from '@nestjs/common';

export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  ILLEGAL_TRANSITION: 'ILLEGAL_TRANSITION',
  NOT_FOUND: 'NOT_FOUND',
  ACCOUNT_BLOCKED: 'ACCOUNT_BLOCKED',
  CONFLICT: 'CONFLICT',
} as const;
export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base for business rule failures. The response body always carries a
 * machine-readable `code` which ApiExceptionFilter copies into the envelope.
 */
export abstract class DomainException extends HttpException {
  protected constructor(
    readonly code: ErrorCode,
    message: string,
    status: HttpStatus,
    details?: Record<string, unknown>,
  ) {
    super({ code, message, ...details }, status);
  }
}

export class DomainValidationException extends DomainException {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      ErrorCodes.VALIDATION_ERROR,
      message,
      HttpStatus.BAD_REQUEST,
      details,
    );
  }
}

export class IllegalTransitionException extends DomainException {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      ErrorCodes.ILLEGAL_TRANSITION,
      message,
      HttpStatus.UNPROCESSABLE_ENTITY,
      details,
    );
  }
}

export class ResourceNotFoundException extends DomainException {
  constructor(resource: string, id?: string) {
    super(
      ErrorCodes.NOT_FOUND,
      id ? `${resource} ${id} not found` : `${resource} not found`,
      HttpStatus.NOT_FOUND,
    );
  }
}

export class AccountBlockedException extends DomainException {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.ACCOUNT_BLOCKED, message, HttpStatus.FORBIDDEN, details);
  }
}

export class ConcurrentUpdateException extends DomainException {
  constructor(resource: string, id: string) {
    super(
      ErrorCodes.CONFLICT,
      `${resource} ${id} was modified concurrently`,
      HttpStatus.CONFLICT,
    );
  }
}
