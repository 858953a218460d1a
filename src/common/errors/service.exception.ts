import { HttpStatus } from '@nestjs/common';

export type ServiceErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION_FAILED'
  | 'DUPLICATE_ENTITY'
  | 'STORAGE_FAILURE'
  | 'PAYMENT_FAILED'
  | 'PERSISTENCE_FAILURE';

/**
 * Base class for failures raised by the service layer. Each subclass maps to
 * one HTTP status through ServiceExceptionFilter.
 */
export abstract class ServiceException extends Error {
  abstract readonly code: ServiceErrorCode;
  abstract readonly status: HttpStatus;

  constructor(message: string, readonly details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class EntityNotFoundException extends ServiceException {
  readonly code = 'NOT_FOUND';
  readonly status = HttpStatus.NOT_FOUND;

  constructor(readonly entity: string, readonly key: string) {
    super(`${entity} ${key} not found`);
  }
}

export class ValidationException extends ServiceException {
  readonly code = 'VALIDATION_FAILED';
  readonly status = HttpStatus.BAD_REQUEST;
}

export class DuplicateEntityException extends ServiceException {
  readonly code = 'DUPLICATE_ENTITY';
  readonly status = HttpStatus.CONFLICT;

  constructor(readonly entity: string, readonly key: string) {
    super(`${entity} ${key} already exists`);
  }
}

export class StorageException extends ServiceException {
  readonly code = 'STORAGE_FAILURE';
  readonly status = HttpStatus.BAD_GATEWAY;

  constructor(message: string, cause?: unknown) {
    super(message, undefined, { cause });
  }
}

export class PaymentException extends ServiceException {
  readonly code = 'PAYMENT_FAILED';
  readonly status = HttpStatus.PAYMENT_REQUIRED;

  constructor(message: string, cause?: unknown) {
    super(message, undefined, { cause });
  }
}

export class PersistenceException extends ServiceException {
  readonly code = 'PERSISTENCE_FAILURE';
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR;

  constructor(message: string, cause?: unknown) {
    super(message, undefined, { cause });
  }
}
