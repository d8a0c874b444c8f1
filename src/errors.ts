export type SecurityErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'BAD_CREDENTIAL'
  | 'FROZEN'
  | 'PERMISSION_DENIED'
  | 'EXPIRED'
  | 'BAD_CODE'
  | 'SEQUENCE_ERROR'
  | 'STORAGE_CORRUPT'
  | 'STORAGE_WRITE_ERROR'
  | 'INVALID_INPUT';

export class SecurityError extends Error {
  code: SecurityErrorCode;
  details?: Record<string, unknown>;

  constructor(
    code: SecurityErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class NotFoundError extends SecurityError {
  constructor(message = 'User not found') {
    super('NOT_FOUND', message);
  }
}

export class AlreadyExistsError extends SecurityError {
  constructor(message = 'Username already exists') {
    super('ALREADY_EXISTS', message);
  }
}

export class BadCredentialError extends SecurityError {
  constructor() {
    super('BAD_CREDENTIAL', 'Invalid username or password');
  }
}

export class FrozenError extends SecurityError {
  readonly remainingSeconds: number;

  constructor(remainingSeconds: number) {
    super('FROZEN', `Account is frozen. Try again in ${remainingSeconds} seconds`, { remainingSeconds });
    this.remainingSeconds = remainingSeconds;
  }
}

export class PermissionDeniedError extends SecurityError {
  constructor(message = 'Permission denied') {
    super('PERMISSION_DENIED', message);
  }
}

export class ExpiredError extends SecurityError {
  constructor(message = 'Verification code has expired') {
    super('EXPIRED', message);
  }
}

export class BadCodeError extends SecurityError {
  constructor(message = 'Invalid security code') {
    super('BAD_CODE', message);
  }
}

export class SequenceError extends SecurityError {
  constructor(message: string) {
    super('SEQUENCE_ERROR', message);
  }
}

export class StorageCorruptError extends SecurityError {
  constructor(path: string, reason: string, cause?: unknown) {
    super('STORAGE_CORRUPT', `Cannot read ${path}: ${reason}`, { path }, { cause });
  }
}

// Errors rejected by Node APIs may belong to another realm; read their shape.
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export class StorageWriteError extends SecurityError {
  constructor(path: string, cause?: unknown) {
    const reason = errorMessage(cause);
    super('STORAGE_WRITE_ERROR', `Cannot write ${path}: ${reason}`, { path }, { cause });
  }
}

export class InvalidInputError extends SecurityError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

export function isSecurityError(value: unknown): value is SecurityError {
  return value instanceof SecurityError;
}
