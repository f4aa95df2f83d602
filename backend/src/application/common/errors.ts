/**
 * Typed application errors.
 * Every failure a caller can observe is one of these; the HTTP error handler
 * maps them onto the response envelope using `statusCode` and `code`.
 */

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_AMOUNT'
  | 'TOKEN_EXPIRED'
  | 'TOKEN_INVALID'
  | 'API_KEY_INVALID'
  | 'API_KEY_EXPIRED'
  | 'FORBIDDEN'
  | 'UNAUTHORIZED'
  | 'QUOTA_EXCEEDED'
  | 'RATE_LIMITED'
  | 'NOT_FOUND'
  | 'NOT_EXPIRED'
  | 'CONFLICT'
  | 'INSUFFICIENT_FUNDS'
  | 'SIGNATURE_INVALID'
  | 'PROVIDER_ERROR'
  | 'STORAGE_ERROR';

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly statusCode: number;
  readonly details: Record<string, unknown>;

  constructor(code: AppErrorCode, statusCode: number, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  toJSON(): { code: AppErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code: 'VALIDATION_ERROR' | 'INVALID_AMOUNT' = 'VALIDATION_ERROR', details: Record<string, unknown> = {}) {
    super(code, 400, message, details);
    this.name = 'ValidationError';
  }
}

export type AuthFailureReason = 'expired' | 'invalid' | 'invalid_key' | 'forbidden' | 'missing';

/** Which credential the failure was raised against */
export type CredentialKind = 'token' | 'api_key';

function authErrorCode(reason: AuthFailureReason, credential: CredentialKind): AppErrorCode {
  switch (reason) {
    case 'expired':
      return credential === 'api_key' ? 'API_KEY_EXPIRED' : 'TOKEN_EXPIRED';
    case 'invalid':
      return 'TOKEN_INVALID';
    case 'invalid_key':
      return 'API_KEY_INVALID';
    case 'forbidden':
      return 'FORBIDDEN';
    case 'missing':
      return 'UNAUTHORIZED';
  }
}

export class AuthError extends AppError {
  readonly reason: AuthFailureReason;

  constructor(
    reason: AuthFailureReason,
    message: string,
    credential: CredentialKind = 'token',
    details: Record<string, unknown> = {}
  ) {
    super(authErrorCode(reason, credential), reason === 'forbidden' ? 403 : 401, message, details);
    this.name = 'AuthError';
    this.reason = reason;
  }
}

export class QuotaExceededError extends AppError {
  constructor(limit: number) {
    super('QUOTA_EXCEEDED', 429, `Maximum of ${limit} active API keys allowed per user`, { limit });
    this.name = 'QuotaExceededError';
  }
}

export class RateLimitedError extends AppError {
  constructor(retryAfter: string) {
    super('RATE_LIMITED', 429, `Too many requests, retry in ${retryAfter}`, { retryAfter });
    this.name = 'RateLimitedError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, details: Record<string, unknown> = {}) {
    super('NOT_FOUND', 404, `${resource} not found`, details);
    this.name = 'NotFoundError';
  }
}

export class NotExpiredError extends AppError {
  constructor(keyId: string, expiresAt: Date) {
    super('NOT_EXPIRED', 409, 'API key is not expired yet. Cannot rollover.', {
      keyId,
      expiresAt: expiresAt.toISOString(),
    });
    this.name = 'NotExpiredError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('CONFLICT', 409, message, details);
    this.name = 'ConflictError';
  }
}

export class InsufficientFundsError extends AppError {
  constructor(balance: number, requested: number) {
    super('INSUFFICIENT_FUNDS', 400, 'Insufficient wallet balance', { balance, requested });
    this.name = 'InsufficientFundsError';
  }
}

export class SignatureInvalidError extends AppError {
  constructor(message = 'Invalid webhook signature') {
    super('SIGNATURE_INVALID', 401, message);
    this.name = 'SignatureInvalidError';
  }
}

export class ProviderError extends AppError {
  readonly provider: string;
  readonly upstreamStatus: number | undefined;

  constructor(provider: string, message: string, upstreamStatus?: number) {
    super('PROVIDER_ERROR', 402, message, { provider, upstreamStatus });
    this.name = 'ProviderError';
    this.provider = provider;
    this.upstreamStatus = upstreamStatus;
  }
}

export class StorageError extends AppError {
  constructor(operation: string, cause: unknown) {
    super('STORAGE_ERROR', 500, `Storage operation failed: ${operation}`, {
      operation,
      cause: cause instanceof Error ? cause.message : String(cause),
    });
    this.name = 'StorageError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
