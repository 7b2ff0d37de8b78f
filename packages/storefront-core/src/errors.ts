/**
 * Domain errors. Each carries a stable code and the HTTP status the API
 * answers with, so route handlers never have to map errors themselves.
 */

export type StorefrontErrorCode =
  | 'VALIDATION_FAILED'
  | 'UNKNOWN_PRODUCT'
  | 'PRODUCT_CHANGED'
  | 'NO_OPEN_ORDER'
  | 'NOT_FOUND'
  | 'UNAUTHENTICATED'
  | 'UNAUTHORIZED_OWNER'
  | 'INVALID_TRANSITION'
  | 'PRODUCT_LOCKED'
  | 'STORAGE_FAILURE'
  | 'TRANSIENT_DELIVERY'
  | 'PERMANENT_DELIVERY'
  | 'CONFIG_INVALID';

export class StorefrontError extends Error {
  constructor(
    message: string,
    public readonly code: StorefrontErrorCode,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = 'StorefrontError';
  }
}

export class ValidationError extends StorefrontError {
  constructor(message: string, code: StorefrontErrorCode = 'VALIDATION_FAILED') {
    super(message, code, 400);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends StorefrontError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class AuthenticationError extends StorefrontError {
  constructor(message: string) {
    super(message, 'UNAUTHENTICATED', 401);
    this.name = 'AuthenticationError';
  }
}

export class UnauthorizedOwnerError extends StorefrontError {
  constructor(ownerId: string) {
    super(`'${ownerId}' is not a store owner`, 'UNAUTHORIZED_OWNER', 403);
    this.name = 'UnauthorizedOwnerError';
  }
}

export class InvalidTransitionError extends StorefrontError {
  constructor(message: string) {
    super(message, 'INVALID_TRANSITION', 409);
    this.name = 'InvalidTransitionError';
  }
}

export class ProductLockedError extends StorefrontError {
  constructor(productId: string) {
    super(
      `Product ${productId} is referenced by orders; its artifact cannot change`,
      'PRODUCT_LOCKED',
      409
    );
    this.name = 'ProductLockedError';
  }
}

/**
 * Ledger or blob write failure. The operation that raised it made no
 * observable change.
 */
export class StorageError extends StorefrontError {
  constructor(operation: string, cause?: unknown) {
    super(
      `Storage operation failed: ${operation}${cause instanceof Error ? ` (${cause.message})` : ''}`,
      'STORAGE_FAILURE',
      500
    );
    this.name = 'StorageError';
    this.cause = cause;
  }
}

export class TransientDeliveryError extends StorefrontError {
  constructor(message: string) {
    super(message, 'TRANSIENT_DELIVERY', 502);
    this.name = 'TransientDeliveryError';
  }
}

export class PermanentDeliveryError extends StorefrontError {
  constructor(message: string) {
    super(message, 'PERMANENT_DELIVERY', 502);
    this.name = 'PermanentDeliveryError';
  }
}

export class ConfigError extends StorefrontError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID', 500);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
