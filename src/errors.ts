/**
 * Custom error classes for storage sessions and storage clients
 */

export class StorageSessionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "StorageSessionError";
  }
}

export class StorageProviderError extends StorageSessionError {
  constructor(
    message: string,
    code: string,
    public readonly provider: string,
    public readonly serviceCode?: string,
  ) {
    super(message, code);
    this.name = "StorageProviderError";
  }
}

export class AuthenticationError extends StorageProviderError {
  constructor(message: string, provider: string, serviceCode?: string) {
    super(message, "AUTH_ERROR", provider, serviceCode);
    this.name = "AuthenticationError";
  }
}

export class ConnectionError extends StorageProviderError {
  constructor(message: string, provider: string, serviceCode?: string) {
    super(message, "CONNECTION_ERROR", provider, serviceCode);
    this.name = "ConnectionError";
  }
}

export class ResourceNotFoundError extends StorageProviderError {
  constructor(message: string, provider: string, serviceCode?: string) {
    super(message, "NOT_FOUND", provider, serviceCode);
    this.name = "ResourceNotFoundError";
  }
}

export class BucketAlreadyExistsError extends StorageProviderError {
  constructor(message: string, provider: string, serviceCode?: string) {
    super(message, "ALREADY_EXISTS", provider, serviceCode);
    this.name = "BucketAlreadyExistsError";
  }
}

export class ValidationError extends StorageSessionError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class StateError extends StorageSessionError {
  constructor(message: string) {
    super(message, "STATE_ERROR");
    this.name = "StateError";
  }
}

/** The listing does not show an object this run uploaded */
export class ConsistencyError extends StorageSessionError {
  constructor(
    message: string,
    public readonly missingKeys: string[],
  ) {
    super(message, "CONSISTENCY_ERROR");
    this.name = "ConsistencyError";
  }
}

/** Downloaded bytes differ from the bytes uploaded under the same key */
export class IntegrityError extends StorageSessionError {
  constructor(
    message: string,
    public readonly key: string,
  ) {
    super(message, "INTEGRITY_ERROR");
    this.name = "IntegrityError";
  }
}

export class DownloadConflictError extends StorageSessionError {
  constructor(
    message: string,
    public readonly keys: readonly string[],
  ) {
    super(message, "DOWNLOAD_CONFLICT");
    this.name = "DownloadConflictError";
  }
}

export class CancelledError extends StorageSessionError {
  constructor(message: string) {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

// Error codes for easy reference
export const ErrorCodes = {
  AUTH_ERROR: "AUTH_ERROR",
  CONNECTION_ERROR: "CONNECTION_ERROR",
  NOT_FOUND: "NOT_FOUND",
  ALREADY_EXISTS: "ALREADY_EXISTS",
  PROVIDER_ERROR: "PROVIDER_ERROR",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  STATE_ERROR: "STATE_ERROR",
  CONSISTENCY_ERROR: "CONSISTENCY_ERROR",
  INTEGRITY_ERROR: "INTEGRITY_ERROR",
  DOWNLOAD_CONFLICT: "DOWNLOAD_CONFLICT",
  CANCELLED: "CANCELLED",
  UNKNOWN_ERROR: "UNKNOWN_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Brings anything thrown into the session error hierarchy
 */
export function toSessionError(error: unknown): StorageSessionError {
  if (error instanceof StorageSessionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StorageSessionError(message, ErrorCodes.UNKNOWN_ERROR);
}
