import { S3ServiceException } from '@aws-sdk/client-s3';

/**
 * Service-level failure from an object storage call.
 * `code` is the S3 error code (NoSuchKey, AccessDenied, SlowDown, ...).
 */
export class StorageError extends Error {
  readonly code: string;
  readonly statusCode?: number;

  constructor(code: string, message: string, statusCode?: number) {
    super(message);
    this.name = 'StorageError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * S3 service exceptions become StorageError; anything else is returned unchanged
 */
export function toStorageError(error: unknown): unknown {
  if (error instanceof S3ServiceException) {
    const message = error.message && error.message !== 'UnknownError' ? error.message : error.name;
    return new StorageError(error.name, message, error.$metadata?.httpStatusCode);
  }
  return error;
}
