/**
 * Mapping from storage failures to CloudFormation handler error codes
 */

import pino from 'pino';
import { ModelValidationError } from '@s3object/core';
import { failedEvent, isHandlerError, type Action, type HandlerErrorCode, type ProgressEvent } from '@s3object/provider';
import { isStorageError } from '@s3object/storage';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const NOT_FOUND_CODES = new Set(['NoSuchKey', 'NotFound', 'NoSuchBucket']);

const INVALID_REQUEST_CODES = new Set([
  'InvalidParameter',
  'InvalidParameterCombination',
  'InvalidParameterValue',
  'InvalidTagKey.Malformed',
  'MissingAction',
  'MissingParameter',
  'UnknownParameter',
  'ValidationError',
  'InvalidTag',
  'InvalidArgument',
  'InvalidBucketName',
  'KeyTooLongError',
]);

const THROTTLING_CODES = new Set(['RequestLimitExceeded', 'SlowDown', 'Throttling', 'ThrottlingException']);

const INVALID_CREDENTIALS_CODES = new Set([
  'InvalidAccessKeyId',
  'ExpiredToken',
  'SignatureDoesNotMatch',
  'InvalidToken',
]);

const SERVICE_INTERNAL_CODES = new Set(['InternalError', 'ServiceUnavailable']);

/**
 * Handler error code for an S3 API error code
 */
export function getHandlerErrorCode(apiErrorCode: string): HandlerErrorCode {
  if (NOT_FOUND_CODES.has(apiErrorCode)) return 'NotFound';
  if (INVALID_REQUEST_CODES.has(apiErrorCode)) return 'InvalidRequest';
  if (THROTTLING_CODES.has(apiErrorCode)) return 'Throttling';
  if (apiErrorCode === 'AccessDenied') return 'AccessDenied';
  if (INVALID_CREDENTIALS_CODES.has(apiErrorCode)) return 'InvalidCredentials';
  if (SERVICE_INTERNAL_CODES.has(apiErrorCode)) return 'ServiceInternalError';
  return 'GeneralServiceException';
}

function classify(error: unknown): { errorCode: HandlerErrorCode; message: string } {
  if (isHandlerError(error)) {
    return { errorCode: error.errorCode, message: error.message };
  }
  if (error instanceof ModelValidationError) {
    return { errorCode: 'InvalidRequest', message: error.message };
  }
  if (isStorageError(error)) {
    return { errorCode: getHandlerErrorCode(error.code), message: error.message };
  }
  return { errorCode: 'InternalFailure', message: error instanceof Error ? error.message : String(error) };
}

/**
 * FAILED progress event for an error raised while handling `action`
 */
export function failedFromError<TModel>(error: unknown, action: Action): ProgressEvent<TModel> {
  const { errorCode, message } = classify(error);
  const entry = {
    event: 'handler.operation.failed',
    action,
    errorCode,
    error: message,
    serviceCode: isStorageError(error) ? error.code : undefined,
  };

  if (errorCode === 'InternalFailure') {
    logger.fatal({ ...entry, stack: error instanceof Error ? error.stack : undefined }, `${action} failed unexpectedly`);
  } else if (errorCode === 'NotFound') {
    logger.debug(entry, `${action}: resource not found`);
  } else {
    logger.warn(entry, `${action} failed with ${errorCode}`);
  }

  return failedEvent(errorCode, `Error: ${message}`);
}
