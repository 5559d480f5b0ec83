import type { HandlerErrorCode } from './types.js';

/**
 * Error carrying the handler error code reported to CloudFormation
 */
export class HandlerError extends Error {
  readonly errorCode: HandlerErrorCode;

  constructor(errorCode: HandlerErrorCode, message: string) {
    super(message);
    this.name = 'HandlerError';
    this.errorCode = errorCode;
  }
}

export function isHandlerError(error: unknown): error is HandlerError {
  return error instanceof HandlerError;
}
