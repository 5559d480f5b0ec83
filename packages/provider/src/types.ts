/**
 * Types for the CloudFormation resource handler protocol
 */

export const ACTIONS = ['CREATE', 'READ', 'UPDATE', 'DELETE', 'LIST'] as const;
export type Action = (typeof ACTIONS)[number];

export type OperationStatus = 'PENDING' | 'IN_PROGRESS' | 'SUCCESS' | 'FAILED';

export const HANDLER_ERROR_CODES = [
  'NotUpdatable',
  'InvalidRequest',
  'AccessDenied',
  'InvalidCredentials',
  'AlreadyExists',
  'NotFound',
  'ResourceConflict',
  'Throttling',
  'ServiceLimitExceeded',
  'NotStabilized',
  'GeneralServiceException',
  'ServiceInternalError',
  'NetworkFailure',
  'InternalFailure',
  'InvalidTypeConfiguration',
  'HandlerInternalFailure',
  'NonCompliant',
  'Unknown',
  'UnsupportedTarget',
] as const;
export type HandlerErrorCode = (typeof HANDLER_ERROR_CODES)[number];

export interface Credentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

/**
 * Opaque state a handler hands to its own next invocation
 */
export type CallbackContext = Record<string, unknown>;

export interface ProgressEvent<TModel> {
  status: OperationStatus;
  errorCode?: HandlerErrorCode;
  message?: string;
  callbackContext?: CallbackContext;
  callbackDelaySeconds?: number;
  resourceModel?: TModel;
  resourceModels?: TModel[];
  nextToken?: string;
}

/**
 * What a handler sees, whichever payload shape it arrived in
 */
export interface ResourceHandlerRequest<TModel> {
  clientRequestToken?: string;
  desiredResourceState?: TModel;
  previousResourceState?: TModel;
  desiredResourceTags?: Record<string, string>;
  previousResourceTags?: Record<string, string>;
  systemTags?: Record<string, string>;
  previousSystemTags?: Record<string, string>;
  awsAccountId?: string;
  logicalResourceIdentifier?: string;
  typeConfiguration?: Record<string, unknown>;
  nextToken?: string;
  region?: string;
  awsPartition: string;
  stackId?: string;
}

export type ResourceHandler<TModel, TSession> = (
  session: TSession,
  request: ResourceHandlerRequest<TModel>,
  callbackContext: CallbackContext
) => Promise<ProgressEvent<TModel>>;

/**
 * Builds the service session (e.g. an S3 client) for one invocation
 */
export type SessionFactory<TSession> = (credentials: Credentials | undefined, region: string | undefined) => TSession;
