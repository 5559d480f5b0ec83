/**
 * Invocation payloads
 *
 * Two shapes reach a resource type:
 * - the CloudFormation service request (entrypoint), with the model under
 *   requestData.resourceProperties
 * - the test payload sent by `cfn test` through SAM (testEntrypoint), which
 *   already carries a handler request
 */

import { z } from 'zod';
import { ACTIONS } from './types.js';

const CredentialsSchema = z.object({
  accessKeyId: z.string(),
  secretAccessKey: z.string(),
  sessionToken: z.string().nullish(),
});

const StringMapSchema = z.record(z.string());

const CallbackContextSchema = z.record(z.unknown());

const RequestDataSchema = z.object({
  callerCredentials: CredentialsSchema.nullish(),
  providerCredentials: CredentialsSchema.nullish(),
  providerLogGroupName: z.string().nullish(),
  logicalResourceId: z.string().nullish(),
  resourceProperties: z.unknown(),
  previousResourceProperties: z.unknown(),
  stackTags: StringMapSchema.nullish(),
  previousStackTags: StringMapSchema.nullish(),
  systemTags: StringMapSchema.nullish(),
  previousSystemTags: StringMapSchema.nullish(),
  typeConfiguration: z.record(z.unknown()).nullish(),
});

export const HandlerRequestSchema = z.object({
  action: z.enum(ACTIONS),
  awsAccountId: z.string().nullish(),
  bearerToken: z.string().nullish(),
  region: z.string().nullish(),
  resourceType: z.string().nullish(),
  resourceTypeVersion: z.string().nullish(),
  stackId: z.string().nullish(),
  nextToken: z.string().nullish(),
  callbackContext: CallbackContextSchema.nullish(),
  requestData: RequestDataSchema,
});

export const TestEventSchema = z.object({
  credentials: CredentialsSchema.nullish(),
  action: z.enum(ACTIONS),
  request: z.object({
    clientRequestToken: z.string().nullish(),
    desiredResourceState: z.unknown(),
    previousResourceState: z.unknown(),
    desiredResourceTags: StringMapSchema.nullish(),
    previousResourceTags: StringMapSchema.nullish(),
    systemTags: StringMapSchema.nullish(),
    previousSystemTags: StringMapSchema.nullish(),
    awsAccountId: z.string().nullish(),
    logicalResourceIdentifier: z.string().nullish(),
    typeConfiguration: z.record(z.unknown()).nullish(),
    nextToken: z.string().nullish(),
    region: z.string().nullish(),
    awsPartition: z.string().nullish(),
    stackId: z.string().nullish(),
  }),
  callbackContext: CallbackContextSchema.nullish(),
  region: z.string().nullish(),
});

export type HandlerRequestPayload = z.infer<typeof HandlerRequestSchema>;
export type TestEventPayload = z.infer<typeof TestEventSchema>;

/**
 * AWS partition for a region name
 */
export function partitionForRegion(region: string | undefined): string {
  if (!region) return 'aws';
  if (region.startsWith('cn-')) return 'aws-cn';
  if (region.startsWith('us-gov-')) return 'aws-us-gov';
  if (region.startsWith('us-isob-')) return 'aws-iso-b';
  if (region.startsWith('us-iso-')) return 'aws-iso';
  return 'aws';
}

/**
 * "<path>: <message>" for each issue, separated by "; "
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
