/**
 * Resource model types and validation
 */

import { z } from 'zod';

export const TYPE_NAME = 'AwsCommunity::S3::Object';

export const OBJECT_KEY_PATTERN = /^[a-zA-Z0-9!_.*'()-]+(\/[a-zA-Z0-9!_.*'()-]+)*$/;

// S3 object tagging limits
export const MAX_OBJECT_TAGS = 10;
export const MAX_TAG_KEY_LENGTH = 128;
export const MAX_TAG_VALUE_LENGTH = 256;

export const TagSchema = z.object({
  Key: z.string().min(1).max(MAX_TAG_KEY_LENGTH),
  Value: z.string().max(MAX_TAG_VALUE_LENGTH),
});

const ResourceModelObjectSchema = z.object({
  ObjectArn: z.string().optional(),
  ObjectKey: z
    .string()
    .regex(OBJECT_KEY_PATTERN, `ObjectKey must match ${OBJECT_KEY_PATTERN.source}`)
    .optional(),
  // Intrinsics are resolved before the handler runs; a map here is reported, not used
  BucketName: z.union([z.string(), z.record(z.unknown())]).optional(),
  ObjectContents: z.string().optional(),
  Tags: z.array(TagSchema).optional(),
});

/**
 * CloudFormation sends null for unset properties in some payloads
 */
function dropNullProperties(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== null));
}

export const ResourceModelSchema = z.preprocess(dropNullProperties, ResourceModelObjectSchema);

export type Tag = z.infer<typeof TagSchema>;
export type ResourceModel = z.infer<typeof ResourceModelObjectSchema>;

export interface ObjectLocation {
  bucket: string;
  key: string;
}

/**
 * Raised when a model lacks what an operation needs.
 * Handlers report it as InvalidRequest.
 */
export class ModelValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelValidationError';
  }
}

/**
 * BucketName as a plain string, or undefined when unset
 */
export function resolveBucketName(model: ResourceModel | undefined): string | undefined {
  const bucketName = model?.BucketName;
  if (bucketName === undefined) {
    return undefined;
  }
  if (typeof bucketName !== 'string') {
    throw new ModelValidationError('BucketName must resolve to a string');
  }
  return bucketName.length > 0 ? bucketName : undefined;
}

export function requireBucketName(model: ResourceModel | undefined): string {
  const bucketName = resolveBucketName(model);
  if (!bucketName) {
    throw new ModelValidationError('BucketName is required');
  }
  return bucketName;
}

export function requireObjectContents(model: ResourceModel | undefined): string {
  const contents = model?.ObjectContents;
  if (contents === undefined) {
    throw new ModelValidationError('ObjectContents is required');
  }
  return contents;
}

export function requireObjectKey(model: ResourceModel | undefined): string {
  const key = model?.ObjectKey;
  if (!key) {
    throw new ModelValidationError('ObjectKey is required');
  }
  return key;
}
