/**
 * ObjectArn helpers
 *
 * Format: arn:<partition>:s3:::<bucket>/<key>
 * The key may itself contain "/", the bucket never does.
 */

import { ModelValidationError, resolveBucketName, type ObjectLocation, type ResourceModel } from './model.js';

const OBJECT_ARN_PATTERN = /^arn:(aws[a-z-]*):s3:::([^/]+)\/(.+)$/;

export interface ParsedObjectArn extends ObjectLocation {
  partition: string;
}

export function buildObjectArn(location: ObjectLocation, partition: string = 'aws'): string {
  return `arn:${partition}:s3:::${location.bucket}/${location.key}`;
}

export function parseObjectArn(arn: string): ParsedObjectArn | null {
  const match = OBJECT_ARN_PATTERN.exec(arn);
  if (!match) {
    return null;
  }
  const [, partition, bucket, key] = match;
  return { partition, bucket, key };
}

/**
 * Bucket and key of the object a model describes.
 * Uses BucketName/ObjectKey when both are set, otherwise the primary identifier.
 */
export function resolveObjectLocation(model: ResourceModel | undefined): ObjectLocation {
  const bucket = resolveBucketName(model);
  const key = model?.ObjectKey;
  if (bucket && key) {
    return { bucket, key };
  }

  if (model?.ObjectArn) {
    const parsed = parseObjectArn(model.ObjectArn);
    if (!parsed) {
      throw new ModelValidationError(`ObjectArn is not an S3 object ARN: ${model.ObjectArn}`);
    }
    return { bucket: parsed.bucket, key: parsed.key };
  }

  throw new ModelValidationError('BucketName and ObjectKey (or ObjectArn) are required');
}
