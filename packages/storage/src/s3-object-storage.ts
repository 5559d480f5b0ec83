/**
 * ObjectStorage over the S3 API
 */

import {
  DeleteObjectCommand,
  GetObjectCommand,
  GetObjectTaggingCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type S3Client,
} from '@aws-sdk/client-s3';
import pino from 'pino';
import { isStorageError, toStorageError } from './errors.js';
import type { ListObjectsPage, ObjectLocation, ObjectStorage, ObjectTag, PutObjectInput } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

// HeadObject has no body, so a missing key surfaces as a bare 404 "NotFound"
const MISSING_OBJECT_CODES = new Set(['NotFound', 'NoSuchKey']);

/**
 * URL-encoded query string for the PutObject Tagging header
 */
export function encodeTagging(tags: ObjectTag[]): string {
  return tags.map((tag) => `${encodeURIComponent(tag.Key)}=${encodeURIComponent(tag.Value)}`).join('&');
}

/**
 * Run one S3 call, translating service exceptions and logging failures
 */
async function call<T>(operation: string, location: Partial<ObjectLocation>, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    const translated = toStorageError(error);
    logger.debug(
      {
        event: 'storage.call.failed',
        operation,
        bucket: location.bucket,
        key: location.key,
        code: isStorageError(translated) ? translated.code : undefined,
        error: translated instanceof Error ? translated.message : String(translated),
      },
      `S3 ${operation} failed`
    );
    throw translated;
  }
}

export function createS3ObjectStorage(client: S3Client): ObjectStorage {
  return {
    async putObject(input: PutObjectInput): Promise<void> {
      const tagging = input.tags && input.tags.length > 0 ? encodeTagging(input.tags) : undefined;

      await call('PutObject', input, () =>
        client.send(
          new PutObjectCommand({
            Bucket: input.bucket,
            Key: input.key,
            Body: input.body,
            Tagging: tagging,
          })
        )
      );

      logger.debug(
        {
          event: 'storage.object.put',
          bucket: input.bucket,
          key: input.key,
          contentLength: Buffer.byteLength(input.body, 'utf8'),
          tagCount: input.tags?.length ?? 0,
        },
        'Object stored'
      );
    },

    async objectExists(location: ObjectLocation): Promise<boolean> {
      try {
        await call('HeadObject', location, () =>
          client.send(new HeadObjectCommand({ Bucket: location.bucket, Key: location.key }))
        );
        return true;
      } catch (error) {
        if (isStorageError(error) && MISSING_OBJECT_CODES.has(error.code)) {
          return false;
        }
        throw error;
      }
    },

    async getObjectContents(location: ObjectLocation): Promise<string> {
      const response = await call('GetObject', location, () =>
        client.send(new GetObjectCommand({ Bucket: location.bucket, Key: location.key }))
      );
      if (!response.Body) {
        return '';
      }
      return response.Body.transformToString('utf-8');
    },

    async getObjectTags(location: ObjectLocation): Promise<ObjectTag[]> {
      const response = await call('GetObjectTagging', location, () =>
        client.send(new GetObjectTaggingCommand({ Bucket: location.bucket, Key: location.key }))
      );
      const tags: ObjectTag[] = [];
      for (const tag of response.TagSet ?? []) {
        if (tag.Key === undefined) continue;
        tags.push({ Key: tag.Key, Value: tag.Value ?? '' });
      }
      return tags;
    },

    async listObjects(bucket: string, continuationToken?: string): Promise<ListObjectsPage> {
      const response = await call('ListObjectsV2', { bucket }, () =>
        client.send(new ListObjectsV2Command({ Bucket: bucket, ContinuationToken: continuationToken }))
      );
      const keys: string[] = [];
      for (const object of response.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
      return {
        keys,
        nextToken: response.IsTruncated ? response.NextContinuationToken : undefined,
      };
    },

    async deleteObject(location: ObjectLocation): Promise<void> {
      await call('DeleteObject', location, () =>
        client.send(new DeleteObjectCommand({ Bucket: location.bucket, Key: location.key }))
      );
    },
  };
}
