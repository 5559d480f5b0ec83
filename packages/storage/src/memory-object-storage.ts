/**
 * In-process ObjectStorage for local runs and tests.
 * Reports missing buckets and keys with the same codes S3 uses.
 */

import { StorageError } from './errors.js';
import type { ListObjectsPage, ObjectLocation, ObjectStorage, ObjectTag, PutObjectInput } from './types.js';

interface StoredObject {
  body: string;
  tags: ObjectTag[];
}

export interface MemoryObjectStorageOptions {
  buckets?: string[];
  /** Keys per listObjects page; S3 returns up to 1000 */
  pageSize?: number;
}

export interface MemoryObjectStorage extends ObjectStorage {
  createBucket(bucket: string): void;
}

export function createMemoryObjectStorage(options: MemoryObjectStorageOptions = {}): MemoryObjectStorage {
  const pageSize = options.pageSize ?? 1000;
  const buckets = new Map<string, Map<string, StoredObject>>();

  for (const bucket of options.buckets ?? []) {
    buckets.set(bucket, new Map());
  }

  const getBucket = (bucket: string): Map<string, StoredObject> => {
    const objects = buckets.get(bucket);
    if (!objects) {
      throw new StorageError('NoSuchBucket', 'The specified bucket does not exist', 404);
    }
    return objects;
  };

  const getObject = (location: ObjectLocation): StoredObject => {
    const object = getBucket(location.bucket).get(location.key);
    if (!object) {
      throw new StorageError('NoSuchKey', 'The specified key does not exist.', 404);
    }
    return object;
  };

  return {
    createBucket(bucket: string): void {
      if (!buckets.has(bucket)) {
        buckets.set(bucket, new Map());
      }
    },

    async putObject(input: PutObjectInput): Promise<void> {
      getBucket(input.bucket).set(input.key, {
        body: input.body,
        tags: (input.tags ?? []).map((tag) => ({ ...tag })),
      });
    },

    async objectExists(location: ObjectLocation): Promise<boolean> {
      return getBucket(location.bucket).has(location.key);
    },

    async getObjectContents(location: ObjectLocation): Promise<string> {
      return getObject(location).body;
    },

    async getObjectTags(location: ObjectLocation): Promise<ObjectTag[]> {
      return getObject(location).tags.map((tag) => ({ ...tag }));
    },

    async listObjects(bucket: string, continuationToken?: string): Promise<ListObjectsPage> {
      const allKeys = Array.from(getBucket(bucket).keys()).sort();
      // The token is the last key of the previous page
      const start = continuationToken === undefined ? 0 : allKeys.findIndex((key) => key > continuationToken);
      const remaining = start === -1 ? [] : allKeys.slice(start);
      const keys = remaining.slice(0, pageSize);

      return {
        keys,
        nextToken: remaining.length > pageSize ? keys[keys.length - 1] : undefined,
      };
    },

    async deleteObject(location: ObjectLocation): Promise<void> {
      // S3 DeleteObject succeeds for a missing key
      getBucket(location.bucket).delete(location.key);
    },
  };
}
