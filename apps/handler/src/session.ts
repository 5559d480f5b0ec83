/**
 * Per-invocation object storage session
 */

import type { SessionFactory } from '@s3object/provider';
import {
  createMemoryObjectStorage,
  createS3Client,
  createS3ObjectStorage,
  s3ClientSettingsFor,
  type ObjectStorage,
  type StorageSettings,
} from '@s3object/storage';

/**
 * S3 and minio get a client built from the caller's credentials and region.
 * The memory provider hands every invocation the same store, so a stabilisation
 * pass sees what the first invocation wrote.
 */
export function createSessionFactory(settings: StorageSettings): SessionFactory<ObjectStorage> {
  if (settings.provider === 'memory') {
    const storage = createMemoryObjectStorage({ buckets: settings.buckets });
    return () => storage;
  }

  return (credentials, region) =>
    createS3ObjectStorage(createS3Client(s3ClientSettingsFor(settings, region, credentials)));
}
