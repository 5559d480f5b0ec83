import { describe, it, expect } from 'vitest';
import { createS3Client, s3ClientSettingsFor, storageSettingsFromEnv, validateEndpoint } from './client.js';

describe('storage client', () => {
  describe('validateEndpoint', () => {
    it('should accept http and https URLs', () => {
      expect(() => validateEndpoint('http://localhost:9000')).not.toThrow();
      expect(() => validateEndpoint('https://s3.eu-west-1.amazonaws.com')).not.toThrow();
    });

    it('should reject an endpoint without a scheme', () => {
      expect(() => validateEndpoint('localhost:9000')).toThrow(
        'STORAGE_ENDPOINT must start with http:// or https://. Got: localhost:9000'
      );
    });

    it('should reject an empty endpoint', () => {
      expect(() => validateEndpoint('  ')).toThrow('STORAGE_ENDPOINT is required but is empty or missing');
    });
  });

  describe('storageSettingsFromEnv', () => {
    it('should default to s3 without endpoint or buckets', () => {
      expect(storageSettingsFromEnv({})).toEqual({ provider: 's3', endpoint: undefined, buckets: [] });
    });

    it('should read the memory buckets list', () => {
      expect(
        storageSettingsFromEnv({ STORAGE_PROVIDER: 'Memory', STORAGE_BUCKETS: 'one, two,,three ' })
      ).toEqual({ provider: 'memory', endpoint: undefined, buckets: ['one', 'two', 'three'] });
    });

    it('should require an endpoint for minio', () => {
      expect(() => storageSettingsFromEnv({ STORAGE_PROVIDER: 'minio' })).toThrow(
        'STORAGE_ENDPOINT is required for provider "minio"'
      );
    });

    it('should reject unknown providers', () => {
      expect(() => storageSettingsFromEnv({ STORAGE_PROVIDER: 'r2' })).toThrow(
        'Unsupported storage provider: r2. Supported providers: s3, minio, memory'
      );
    });
  });

  describe('s3ClientSettingsFor', () => {
    it('should use path-style addressing for minio', () => {
      const credentials = { accessKeyId: 'test-key', secretAccessKey: 'test-secret' };

      expect(
        s3ClientSettingsFor({ provider: 'minio', endpoint: 'http://localhost:9000', buckets: [] }, 'us-east-1', credentials)
      ).toEqual({
        region: 'us-east-1',
        credentials,
        endpoint: 'http://localhost:9000',
        forcePathStyle: true,
      });
    });
  });

  describe('createS3Client', () => {
    it('should configure the region', async () => {
      const client = createS3Client({
        region: 'eu-west-1',
        credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
      });

      await expect(client.config.region()).resolves.toBe('eu-west-1');
    });

    it('should refuse an invalid endpoint', () => {
      expect(() => createS3Client({ region: 'eu-west-1', endpoint: 'ftp://files' })).toThrow(
        'STORAGE_ENDPOINT must start with http:// or https://'
      );
    });
  });
});
