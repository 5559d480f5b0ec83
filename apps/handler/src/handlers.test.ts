import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { ResourceModel } from '@s3object/core';
import type { ResourceHandlerRequest } from '@s3object/provider';
import { StorageError, createMemoryObjectStorage, type MemoryObjectStorage } from '@s3object/storage';
import {
  CALLBACK_DELAY_SECONDS,
  createHandler,
  deleteHandler,
  isCallback,
  listHandler,
  readHandler,
  updateHandler,
} from './handlers.js';

const BUCKET = 'my-bucket';
const KEY = 'docs/readme.txt';
const ARN = 'arn:aws:s3:::my-bucket/docs/readme.txt';
const LOCATION = { bucket: BUCKET, key: KEY };

function request(overrides: Partial<ResourceHandlerRequest<ResourceModel>> = {}): ResourceHandlerRequest<ResourceModel> {
  return { awsPartition: 'aws', region: 'us-east-1', ...overrides };
}

function desired(model: ResourceModel = {}): ResourceModel {
  return { BucketName: BUCKET, ObjectKey: KEY, ObjectContents: 'hello', ...model };
}

describe('resource handlers', () => {
  let storage: MemoryObjectStorage;

  beforeEach(() => {
    storage = createMemoryObjectStorage({ buckets: [BUCKET], pageSize: 2 });
  });

  describe('isCallback', () => {
    it('should only recognise the in-progress marker', () => {
      expect(isCallback({ status: 'IN_PROGRESS' })).toBe(true);
      expect(isCallback({})).toBe(false);
      expect(isCallback({ status: 'SUCCESS' })).toBe(false);
    });
  });

  describe('create', () => {
    it('should write the object and ask for a callback', async () => {
      const result = await createHandler(
        storage,
        request({
          desiredResourceState: desired({ Tags: [{ Key: 'env', Value: 'dev' }] }),
          desiredResourceTags: { team: 'storage', env: 'prod' },
        }),
        {}
      );

      expect(result).toEqual({
        status: 'IN_PROGRESS',
        resourceModel: {
          BucketName: BUCKET,
          ObjectKey: KEY,
          ObjectContents: 'hello',
          Tags: [{ Key: 'env', Value: 'dev' }],
          ObjectArn: ARN,
        },
        callbackContext: { status: 'IN_PROGRESS' },
        callbackDelaySeconds: CALLBACK_DELAY_SECONDS,
      });
      await expect(storage.getObjectContents(LOCATION)).resolves.toBe('hello');
      await expect(storage.getObjectTags(LOCATION)).resolves.toEqual([
        { Key: 'team', Value: 'storage' },
        { Key: 'env', Value: 'dev' },
      ]);
    });

    it('should derive the ARN from the partition', async () => {
      const result = await createHandler(storage, request({ awsPartition: 'aws-cn', desiredResourceState: desired() }), {});

      expect(result.resourceModel?.ObjectArn).toBe('arn:aws-cn:s3:::my-bucket/docs/readme.txt');
    });

    it('should succeed on the stabilisation pass with the stored state', async () => {
      await storage.putObject({ ...LOCATION, body: 'hello', tags: [{ Key: 'env', Value: 'dev' }] });

      const result = await createHandler(storage, request({ desiredResourceState: desired() }), {
        status: 'IN_PROGRESS',
      });

      expect(result).toEqual({
        status: 'SUCCESS',
        resourceModel: {
          ObjectArn: ARN,
          ObjectKey: KEY,
          BucketName: BUCKET,
          ObjectContents: 'hello',
          Tags: [{ Key: 'env', Value: 'dev' }],
        },
      });
    });

    it('should fail with AlreadyExists when the object is already there', async () => {
      await storage.putObject({ ...LOCATION, body: 'old' });

      const result = await createHandler(storage, request({ desiredResourceState: desired() }), {});

      expect(result).toEqual({
        status: 'FAILED',
        errorCode: 'AlreadyExists',
        message: 'Error: Object docs/readme.txt already exists in bucket my-bucket',
      });
      await expect(storage.getObjectContents(LOCATION)).resolves.toBe('old');
    });

    it('should require ObjectContents', async () => {
      const result = await createHandler(
        storage,
        request({ desiredResourceState: { BucketName: BUCKET, ObjectKey: KEY } }),
        {}
      );

      expect(result).toEqual({ status: 'FAILED', errorCode: 'InvalidRequest', message: 'Error: ObjectContents is required' });
    });

    it('should report a missing bucket as NotFound', async () => {
      const result = await createHandler(
        storage,
        request({ desiredResourceState: desired({ BucketName: 'other-bucket' }) }),
        {}
      );

      expect(result).toEqual({
        status: 'FAILED',
        errorCode: 'NotFound',
        message: 'Error: The specified bucket does not exist',
      });
    });

    it('should refuse a tag key given twice and write nothing', async () => {
      const result = await createHandler(
        storage,
        request({
          desiredResourceState: desired({
            Tags: [
              { Key: 'env', Value: 'dev' },
              { Key: 'env', Value: 'prod' },
            ],
          }),
        }),
        {}
      );

      expect(result).toEqual({
        status: 'FAILED',
        errorCode: 'InvalidRequest',
        message: 'Error: Tag key env appears more than once in Tags',
      });
      await expect(storage.objectExists(LOCATION)).resolves.toBe(false);
    });

    it('should refuse more than 10 tags after merging stack tags', async () => {
      const stackTags = Object.fromEntries(Array.from({ length: 10 }, (_, i) => [`stack-${i}`, 'x']));

      const result = await createHandler(
        storage,
        request({
          desiredResourceState: desired({ Tags: [{ Key: 'extra', Value: 'y' }] }),
          desiredResourceTags: stackTags,
        }),
        {}
      );

      expect(result).toEqual({
        status: 'FAILED',
        errorCode: 'InvalidRequest',
        message: 'Error: An S3 object accepts at most 10 tags, got 11 after merging stack tags',
      });
      await expect(storage.objectExists(LOCATION)).resolves.toBe(false);
    });
  });

  describe('read', () => {
    it('should return contents, ARN and tags', async () => {
      await storage.putObject({ ...LOCATION, body: 'hello', tags: [{ Key: 'env', Value: 'dev' }] });

      const result = await readHandler(storage, request({ desiredResourceState: { BucketName: BUCKET, ObjectKey: KEY } }), {});

      expect(result).toEqual({
        status: 'SUCCESS',
        resourceModel: {
          ObjectArn: ARN,
          ObjectKey: KEY,
          BucketName: BUCKET,
          ObjectContents: 'hello',
          Tags: [{ Key: 'env', Value: 'dev' }],
        },
      });
    });

    it('should resolve the object from ObjectArn alone', async () => {
      await storage.putObject({ ...LOCATION, body: 'hello' });

      const result = await readHandler(storage, request({ desiredResourceState: { ObjectArn: ARN } }), {});

      expect(result.status).toBe('SUCCESS');
      expect(result.resourceModel?.ObjectKey).toBe(KEY);
      expect(result.resourceModel?.BucketName).toBe(BUCKET);
      expect(result.resourceModel?.Tags).toBeUndefined();
    });

    it('should fail with NotFound for a missing object', async () => {
      const result = await readHandler(storage, request({ desiredResourceState: { BucketName: BUCKET, ObjectKey: KEY } }), {});

      expect(result).toEqual({
        status: 'FAILED',
        errorCode: 'NotFound',
        message: 'Error: The specified key does not exist.',
      });
    });

    it('should reject a model without bucket, key or ARN', async () => {
      const result = await readHandler(storage, request({ desiredResourceState: {} }), {});

      expect(result).toEqual({
        status: 'FAILED',
        errorCode: 'InvalidRequest',
        message: 'Error: BucketName and ObjectKey (or ObjectArn) are required',
      });
    });
  });

  describe('update', () => {
    beforeEach(async () => {
      await storage.putObject({ ...LOCATION, body: 'v1', tags: [{ Key: 'env', Value: 'dev' }] });
    });

    it('should replace contents and tags', async () => {
      const result = await updateHandler(
        storage,
        request({
          desiredResourceState: desired({ ObjectContents: 'v2', Tags: [{ Key: 'env', Value: 'prod' }] }),
          previousResourceState: desired({ ObjectContents: 'v1', Tags: [{ Key: 'env', Value: 'dev' }] }),
        }),
        {}
      );

      expect(result.status).toBe('IN_PROGRESS');
      expect(result.callbackContext).toEqual({ status: 'IN_PROGRESS' });
      expect(result.resourceModel?.ObjectArn).toBe(ARN);
      await expect(storage.getObjectContents(LOCATION)).resolves.toBe('v2');
      await expect(storage.getObjectTags(LOCATION)).resolves.toEqual([{ Key: 'env', Value: 'prod' }]);
    });

    it('should refuse a new ObjectKey', async () => {
      const result = await updateHandler(
        storage,
        request({
          desiredResourceState: desired({ ObjectKey: 'docs/other.txt' }),
          previousResourceState: desired(),
        }),
        {}
      );

      expect(result).toEqual({
        status: 'FAILED',
        errorCode: 'NotUpdatable',
        message: 'Error: ObjectKey cannot be updated from docs/readme.txt to docs/other.txt',
      });
    });

    it('should refuse a new BucketName', async () => {
      const result = await updateHandler(
        storage,
        request({
          desiredResourceState: desired({ BucketName: 'other-bucket' }),
          previousResourceState: desired(),
        }),
        {}
      );

      expect(result.errorCode).toBe('NotUpdatable');
      expect(result.message).toBe('Error: BucketName cannot be updated from my-bucket to other-bucket');
    });

    it('should fail with NotFound when the object is gone', async () => {
      await storage.deleteObject(LOCATION);

      const result = await updateHandler(storage, request({ desiredResourceState: desired() }), {});

      expect(result).toEqual({
        status: 'FAILED',
        errorCode: 'NotFound',
        message: 'Error: Object docs/readme.txt does not exist in bucket my-bucket',
      });
    });

    it('should succeed on the stabilisation pass', async () => {
      const result = await updateHandler(storage, request({ desiredResourceState: desired() }), {
        status: 'IN_PROGRESS',
      });

      expect(result.status).toBe('SUCCESS');
      expect(result.resourceModel?.ObjectContents).toBe('v1');
    });

    it('should propagate other read failures during stabilisation', async () => {
      const denied: MemoryObjectStorage = {
        ...storage,
        getObjectContents: vi.fn(async () => {
          throw new StorageError('AccessDenied', 'Access Denied', 403);
        }),
      };

      const result = await updateHandler(denied, request({ desiredResourceState: desired() }), {
        status: 'IN_PROGRESS',
      });

      expect(result).toEqual({ status: 'FAILED', errorCode: 'AccessDenied', message: 'Error: Access Denied' });
    });
  });

  describe('delete', () => {
    it('should delete the object and return no model', async () => {
      await storage.putObject({ ...LOCATION, body: 'hello' });

      const result = await deleteHandler(storage, request({ desiredResourceState: { ObjectArn: ARN } }), {});

      expect(result).toStrictEqual({ status: 'SUCCESS' });
      await expect(storage.objectExists(LOCATION)).resolves.toBe(false);
    });

    it('should fail with NotFound for a missing object', async () => {
      const result = await deleteHandler(storage, request({ desiredResourceState: desired() }), {});

      expect(result).toEqual({
        status: 'FAILED',
        errorCode: 'NotFound',
        message: 'Error: Object docs/readme.txt does not exist in bucket my-bucket',
      });
    });

    it('should treat a missing object as done on the stabilisation pass', async () => {
      const result = await deleteHandler(storage, request({ desiredResourceState: desired() }), {
        status: 'IN_PROGRESS',
      });

      expect(result).toStrictEqual({ status: 'SUCCESS' });
    });

    it('should keep waiting while the object is still readable', async () => {
      await storage.putObject({ ...LOCATION, body: 'hello' });

      const result = await deleteHandler(storage, request({ desiredResourceState: desired() }), {
        status: 'IN_PROGRESS',
      });

      expect(result).toEqual({
        status: 'IN_PROGRESS',
        callbackContext: { status: 'IN_PROGRESS' },
        callbackDelaySeconds: CALLBACK_DELAY_SECONDS,
      });
    });
  });

  describe('list', () => {
    it('should page through the bucket with nextToken', async () => {
      for (const key of ['c.txt', 'a.txt', 'b.txt']) {
        await storage.putObject({ bucket: BUCKET, key, body: key });
      }

      const first = await listHandler(storage, request({ desiredResourceState: { BucketName: BUCKET } }), {});
      const second = await listHandler(
        storage,
        request({ desiredResourceState: { BucketName: BUCKET }, nextToken: first.nextToken }),
        {}
      );

      expect(first).toEqual({
        status: 'SUCCESS',
        resourceModels: [
          { ObjectArn: 'arn:aws:s3:::my-bucket/a.txt', ObjectKey: 'a.txt', BucketName: BUCKET },
          { ObjectArn: 'arn:aws:s3:::my-bucket/b.txt', ObjectKey: 'b.txt', BucketName: BUCKET },
        ],
        nextToken: 'b.txt',
      });
      expect(second).toEqual({
        status: 'SUCCESS',
        resourceModels: [{ ObjectArn: 'arn:aws:s3:::my-bucket/c.txt', ObjectKey: 'c.txt', BucketName: BUCKET }],
        nextToken: undefined,
      });
    });

    it('should return no models for an empty bucket', async () => {
      const result = await listHandler(storage, request({ desiredResourceState: { BucketName: BUCKET } }), {});

      expect(result).toEqual({ status: 'SUCCESS', resourceModels: [], nextToken: undefined });
    });

    it('should require BucketName', async () => {
      const result = await listHandler(storage, request({ desiredResourceState: {} }), {});

      expect(result).toEqual({ status: 'FAILED', errorCode: 'InvalidRequest', message: 'Error: BucketName is required' });
    });
  });
});
