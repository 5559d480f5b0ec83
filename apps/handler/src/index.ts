/**
 * Lambda entrypoints for AwsCommunity::S3::Object
 *
 * `entrypoint` serves CloudFormation; `testEntrypoint` serves `cfn test` through SAM.
 */

import { ResourceModelSchema, TYPE_NAME, type ResourceModel } from '@s3object/core';
import { Resource, type SerializedProgressEvent, type SessionFactory } from '@s3object/provider';
import { storageSettingsFromEnv, type ObjectStorage } from '@s3object/storage';
import { createHandler, deleteHandler, listHandler, readHandler, updateHandler } from './handlers.js';
import { createSessionFactory } from './session.js';

export function createResource(createSession: SessionFactory<ObjectStorage>): Resource<ResourceModel, ObjectStorage> {
  return new Resource<ResourceModel, ObjectStorage>({
    typeName: TYPE_NAME,
    modelSchema: ResourceModelSchema,
    createSession,
  })
    .handler('CREATE', createHandler)
    .handler('READ', readHandler)
    .handler('UPDATE', updateHandler)
    .handler('DELETE', deleteHandler)
    .handler('LIST', listHandler);
}

export const resource = createResource(createSessionFactory(storageSettingsFromEnv()));

export function entrypoint(event: unknown): Promise<SerializedProgressEvent> {
  return resource.entrypoint(event);
}

export function testEntrypoint(event: unknown): Promise<SerializedProgressEvent> {
  return resource.testEntrypoint(event);
}

export { createSessionFactory } from './session.js';
export * from './handlers.js';
export * from './errors.js';
