/**
 * CRUDL handlers for AwsCommunity::S3::Object
 *
 * Create and Update return IN_PROGRESS with a callback context; the next
 * invocation re-reads the object and reports SUCCESS once it is readable.
 */

import pino from 'pino';
import {
  buildObjectArn,
  mergeTags,
  requireBucketName,
  requireObjectContents,
  requireObjectKey,
  resolveBucketName,
  resolveObjectLocation,
  type ObjectLocation,
  type ResourceModel,
} from '@s3object/core';
import {
  HandlerError,
  inProgressEvent,
  successDeleteEvent,
  successEvent,
  successListEvent,
  type Action,
  type CallbackContext,
  type ProgressEvent,
  type ResourceHandler,
  type ResourceHandlerRequest,
} from '@s3object/provider';
import type { ObjectStorage } from '@s3object/storage';
import { failedFromError } from './errors.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const CALLBACK_DELAY_SECONDS = 5;

export const CALLBACK_STATUS_IN_PROGRESS: CallbackContext = { status: 'IN_PROGRESS' };

export type ObjectHandler = ResourceHandler<ResourceModel, ObjectStorage>;
type ObjectRequest = ResourceHandlerRequest<ResourceModel>;
type ObjectProgress = ProgressEvent<ResourceModel>;

/**
 * True when this invocation continues an operation that returned IN_PROGRESS
 */
export function isCallback(callbackContext: CallbackContext): boolean {
  return callbackContext.status === CALLBACK_STATUS_IN_PROGRESS.status;
}

function progressCallback(model: ResourceModel): ObjectProgress {
  return inProgressEvent(model, { ...CALLBACK_STATUS_IN_PROGRESS }, CALLBACK_DELAY_SECONDS);
}

/**
 * Current state of the object, as Read reports it
 */
async function readObject(storage: ObjectStorage, request: ObjectRequest): Promise<ResourceModel> {
  const location = resolveObjectLocation(request.desiredResourceState);
  const contents = await storage.getObjectContents(location);
  const tags = await storage.getObjectTags(location);

  return {
    ObjectArn: buildObjectArn(location, request.awsPartition),
    ObjectKey: location.key,
    BucketName: location.bucket,
    ObjectContents: contents,
    Tags: tags.length > 0 ? tags : undefined,
  };
}

/**
 * Stabilisation pass: SUCCESS once Read succeeds.
 * For Delete, a missing object is the goal and an existing one means not yet.
 */
export async function callbackHelper(
  storage: ObjectStorage,
  request: ObjectRequest,
  action: Action
): Promise<ObjectProgress> {
  const isDelete = action === 'DELETE';
  let model: ResourceModel;

  try {
    model = await readObject(storage, request);
  } catch (error) {
    const failure = failedFromError<ResourceModel>(error, action);
    if (isDelete && failure.errorCode === 'NotFound') {
      logger.debug({ event: 'handler.callback.deleted', action }, 'Object is gone, delete complete');
      return successDeleteEvent<ResourceModel>();
    }
    return failure;
  }

  logger.debug({ event: 'handler.callback.read', action, objectArn: model.ObjectArn }, 'Callback read succeeded');

  if (isDelete) {
    return inProgressEvent<ResourceModel>(undefined, { ...CALLBACK_STATUS_IN_PROGRESS }, CALLBACK_DELAY_SECONDS);
  }
  return successEvent(model);
}

/**
 * Write the object with the merged tag set and return the model with its ARN
 */
async function writeObject(
  storage: ObjectStorage,
  request: ObjectRequest,
  location: ObjectLocation,
  model: ResourceModel
): Promise<ResourceModel> {
  const body = requireObjectContents(model);
  const tags = mergeTags(request.desiredResourceTags, model.Tags);

  await storage.putObject({ ...location, body, tags });

  const objectArn = buildObjectArn(location, request.awsPartition);
  logger.info(
    { event: 'handler.object.written', objectArn, tagCount: tags.length },
    'Object written'
  );

  return { ...model, BucketName: location.bucket, ObjectArn: objectArn };
}

function writeLocation(model: ResourceModel | undefined): ObjectLocation {
  return { bucket: requireBucketName(model), key: requireObjectKey(model) };
}

export const createHandler: ObjectHandler = async (storage, request, callbackContext) => {
  if (isCallback(callbackContext)) {
    return callbackHelper(storage, request, 'CREATE');
  }
  logger.debug({ event: 'handler.create.started' }, 'No callback context present');

  try {
    const model = request.desiredResourceState ?? {};
    const location = writeLocation(model);

    if (await storage.objectExists(location)) {
      throw new HandlerError('AlreadyExists', `Object ${location.key} already exists in bucket ${location.bucket}`);
    }

    return progressCallback(await writeObject(storage, request, location, model));
  } catch (error) {
    return failedFromError<ResourceModel>(error, 'CREATE');
  }
};

export const readHandler: ObjectHandler = async (storage, request) => {
  try {
    return successEvent(await readObject(storage, request));
  } catch (error) {
    return failedFromError<ResourceModel>(error, 'READ');
  }
};

/**
 * BucketName and ObjectKey make up the primary identifier and cannot change in place
 */
function assertIdentityUnchanged(previous: ResourceModel | undefined, location: ObjectLocation): void {
  const previousBucket = resolveBucketName(previous);
  if (previousBucket !== undefined && previousBucket !== location.bucket) {
    throw new HandlerError('NotUpdatable', `BucketName cannot be updated from ${previousBucket} to ${location.bucket}`);
  }

  const previousKey = previous?.ObjectKey;
  if (previousKey !== undefined && previousKey !== location.key) {
    throw new HandlerError('NotUpdatable', `ObjectKey cannot be updated from ${previousKey} to ${location.key}`);
  }
}

export const updateHandler: ObjectHandler = async (storage, request, callbackContext) => {
  if (isCallback(callbackContext)) {
    return callbackHelper(storage, request, 'UPDATE');
  }
  logger.debug({ event: 'handler.update.started' }, 'No callback context present');

  try {
    const model = request.desiredResourceState ?? {};
    const location = writeLocation(model);
    assertIdentityUnchanged(request.previousResourceState, location);

    if (!(await storage.objectExists(location))) {
      throw new HandlerError('NotFound', `Object ${location.key} does not exist in bucket ${location.bucket}`);
    }

    return progressCallback(await writeObject(storage, request, location, model));
  } catch (error) {
    return failedFromError<ResourceModel>(error, 'UPDATE');
  }
};

export const deleteHandler: ObjectHandler = async (storage, request, callbackContext) => {
  if (isCallback(callbackContext)) {
    return callbackHelper(storage, request, 'DELETE');
  }
  logger.debug({ event: 'handler.delete.started' }, 'No callback context present');

  try {
    const location = resolveObjectLocation(request.desiredResourceState);

    if (!(await storage.objectExists(location))) {
      throw new HandlerError('NotFound', `Object ${location.key} does not exist in bucket ${location.bucket}`);
    }

    await storage.deleteObject(location);
    logger.info(
      { event: 'handler.object.deleted', objectArn: buildObjectArn(location, request.awsPartition) },
      'Object deleted'
    );

    return successDeleteEvent<ResourceModel>();
  } catch (error) {
    return failedFromError<ResourceModel>(error, 'DELETE');
  }
};

export const listHandler: ObjectHandler = async (storage, request) => {
  try {
    const bucket = requireBucketName(request.desiredResourceState);
    const page = await storage.listObjects(bucket, request.nextToken);

    const models = page.keys.map(
      (key): ResourceModel => ({
        ObjectArn: buildObjectArn({ bucket, key }, request.awsPartition),
        ObjectKey: key,
        BucketName: bucket,
      })
    );

    logger.debug(
      { event: 'handler.list.page', bucket, count: models.length, hasMore: page.nextToken !== undefined },
      'Listed objects'
    );

    return successListEvent(models, page.nextToken);
  } catch (error) {
    return failedFromError<ResourceModel>(error, 'LIST');
  }
};
