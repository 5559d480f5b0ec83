/**
 * ProgressEvent builders and wire serialization
 */

import type { CallbackContext, HandlerErrorCode, ProgressEvent } from './types.js';

export type SerializedProgressEvent = Record<string, unknown>;

export function successEvent<TModel>(model: TModel): ProgressEvent<TModel> {
  return { status: 'SUCCESS', resourceModel: model };
}

export function successListEvent<TModel>(models: TModel[], nextToken?: string): ProgressEvent<TModel> {
  return { status: 'SUCCESS', resourceModels: models, nextToken };
}

/**
 * Delete must not return a model
 */
export function successDeleteEvent<TModel>(): ProgressEvent<TModel> {
  return { status: 'SUCCESS' };
}

export function inProgressEvent<TModel>(
  model: TModel | undefined,
  callbackContext: CallbackContext,
  callbackDelaySeconds: number
): ProgressEvent<TModel> {
  return {
    status: 'IN_PROGRESS',
    resourceModel: model,
    callbackContext,
    callbackDelaySeconds,
  };
}

export function failedEvent<TModel>(errorCode: HandlerErrorCode, message: string): ProgressEvent<TModel> {
  return { status: 'FAILED', errorCode, message };
}

function dropUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}

/**
 * JSON body returned to CloudFormation: unset fields are omitted, in the event and in its models
 */
export function serializeProgressEvent<TModel extends object>(event: ProgressEvent<TModel>): SerializedProgressEvent {
  return dropUndefined({
    ...event,
    resourceModel: event.resourceModel === undefined ? undefined : dropUndefined(event.resourceModel),
    resourceModels: event.resourceModels?.map((model) => dropUndefined(model)),
  });
}
