/**
 * Resource: handler registry and invocation entrypoints
 */

import pino from 'pino';
import type { z } from 'zod';
import { redactPayload } from '@s3object/privacy';
import { HandlerError, isHandlerError } from './errors.js';
import { HandlerRequestSchema, TestEventSchema, formatZodError, partitionForRegion } from './payload.js';
import { failedEvent, serializeProgressEvent, type SerializedProgressEvent } from './progress.js';
import type {
  Action,
  CallbackContext,
  Credentials,
  ProgressEvent,
  ResourceHandler,
  ResourceHandlerRequest,
  SessionFactory,
} from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface ResourceOptions<TModel, TSession> {
  typeName: string;
  modelSchema: z.ZodType<TModel, z.ZodTypeDef, unknown>;
  createSession: SessionFactory<TSession>;
}

interface Invocation<TModel> {
  action: Action;
  request: ResourceHandlerRequest<TModel>;
  credentials?: Credentials;
  callbackContext: CallbackContext;
}

function toCredentials(
  value: { accessKeyId: string; secretAccessKey: string; sessionToken?: string | null } | null | undefined
): Credentials | undefined {
  if (!value) return undefined;
  return {
    accessKeyId: value.accessKeyId,
    secretAccessKey: value.secretAccessKey,
    sessionToken: value.sessionToken ?? undefined,
  };
}

export class Resource<TModel extends object, TSession> {
  readonly typeName: string;
  private readonly modelSchema: z.ZodType<TModel, z.ZodTypeDef, unknown>;
  private readonly createSession: SessionFactory<TSession>;
  private readonly handlers = new Map<Action, ResourceHandler<TModel, TSession>>();

  constructor(options: ResourceOptions<TModel, TSession>) {
    this.typeName = options.typeName;
    this.modelSchema = options.modelSchema;
    this.createSession = options.createSession;
  }

  /**
   * Register the handler for an action (replaces any previous one)
   */
  handler(action: Action, handler: ResourceHandler<TModel, TSession>): this {
    this.handlers.set(action, handler);
    return this;
  }

  /**
   * Lambda entrypoint for invocations from the CloudFormation service
   */
  async entrypoint(event: unknown): Promise<SerializedProgressEvent> {
    return this.run(event, 'entrypoint', (payload) => this.parseHandlerRequest(payload));
  }

  /**
   * Lambda entrypoint for `cfn test` invocations through SAM
   */
  async testEntrypoint(event: unknown): Promise<SerializedProgressEvent> {
    return this.run(event, 'testEntrypoint', (payload) => this.parseTestEvent(payload));
  }

  private async run(
    event: unknown,
    source: string,
    parse: (event: unknown) => Invocation<TModel>
  ): Promise<SerializedProgressEvent> {
    let action: Action | undefined;
    let progress: ProgressEvent<TModel>;

    try {
      const invocation = parse(event);
      action = invocation.action;

      logger.debug(
        {
          event: 'provider.invocation.received',
          source,
          typeName: this.typeName,
          action,
          payload: redactPayload(event),
        },
        'Handler invocation received'
      );

      progress = await this.invoke(invocation);
    } catch (error) {
      progress = this.failureFromError(error, action);
    }

    logger.info(
      {
        event: 'provider.invocation.completed',
        source,
        typeName: this.typeName,
        action,
        status: progress.status,
        errorCode: progress.errorCode,
      },
      `${action ?? 'UNKNOWN'} finished with status ${progress.status}`
    );

    return serializeProgressEvent(progress);
  }

  private async invoke(invocation: Invocation<TModel>): Promise<ProgressEvent<TModel>> {
    const handler = this.handlers.get(invocation.action);
    if (!handler) {
      return failedEvent('InternalFailure', `No handler for ${invocation.action}`);
    }

    const session = this.createSession(invocation.credentials, invocation.request.region);
    return handler(session, invocation.request, invocation.callbackContext);
  }

  private failureFromError(error: unknown, action: Action | undefined): ProgressEvent<TModel> {
    if (isHandlerError(error)) {
      logger.warn(
        {
          event: 'provider.invocation.rejected',
          typeName: this.typeName,
          action,
          errorCode: error.errorCode,
          error: error.message,
        },
        'Handler invocation rejected'
      );
      return failedEvent(error.errorCode, error.message);
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error(
      {
        event: 'provider.invocation.failed',
        typeName: this.typeName,
        action,
        error: message,
        stack: error instanceof Error ? error.stack : undefined,
      },
      'Unhandled error in handler'
    );
    return failedEvent('InternalFailure', message);
  }

  private parseModel(value: unknown, field: string): TModel | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    const result = this.modelSchema.safeParse(value);
    if (!result.success) {
      throw new HandlerError('InvalidRequest', `Invalid ${field}: ${formatZodError(result.error)}`);
    }
    return result.data;
  }

  private parseHandlerRequest(event: unknown): Invocation<TModel> {
    const parsed = HandlerRequestSchema.safeParse(event);
    if (!parsed.success) {
      throw new HandlerError('InvalidRequest', `Invalid request payload: ${formatZodError(parsed.error)}`);
    }

    const payload = parsed.data;
    const data = payload.requestData;
    const region = payload.region ?? undefined;

    return {
      action: payload.action,
      credentials: toCredentials(data.callerCredentials),
      callbackContext: payload.callbackContext ?? {},
      request: {
        clientRequestToken: payload.bearerToken ?? undefined,
        desiredResourceState: this.parseModel(data.resourceProperties, 'resourceProperties'),
        previousResourceState: this.parseModel(data.previousResourceProperties, 'previousResourceProperties'),
        desiredResourceTags: data.stackTags ?? undefined,
        previousResourceTags: data.previousStackTags ?? undefined,
        systemTags: data.systemTags ?? undefined,
        previousSystemTags: data.previousSystemTags ?? undefined,
        awsAccountId: payload.awsAccountId ?? undefined,
        logicalResourceIdentifier: data.logicalResourceId ?? undefined,
        typeConfiguration: data.typeConfiguration ?? undefined,
        nextToken: payload.nextToken ?? undefined,
        region,
        awsPartition: partitionForRegion(region),
        stackId: payload.stackId ?? undefined,
      },
    };
  }

  private parseTestEvent(event: unknown): Invocation<TModel> {
    const parsed = TestEventSchema.safeParse(event);
    if (!parsed.success) {
      throw new HandlerError('InvalidRequest', `Invalid test payload: ${formatZodError(parsed.error)}`);
    }

    const payload = parsed.data;
    const request = payload.request;
    const region = request.region ?? payload.region ?? undefined;

    return {
      action: payload.action,
      credentials: toCredentials(payload.credentials),
      callbackContext: payload.callbackContext ?? {},
      request: {
        clientRequestToken: request.clientRequestToken ?? undefined,
        desiredResourceState: this.parseModel(request.desiredResourceState, 'desiredResourceState'),
        previousResourceState: this.parseModel(request.previousResourceState, 'previousResourceState'),
        desiredResourceTags: request.desiredResourceTags ?? undefined,
        previousResourceTags: request.previousResourceTags ?? undefined,
        systemTags: request.systemTags ?? undefined,
        previousSystemTags: request.previousSystemTags ?? undefined,
        awsAccountId: request.awsAccountId ?? undefined,
        logicalResourceIdentifier: request.logicalResourceIdentifier ?? undefined,
        typeConfiguration: request.typeConfiguration ?? undefined,
        nextToken: request.nextToken ?? undefined,
        region,
        awsPartition: request.awsPartition ?? partitionForRegion(region),
        stackId: request.stackId ?? undefined,
      },
    };
  }
}
