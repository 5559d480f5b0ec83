/**
 * Local stand-in for the Lambda Invoke API used by `cfn test`
 *
 * `cfn test --function-name TestEntrypoint` posts to
 * /2015-03-31/functions/<name>/invocations, which is what `sam local start-lambda` serves.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import { getEnvDiagnostics, PROVIDER_ENV_KEYS } from '@s3object/config';
import type { SerializedProgressEvent } from '@s3object/provider';

export type InvokeFunction = (event: unknown) => Promise<SerializedProgressEvent>;

export interface DevServerOptions {
  logger?: FastifyBaseLogger;
  /** Function name (as in template.yml) to entrypoint */
  functions: ReadonlyMap<string, InvokeFunction>;
}

interface InvokeParams {
  functionName: string;
}

function invalidBodyError(cause: unknown): Error {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return Object.assign(new Error(`Request body is not valid JSON: ${detail}`), { statusCode: 400 });
}

function debugEndpointsEnabled(): boolean {
  return process.env.NODE_ENV !== 'production' || process.env.ENABLE_DEBUG_ENDPOINTS === 'true';
}

export function buildServer(options: DevServerOptions): FastifyInstance {
  const fastify = Fastify({ logger: options.logger ?? false });

  // Lambda clients do not always send application/json
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'string' }, async (_request: unknown, body: string) => {
    if (body.trim().length === 0) {
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (error) {
      throw invalidBodyError(error);
    }
  });

  fastify.get('/health', async () => {
    return { ok: true, timestamp: new Date().toISOString() };
  });

  fastify.get('/debug/env', async (_request, reply) => {
    if (!debugEndpointsEnabled()) {
      return reply.code(403).send({ error: 'Debug endpoints disabled in production' });
    }

    const diagnostics = getEnvDiagnostics(PROVIDER_ENV_KEYS);
    return {
      cwd: diagnostics.cwd,
      repoRoot: diagnostics.repoRoot,
      envFilePath: diagnostics.envFilePath,
      envFileExists: diagnostics.envFileExists,
      keys: diagnostics.keys.map((k) => ({
        key: k.key,
        present: k.present,
        maskedValue: k.maskedValue,
        source: k.source,
      })),
      warnings: diagnostics.warnings,
      timestamp: new Date().toISOString(),
    };
  });

  fastify.post<{ Params: InvokeParams }>('/2015-03-31/functions/:functionName/invocations', async (request, reply) => {
    const { functionName } = request.params;
    const invoke = options.functions.get(functionName);

    if (!invoke) {
      request.log.warn({ event: 'invoke.function.unknown', functionName }, 'Unknown function');
      return reply
        .code(404)
        .header('x-amzn-ErrorType', 'ResourceNotFoundException')
        .send({ Type: 'User', Message: `Function not found: ${functionName}` });
    }

    try {
      const result = await invoke(request.body);
      request.log.info(
        { event: 'invoke.function.completed', functionName, status: result.status },
        `${functionName} returned`
      );
      return reply.code(200).send(result);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      request.log.error({ event: 'invoke.function.failed', functionName, error: err.message }, 'Function threw');
      // Lambda reports function errors with a 200 and this header
      return reply
        .code(200)
        .header('X-Amz-Function-Error', 'Unhandled')
        .send({ errorType: err.name, errorMessage: err.message });
    }
  });

  return fastify;
}
