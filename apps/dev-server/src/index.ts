/**
 * Local invocation server
 * Run with: npm run dev:server
 */

import { getEnvDiagnostics, initEnv, PROVIDER_ENV_KEYS, requiredEnvKeys, validateRequiredEnv } from '@s3object/config';
import pino from 'pino';
import { buildServer, type InvokeFunction } from './server.js';

const { envFilePath, loaded, keysLoaded } = initEnv();

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
    },
  },
});

function logEnvDiagnostics(): void {
  logger.info({ event: 'env.loaded', envFilePath, loaded, keysLoaded: keysLoaded.length }, 'Environment loaded');

  const diagnostics = getEnvDiagnostics(PROVIDER_ENV_KEYS);
  for (const key of diagnostics.keys) {
    if (key.present) {
      logger.debug({ event: 'env.key', key: key.key, maskedValue: key.maskedValue, source: key.source }, 'Key present');
    }
  }
  for (const warning of diagnostics.warnings) {
    logger.warn({ event: 'env.warning' }, warning);
  }

  const validation = validateRequiredEnv(requiredEnvKeys());
  if (!validation.valid) {
    logger.fatal(
      { event: 'env.validation.failed', missing: validation.missing, storageProvider: process.env.STORAGE_PROVIDER },
      `Missing required environment variables: ${validation.missing.join(', ')}`
    );
    process.exit(1);
  }
}

async function main(): Promise<void> {
  logEnvDiagnostics();

  // The handler reads STORAGE_* when it loads, so it is imported after .env is applied
  const { entrypoint, testEntrypoint } = await import('@s3object/handler');

  const functions = new Map<string, InvokeFunction>([
    ['TypeFunction', entrypoint],
    ['TestEntrypoint', testEntrypoint],
  ]);

  const port = Number.parseInt(process.env.PORT || '3001', 10);
  const host = process.env.HOST || '127.0.0.1';
  const fastify = buildServer({ logger, functions });

  const shutdown = async () => {
    logger.info('Shutting down gracefully...');
    try {
      await fastify.close();
      process.exit(0);
    } catch (err) {
      logger.error(err, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  try {
    await fastify.listen({ port, host });
    logger.info(`Invocation server listening on http://${host}:${port}`);
    logger.info(`   Health check: http://${host}:${port}/health`);
    logger.info(`   Debug env: http://${host}:${port}/debug/env`);
    logger.info(`   cfn test --endpoint-url http://${host}:${port} --function-name TestEntrypoint`);
    logger.info(`   Storage provider: ${process.env.STORAGE_PROVIDER || 's3'}`);
  } catch (err) {
    logger.error(err, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ event: 'server.start.failed', error: err instanceof Error ? err.message : String(err) }, 'Startup failed');
  process.exit(1);
});
