/**
 * S3 client construction and storage settings
 */

import { S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import pino from 'pino';
import type { S3ClientSettings, StorageProvider, StorageSettings } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const STORAGE_PROVIDERS: readonly StorageProvider[] = ['s3', 'minio', 'memory'];

function isStorageProvider(value: string): value is StorageProvider {
  return STORAGE_PROVIDERS.some((provider) => provider === value);
}

/**
 * Validate endpoint URL format
 */
export function validateEndpoint(endpoint: string): void {
  if (!endpoint || endpoint.trim().length === 0) {
    throw new Error('STORAGE_ENDPOINT is required but is empty or missing');
  }

  if (!endpoint.startsWith('http://') && !endpoint.startsWith('https://')) {
    throw new Error(
      `STORAGE_ENDPOINT must start with http:// or https://. Got: ${endpoint.substring(0, 50)}${endpoint.length > 50 ? '...' : ''}`
    );
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`STORAGE_ENDPOINT is not a valid URL: ${message}`);
  }

  if (!url.hostname) {
    throw new Error(`STORAGE_ENDPOINT has invalid hostname: ${url.hostname}`);
  }
}

/**
 * Hostname of an endpoint for logging (never the full URL)
 */
function extractEndpointHost(endpoint: string): string {
  try {
    return new URL(endpoint).hostname;
  } catch {
    return 'invalid';
  }
}

/**
 * Create an S3 client.
 * Without explicit credentials the SDK's default provider chain applies.
 */
export function createS3Client(settings: S3ClientSettings): S3Client {
  const clientConfig: S3ClientConfig = {};

  if (settings.region) {
    clientConfig.region = settings.region;
  }

  if (settings.credentials) {
    clientConfig.credentials = {
      accessKeyId: settings.credentials.accessKeyId,
      secretAccessKey: settings.credentials.secretAccessKey,
      sessionToken: settings.credentials.sessionToken,
    };
  }

  if (settings.endpoint) {
    validateEndpoint(settings.endpoint);
    clientConfig.endpoint = settings.endpoint;
  }

  if (settings.forcePathStyle) {
    clientConfig.forcePathStyle = true;
  }

  logger.debug(
    {
      event: 'storage.client.created',
      region: settings.region,
      endpointHost: settings.endpoint ? extractEndpointHost(settings.endpoint) : 'aws-s3',
      explicitCredentials: !!settings.credentials,
      forcePathStyle: !!settings.forcePathStyle,
    },
    'S3 client created'
  );

  return new S3Client(clientConfig);
}

/**
 * S3 client settings for a provider: minio needs its endpoint and path-style addressing
 */
export function s3ClientSettingsFor(
  settings: StorageSettings,
  region: string | undefined,
  credentials: S3ClientSettings['credentials']
): S3ClientSettings {
  return {
    region,
    credentials,
    endpoint: settings.endpoint,
    forcePathStyle: settings.provider === 'minio',
  };
}

/**
 * Read storage settings from environment variables
 */
export function storageSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): StorageSettings {
  const provider = (env.STORAGE_PROVIDER || 's3').trim().toLowerCase();

  if (!isStorageProvider(provider)) {
    throw new Error(`Unsupported storage provider: ${provider}. Supported providers: ${STORAGE_PROVIDERS.join(', ')}`);
  }

  const endpoint = env.STORAGE_ENDPOINT?.trim() || undefined;

  if (provider === 'minio' && !endpoint) {
    throw new Error(
      'STORAGE_ENDPOINT is required for provider "minio". Please set STORAGE_ENDPOINT in your .env file (e.g., http://localhost:9000).'
    );
  }

  if (endpoint) {
    validateEndpoint(endpoint);
  }

  const buckets = (env.STORAGE_BUCKETS || '')
    .split(',')
    .map((bucket) => bucket.trim())
    .filter((bucket) => bucket.length > 0);

  return { provider, endpoint, buckets };
}
