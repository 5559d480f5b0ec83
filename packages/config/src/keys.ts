/**
 * Environment keys read by the local tooling
 */

export const STORAGE_ENV_KEYS = ['STORAGE_PROVIDER', 'STORAGE_ENDPOINT', 'STORAGE_BUCKETS'] as const;

export const SERVER_ENV_KEYS = ['PORT', 'HOST', 'NODE_ENV', 'ENABLE_DEBUG_ENDPOINTS'] as const;

// Picked up by the SDK's default credential chain when an invocation carries no credentials
export const AWS_ENV_KEYS = ['AWS_REGION', 'AWS_PROFILE', 'AWS_ACCESS_KEY_ID', 'AWS_SECRET_ACCESS_KEY'] as const;

export const PROVIDER_ENV_KEYS = ['LOG_LEVEL', ...STORAGE_ENV_KEYS, ...SERVER_ENV_KEYS, ...AWS_ENV_KEYS] as const;

/**
 * Keys that must be set for the configured storage provider
 */
export function requiredEnvKeys(env: NodeJS.ProcessEnv = process.env): string[] {
  const provider = (env.STORAGE_PROVIDER || 's3').trim().toLowerCase();
  return provider === 'minio' ? ['STORAGE_ENDPOINT'] : [];
}
