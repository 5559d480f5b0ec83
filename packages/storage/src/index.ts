/**
 * Object storage for the S3 object resource
 * Supports AWS S3, S3-compatible endpoints (minio) and an in-memory store
 */

export * from './client.js';
export * from './errors.js';
export * from './s3-object-storage.js';
export * from './memory-object-storage.js';
export * from './types.js';
