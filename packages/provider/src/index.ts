/**
 * Runtime for CloudFormation resource handlers
 */

export * from './types.js';
export * from './errors.js';
export * from './progress.js';
export * from './payload.js';
export * from './resource.js';
