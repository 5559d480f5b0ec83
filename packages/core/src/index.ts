/**
 * Resource model for AwsCommunity::S3::Object
 */

export * from './model.js';
export * from './arn.js';
export * from './tags.js';
