/**
 * Types for object storage operations
 */

export type StorageProvider = 's3' | 'minio' | 'memory';

export interface StorageSettings {
  provider: StorageProvider;
  endpoint?: string; // Required for minio, optional override for s3
  buckets: string[]; // Buckets that exist up front (memory only)
}

export interface S3ClientSettings {
  region?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
  endpoint?: string;
  forcePathStyle?: boolean;
}

export interface ObjectLocation {
  bucket: string;
  key: string;
}

export interface ObjectTag {
  Key: string;
  Value: string;
}

export interface PutObjectInput extends ObjectLocation {
  body: string;
  tags?: ObjectTag[];
}

export interface ListObjectsPage {
  keys: string[];
  nextToken?: string;
}

/**
 * Object operations the resource handlers need
 */
export interface ObjectStorage {
  /** Create or replace the object; its tag set becomes exactly `tags` */
  putObject(input: PutObjectInput): Promise<void>;
  objectExists(location: ObjectLocation): Promise<boolean>;
  /** UTF-8 body */
  getObjectContents(location: ObjectLocation): Promise<string>;
  getObjectTags(location: ObjectLocation): Promise<ObjectTag[]>;
  listObjects(bucket: string, continuationToken?: string): Promise<ListObjectsPage>;
  deleteObject(location: ObjectLocation): Promise<void>;
}
