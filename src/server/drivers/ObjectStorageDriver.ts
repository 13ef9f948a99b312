/**
 * S3-compatible object storage client.
 * Works against AWS S3, Google Cloud Storage (S3 interoperability API), MinIO and LocalStack.
 */

import { HeadBucketCommand, S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import { logger } from '../utils/logger.js';
import { ConfigurationError } from '../types/errors.js';
import type { ObjectStorageOptions } from '../config/resourceConfig.js';
import type { ResourceDriver } from './ResourceDriver.js';

export class ObjectStorageClient {
  constructor(
    readonly s3: S3Client,
    readonly bucket: string
  ) {}

  async headBucket(): Promise<void> {
    await this.s3.send(new HeadBucketCommand({ Bucket: this.bucket }));
  }

  close(): void {
    this.s3.destroy();
  }
}

export function buildS3ClientConfig(options: ObjectStorageOptions): S3ClientConfig {
  const clientConfig: S3ClientConfig = {
    region: options.region,
  };

  // Custom endpoints (MinIO, LocalStack) need path-style addressing
  if (options.endpoint) {
    clientConfig.endpoint = options.endpoint;
    clientConfig.forcePathStyle = true;
  } else if (options.forcePathStyle) {
    clientConfig.forcePathStyle = true;
  }

  // Without explicit keys the SDK's default provider chain applies (env, profile, IAM role)
  if (options.accessKeyId && options.secretAccessKey) {
    clientConfig.credentials = {
      accessKeyId: options.accessKeyId,
      secretAccessKey: options.secretAccessKey,
    };
  }

  return clientConfig;
}

export class ObjectStorageDriver implements ResourceDriver<ObjectStorageClient, ObjectStorageOptions> {
  async initialize(config: ObjectStorageOptions): Promise<ObjectStorageClient> {
    if (!config.bucket) {
      throw new ConfigurationError('Object storage requires a bucket', { resource: 'storage' });
    }

    const storage = new ObjectStorageClient(new S3Client(buildS3ClientConfig(config)), config.bucket);
    try {
      await storage.headBucket();
    } catch (error) {
      storage.close();
      throw error;
    }

    logger.info({ bucket: config.bucket, endpoint: config.endpoint }, 'Object storage client initialized');
    return storage;
  }

  async cleanup(instance: ObjectStorageClient): Promise<void> {
    instance.close();
    logger.info({ bucket: instance.bucket }, 'Object storage client closed');
  }

  async healthCheck(instance: ObjectStorageClient): Promise<boolean> {
    try {
      await instance.headBucket();
      return true;
    } catch (error) {
      logger.warn(
        { bucket: instance.bucket, error: error instanceof Error ? error.message : String(error) },
        'Object storage health check failed'
      );
      return false;
    }
  }

  isInstance(candidate: unknown): candidate is ObjectStorageClient {
    return candidate instanceof ObjectStorageClient;
  }
}
