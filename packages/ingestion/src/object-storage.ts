import { PutObjectCommand, S3Client, type ObjectCannedACL } from '@aws-sdk/client-s3';
import type { ObjectStorage, PutObjectInput } from './types.js';

export interface S3StorageOptions {
  bucket: string;
  endpoint?: string;
  region?: string;
  accessKeyId: string;
  secretAccessKey: string;
  acl?: ObjectCannedACL;
  forcePathStyle?: boolean;
}

/**
 * S3-compatible object storage (AWS S3, Cloudflare R2, MinIO).
 */
export class S3ObjectStorage implements ObjectStorage {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly acl: ObjectCannedACL;

  constructor(options: S3StorageOptions, client?: S3Client) {
    this.bucket = options.bucket;
    this.acl = options.acl ?? 'public-read';
    this.client =
      client ??
      new S3Client({
        endpoint: options.endpoint,
        region: options.region ?? 'auto',
        forcePathStyle: options.forcePathStyle,
        credentials: {
          accessKeyId: options.accessKeyId,
          secretAccessKey: options.secretAccessKey,
        },
      });
  }

  async putJson(input: PutObjectInput): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: input.key,
        Body: input.body,
        ContentType: input.contentType,
        CacheControl: input.cacheControl,
        ACL: this.acl,
      }),
    );
  }

  destroy(): void {
    this.client.destroy();
  }
}
