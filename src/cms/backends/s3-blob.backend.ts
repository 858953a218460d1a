import { Logger } from '@nestjs/common';
import {
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { StorageException } from '../../common/errors/service.exception';
import { errorMessage } from '../../common/utils/errors';
import { BlobBackend, StoredBlob } from './blob-backend';

export interface S3BackendConfig {
  bucket: string;
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  endpoint?: string;
}

/** DeleteObjects accepts at most this many keys per request. */
const DELETE_BATCH_SIZE = 1000;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && (error.name === 'NoSuchKey' || error.name === 'NotFound');
}

export class S3BlobBackend extends BlobBackend {
  readonly method = 'aws';
  private readonly logger = new Logger(S3BlobBackend.name);
  private readonly client: S3Client;

  constructor(private readonly config: S3BackendConfig) {
    super();
    this.client = new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: Boolean(config.endpoint),
      credentials:
        config.accessKeyId && config.secretAccessKey
          ? { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey }
          : undefined,
    });
    this.logger.log(`S3 content storage on bucket ${config.bucket} (${config.region})`);
  }

  async put(key: string, content: Buffer, mimeType: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({ Bucket: this.config.bucket, Key: key, Body: content, ContentType: mimeType }),
      );
    } catch (error) {
      throw new StorageException(`S3 upload of ${key} failed: ${errorMessage(error)}`, error);
    }
  }

  async get(key: string): Promise<StoredBlob | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.config.bucket, Key: key }));
      if (!response.Body) {
        return null;
      }
      const content = Buffer.from(await response.Body.transformToByteArray());
      return {
        key,
        content,
        mimeType: response.ContentType ?? 'application/octet-stream',
        size: content.length,
      };
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new StorageException(`S3 download of ${key} failed: ${errorMessage(error)}`, error);
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.config.bucket, Key: key }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new StorageException(`S3 head of ${key} failed: ${errorMessage(error)}`, error);
    }
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;
    try {
      do {
        const response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.config.bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          }),
        );
        for (const object of response.Contents ?? []) {
          if (object.Key) keys.push(object.Key);
        }
        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw new StorageException(`S3 listing of ${prefix} failed: ${errorMessage(error)}`, error);
    }
    return keys.sort();
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.config.bucket, Key: key }));
    } catch (error) {
      throw new StorageException(`S3 delete of ${key} failed: ${errorMessage(error)}`, error);
    }
  }

  async deletePrefix(prefix: string): Promise<number> {
    const keys = await this.list(prefix);
    for (let start = 0; start < keys.length; start += DELETE_BATCH_SIZE) {
      const batch = keys.slice(start, start + DELETE_BATCH_SIZE);
      let failures: string[];
      try {
        const response = await this.client.send(
          new DeleteObjectsCommand({
            Bucket: this.config.bucket,
            Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true },
          }),
        );
        failures = (response.Errors ?? []).map((failure) => `${failure.Key}: ${failure.Code}`);
      } catch (error) {
        throw new StorageException(`S3 delete under ${prefix} failed: ${errorMessage(error)}`, error);
      }
      if (failures.length > 0) {
        throw new StorageException(`S3 could not delete ${failures.length} object(s) under ${prefix}: ${failures.join(', ')}`);
      }
    }
    this.logger.debug(`Removed ${keys.length} object(s) under ${prefix}`);
    return keys.length;
  }

  publicUrl(key: string): string {
    const path = key.split('/').map(encodeURIComponent).join('/');
    if (this.config.endpoint) {
      return `${this.config.endpoint.replace(/\/+$/, '')}/${this.config.bucket}/${path}`;
    }
    return `https://${this.config.bucket}.s3.${this.config.region}.amazonaws.com/${path}`;
  }
}
