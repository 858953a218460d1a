import { Logger } from '@nestjs/common';
import { Bucket, Storage } from '@google-cloud/storage';
import { StorageException } from '../../common/errors/service.exception';
import { errorMessage } from '../../common/utils/errors';
import { BlobBackend, StoredBlob } from './blob-backend';

export interface GcsBackendConfig {
  projectId: string;
  bucket: string;
  keyFilename?: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 404;
}

export class GcsBlobBackend extends BlobBackend {
  readonly method = 'gcp';
  private readonly logger = new Logger(GcsBlobBackend.name);
  private readonly bucket: Bucket;

  constructor(private readonly config: GcsBackendConfig) {
    super();
    const storage = new Storage({ projectId: config.projectId, keyFilename: config.keyFilename });
    this.bucket = storage.bucket(config.bucket);
    this.logger.log(`GCS content storage on bucket ${config.bucket}`);
  }

  async put(key: string, content: Buffer, mimeType: string): Promise<void> {
    try {
      await this.bucket.file(key).save(content, { contentType: mimeType, resumable: false });
    } catch (error) {
      throw new StorageException(`GCS upload of ${key} failed: ${errorMessage(error)}`, error);
    }
  }

  async get(key: string): Promise<StoredBlob | null> {
    const file = this.bucket.file(key);
    try {
      const [content] = await file.download();
      const [metadata] = await file.getMetadata();
      return {
        key,
        content,
        mimeType: metadata.contentType ?? 'application/octet-stream',
        size: content.length,
      };
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new StorageException(`GCS download of ${key} failed: ${errorMessage(error)}`, error);
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const [exists] = await this.bucket.file(key).exists();
      return exists;
    } catch (error) {
      throw new StorageException(`GCS lookup of ${key} failed: ${errorMessage(error)}`, error);
    }
  }

  async list(prefix: string): Promise<string[]> {
    try {
      const [files] = await this.bucket.getFiles({ prefix, autoPaginate: true });
      return files.map((file) => file.name).sort();
    } catch (error) {
      throw new StorageException(`GCS listing of ${prefix} failed: ${errorMessage(error)}`, error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.bucket.file(key).delete({ ignoreNotFound: true });
    } catch (error) {
      throw new StorageException(`GCS delete of ${key} failed: ${errorMessage(error)}`, error);
    }
  }

  async deletePrefix(prefix: string): Promise<number> {
    const keys = await this.list(prefix);
    if (keys.length === 0) {
      return 0;
    }
    try {
      await this.bucket.deleteFiles({ prefix, force: true });
    } catch (error) {
      throw new StorageException(`GCS delete under ${prefix} failed: ${errorMessage(error)}`, error);
    }
    this.logger.debug(`Removed ${keys.length} object(s) under ${prefix}`);
    return keys.length;
  }

  publicUrl(key: string): string {
    const path = key.split('/').map(encodeURIComponent).join('/');
    return `https://storage.googleapis.com/${this.config.bucket}/${path}`;
  }
}
