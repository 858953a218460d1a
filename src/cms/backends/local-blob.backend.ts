import { Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import * as path from 'path';
import { StorageException } from '../../common/errors/service.exception';
import { errorMessage } from '../../common/utils/errors';
import { BlobBackend, StoredBlob, staticUrl } from './blob-backend';

const CONTENT_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
  '.ico': 'image/x-icon',
  '.css': 'text/css',
  '.js': 'application/javascript',
  '.json': 'application/json',
  '.html': 'text/html',
  '.txt': 'text/plain',
  '.pdf': 'application/pdf',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
};

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores blobs as files below a root directory; the key is the relative path.
 */
export class LocalBlobBackend extends BlobBackend {
  readonly method = 'local';
  private readonly logger = new Logger(LocalBlobBackend.name);
  private readonly root: string;

  constructor(root: string, private readonly baseUrl: string) {
    super();
    this.root = path.resolve(root);
  }

  async put(key: string, content: Buffer, _mimeType: string): Promise<void> {
    const target = this.resolve(key);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content);
    } catch (error) {
      throw new StorageException(`Could not write ${key}: ${errorMessage(error)}`, error);
    }
  }

  async get(key: string): Promise<StoredBlob | null> {
    try {
      const content = await fs.readFile(this.resolve(key));
      return { key, content, mimeType: this.contentType(key), size: content.length };
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw new StorageException(`Could not read ${key}: ${errorMessage(error)}`, error);
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.resolve(key));
      return stats.isFile();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw new StorageException(`Could not stat ${key}: ${errorMessage(error)}`, error);
    }
  }

  async list(prefix: string): Promise<string[]> {
    const slash = prefix.lastIndexOf('/');
    const directory = slash >= 0 ? prefix.slice(0, slash) : '';
    const keys = await this.walk(directory);
    return keys.filter((key) => key.startsWith(prefix)).sort();
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.rm(this.resolve(key), { force: true });
    } catch (error) {
      throw new StorageException(`Could not delete ${key}: ${errorMessage(error)}`, error);
    }
  }

  async deletePrefix(prefix: string): Promise<number> {
    const keys = await this.list(prefix);
    try {
      if (prefix.endsWith('/')) {
        await fs.rm(this.resolve(prefix.slice(0, -1)), { recursive: true, force: true });
      } else {
        await Promise.all(keys.map((key) => fs.rm(this.resolve(key), { force: true })));
      }
    } catch (error) {
      throw new StorageException(`Could not delete ${prefix}: ${errorMessage(error)}`, error);
    }
    this.logger.debug(`Removed ${keys.length} file(s) under ${prefix}`);
    return keys.length;
  }

  publicUrl(key: string): string {
    return staticUrl(this.baseUrl, key);
  }

  private resolve(key: string): string {
    const target = path.resolve(this.root, ...key.split('/'));
    if (target !== this.root && !target.startsWith(this.root + path.sep)) {
      throw new StorageException(`Key ${key} escapes the storage root`);
    }
    return target;
  }

  private contentType(key: string): string {
    return CONTENT_TYPES[path.extname(key).toLowerCase()] ?? 'application/octet-stream';
  }

  private async walk(directory: string): Promise<string[]> {
    let entries;
    try {
      entries = await fs.readdir(this.resolve(directory), { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw new StorageException(`Could not list ${directory}: ${errorMessage(error)}`, error);
    }
    const keys: string[] = [];
    for (const entry of entries) {
      const key = directory ? `${directory}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        keys.push(...(await this.walk(key)));
      } else if (entry.isFile()) {
        keys.push(key);
      }
    }
    return keys;
  }
}
