import { Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { StorageException } from '../../common/errors/service.exception';
import { errorMessage } from '../../common/utils/errors';
import { BlobBackend, StoredBlob, staticUrl } from './blob-backend';

/** Sorted set (all scores 0) holding every stored key, for lexical prefix scans. */
export const REDIS_INDEX_KEY = 'cms:index';
const BLOB_KEY_PREFIX = 'cms:blob:';

type ExecResult = [Error | null, unknown][] | null;

function assertExecuted(result: ExecResult, operation: string): void {
  if (result === null) {
    throw new StorageException(`Redis transaction for ${operation} was aborted`);
  }
  const error = result.map(([commandError]) => commandError).find((commandError) => commandError !== null);
  if (error) {
    throw new StorageException(`Redis ${operation} failed: ${error.message}`, error);
  }
}

export class RedisBlobBackend extends BlobBackend implements OnModuleDestroy {
  readonly method = 'redis';
  private readonly logger = new Logger(RedisBlobBackend.name);
  private readonly client: Redis;

  constructor(
    url: string,
    private readonly baseUrl: string,
  ) {
    super();
    this.client = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 3 });
    this.client.on('error', (error: Error) => {
      this.logger.error(`Redis connection error: ${error.message}`);
    });
    this.client.on('connect', () => {
      this.logger.log('Redis content storage connected');
    });
  }

  private blobKey(key: string): string {
    return `${BLOB_KEY_PREFIX}${key}`;
  }

  async put(key: string, content: Buffer, mimeType: string): Promise<void> {
    let result: ExecResult;
    try {
      result = await this.client
        .multi()
        .hset(this.blobKey(key), { content, mimeType })
        .zadd(REDIS_INDEX_KEY, 0, key)
        .exec();
    } catch (error) {
      throw new StorageException(`Redis upload of ${key} failed: ${errorMessage(error)}`, error);
    }
    assertExecuted(result, `upload of ${key}`);
  }

  async get(key: string): Promise<StoredBlob | null> {
    let fields: Record<string, Buffer>;
    try {
      fields = await this.client.hgetallBuffer(this.blobKey(key));
    } catch (error) {
      throw new StorageException(`Redis download of ${key} failed: ${errorMessage(error)}`, error);
    }
    const content = fields.content;
    if (!content) {
      return null;
    }
    return {
      key,
      content,
      mimeType: fields.mimeType?.toString('utf8') ?? 'application/octet-stream',
      size: content.length,
    };
  }

  async exists(key: string): Promise<boolean> {
    try {
      return (await this.client.exists(this.blobKey(key))) > 0;
    } catch (error) {
      throw new StorageException(`Redis lookup of ${key} failed: ${errorMessage(error)}`, error);
    }
  }

  async list(prefix: string): Promise<string[]> {
    const min = prefix ? `[${prefix}` : '-';
    const max = prefix ? Buffer.concat([Buffer.from(`[${prefix}`), Buffer.from([0xff])]) : '+';
    try {
      return await this.client.zrangebylex(REDIS_INDEX_KEY, min, max);
    } catch (error) {
      throw new StorageException(`Redis listing of ${prefix} failed: ${errorMessage(error)}`, error);
    }
  }

  async delete(key: string): Promise<void> {
    let result: ExecResult;
    try {
      result = await this.client.multi().del(this.blobKey(key)).zrem(REDIS_INDEX_KEY, key).exec();
    } catch (error) {
      throw new StorageException(`Redis delete of ${key} failed: ${errorMessage(error)}`, error);
    }
    assertExecuted(result, `delete of ${key}`);
  }

  async deletePrefix(prefix: string): Promise<number> {
    const keys = await this.list(prefix);
    if (keys.length === 0) {
      return 0;
    }
    let result: ExecResult;
    try {
      result = await this.client
        .multi()
        .del(...keys.map((key) => this.blobKey(key)))
        .zrem(REDIS_INDEX_KEY, ...keys)
        .exec();
    } catch (error) {
      throw new StorageException(`Redis delete under ${prefix} failed: ${errorMessage(error)}`, error);
    }
    assertExecuted(result, `delete under ${prefix}`);
    return keys.length;
  }

  publicUrl(key: string): string {
    return staticUrl(this.baseUrl, key);
  }

  async onModuleDestroy(): Promise<void> {
    if (this.client.status !== 'end' && this.client.status !== 'wait') {
      await this.client.quit();
    }
  }
}
