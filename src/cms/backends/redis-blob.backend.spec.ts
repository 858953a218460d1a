import { REDIS_INDEX_KEY, RedisBlobBackend } from './redis-blob.backend';

/** Just enough of ioredis for the backend: hashes, a lexical index and MULTI. */
class MockRedis {
  static instances: MockRedis[] = [];
  readonly hashes = new Map<string, Map<string, Buffer>>();
  readonly index = new Set<string>();
  status = 'wait';
  readonly execs: string[][] = [];

  constructor() {
    MockRedis.instances.push(this);
  }

  on(): this {
    return this;
  }

  multi() {
    const operations: Array<() => void> = [];
    const names: string[] = [];
    const chain = {
      hset: (key: string, fields: Record<string, Buffer | string>) => {
        names.push('hset');
        operations.push(() => {
          const hash = new Map<string, Buffer>();
          Object.entries(fields).forEach(([field, value]) => hash.set(field, Buffer.from(value)));
          this.hashes.set(key, hash);
        });
        return chain;
      },
      zadd: (_key: string, _score: number, member: string) => {
        names.push('zadd');
        operations.push(() => this.index.add(member));
        return chain;
      },
      del: (...keys: string[]) => {
        names.push('del');
        operations.push(() => keys.forEach((key) => this.hashes.delete(key)));
        return chain;
      },
      zrem: (_key: string, ...members: string[]) => {
        names.push('zrem');
        operations.push(() => members.forEach((member) => this.index.delete(member)));
        return chain;
      },
      exec: async () => {
        this.execs.push(names);
        operations.forEach((operation) => operation());
        return operations.map((): [null, string] => [null, 'OK']);
      },
    };
    return chain;
  }

  async hgetallBuffer(key: string): Promise<Record<string, Buffer>> {
    return Object.fromEntries(this.hashes.get(key) ?? new Map<string, Buffer>());
  }

  async exists(key: string): Promise<number> {
    return this.hashes.has(key) ? 1 : 0;
  }

  async zrangebylex(_key: string, min: string, max: string | Buffer): Promise<string[]> {
    const prefix = min.slice(1);
    const upper = Buffer.isBuffer(max) ? max.subarray(1).toString('latin1') : max.slice(1);
    return [...this.index].filter((member) => member.startsWith(prefix) && member < upper).sort();
  }

  async quit(): Promise<'OK'> {
    this.status = 'end';
    return 'OK';
  }
}

jest.mock('ioredis', () => ({ __esModule: true, default: jest.fn().mockImplementation(() => new MockRedis()) }));

describe('RedisBlobBackend', () => {
  let backend: RedisBlobBackend;
  let redis: MockRedis;

  beforeEach(() => {
    MockRedis.instances = [];
    backend = new RedisBlobBackend('redis://localhost:6379', '/static');
    redis = MockRedis.instances[0];
  });

  it('writes the blob and its index entry in one transaction', async () => {
    await backend.put('DEFAULT/IMAGE/a.png', Buffer.from('png'), 'image/png');

    expect(redis.execs).toEqual([['hset', 'zadd']]);
    expect(redis.index.has('DEFAULT/IMAGE/a.png')).toBe(true);
    const blob = await backend.get('DEFAULT/IMAGE/a.png');
    expect(blob).toEqual({ key: 'DEFAULT/IMAGE/a.png', content: Buffer.from('png'), mimeType: 'image/png', size: 3 });
  });

  it('returns null for unknown keys', async () => {
    await expect(backend.get('DEFAULT/IMAGE/none.png')).resolves.toBeNull();
    await expect(backend.exists('DEFAULT/IMAGE/none.png')).resolves.toBe(false);
  });

  it('lists keys by prefix from the index', async () => {
    await backend.put('DEFAULT/IMAGE/b.png', Buffer.from('b'), 'image/png');
    await backend.put('DEFAULT/IMAGE/a.png', Buffer.from('a'), 'image/png');
    await backend.put('DEFAULTS/IMAGE/c.png', Buffer.from('c'), 'image/png');

    await expect(backend.list('DEFAULT/')).resolves.toEqual(['DEFAULT/IMAGE/a.png', 'DEFAULT/IMAGE/b.png']);
  });

  it('removes a prefix together with its index entries', async () => {
    await backend.put('DEFAULT/IMAGE/a.png', Buffer.from('a'), 'image/png');
    await backend.put('DEFAULT/LOGO/logo.png', Buffer.from('l'), 'image/png');

    await expect(backend.deletePrefix('DEFAULT/')).resolves.toBe(2);
    expect([...redis.index]).toEqual([]);
    expect(redis.hashes.size).toBe(0);
    expect(REDIS_INDEX_KEY).toBe('cms:index');
  });

  it('deletes a single key', async () => {
    await backend.put('DEFAULT/IMAGE/a.png', Buffer.from('a'), 'image/png');
    await backend.delete('DEFAULT/IMAGE/a.png');

    await expect(backend.exists('DEFAULT/IMAGE/a.png')).resolves.toBe(false);
    await expect(backend.list('DEFAULT/')).resolves.toEqual([]);
  });

  it('closes an open connection on shutdown', async () => {
    redis.status = 'ready';
    await backend.onModuleDestroy();
    expect(redis.status).toBe('end');
  });
});
