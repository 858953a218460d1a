import { BlobBackend, StoredBlob, staticUrl } from './blob-backend';

interface MemoryEntry {
  content: Buffer;
  mimeType: string;
}

/** Process-local store for `CMS_METHOD=memory`; contents vanish on restart. */
export class MemoryBlobBackend extends BlobBackend {
  readonly method = 'memory';
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly baseUrl: string) {
    super();
  }

  async put(key: string, content: Buffer, mimeType: string): Promise<void> {
    this.entries.set(key, { content: Buffer.from(content), mimeType });
  }

  async get(key: string): Promise<StoredBlob | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    return { key, content: Buffer.from(entry.content), mimeType: entry.mimeType, size: entry.content.length };
  }

  async exists(key: string): Promise<boolean> {
    return this.entries.has(key);
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.entries.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async deletePrefix(prefix: string): Promise<number> {
    const keys = await this.list(prefix);
    keys.forEach((key) => this.entries.delete(key));
    return keys.length;
  }

  publicUrl(key: string): string {
    return staticUrl(this.baseUrl, key);
  }
}
