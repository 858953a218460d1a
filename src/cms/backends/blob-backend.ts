import { CmsMethod } from '../../config/env.validation';

export interface StoredBlob {
  key: string;
  content: Buffer;
  mimeType: string;
  size: number;
}

/**
 * Key/value object store behind the CMS. Keys are slash separated; listing
 * by prefix is complete (implementations follow pagination themselves).
 */
export abstract class BlobBackend {
  abstract readonly method: CmsMethod;

  abstract put(key: string, content: Buffer, mimeType: string): Promise<void>;
  abstract get(key: string): Promise<StoredBlob | null>;
  abstract exists(key: string): Promise<boolean>;
  /** Every key starting with `prefix`, sorted. */
  abstract list(prefix: string): Promise<string[]>;
  abstract delete(key: string): Promise<void>;
  /** Removes every key starting with `prefix` and returns how many were removed. */
  abstract deletePrefix(prefix: string): Promise<number>;
  abstract publicUrl(key: string): string;
}

export function staticUrl(baseUrl: string, key: string): string {
  const path = key.split('/').map(encodeURIComponent).join('/');
  return `${baseUrl.replace(/\/+$/, '')}/${path}`;
}
