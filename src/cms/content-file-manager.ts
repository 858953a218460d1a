import { Injectable, Logger } from '@nestjs/common';
import { ValidationException } from '../common/errors/service.exception';
import { BlobBackend } from './backends/blob-backend';
import {
  FOLDER_MARKER,
  assertSegment,
  fileKey,
  folderMarkerKey,
  folderSegments,
  storePrefix,
  typePrefix,
} from './cms-keys';
import { FOLDER_CONTENT_TYPES, FileContentType, InputContentFile, OutputContentFile } from './file-content-type';

/**
 * Store-scoped files (images, static files, logos) kept in the configured
 * BlobBackend. Product images go through ProductImageManager instead.
 */
@Injectable()
export class ContentFileManager {
  private readonly logger = new Logger(ContentFileManager.name);

  constructor(private readonly backend: BlobBackend) {}

  private resolveFolders(type: FileContentType, folder?: string): string[] {
    if (type === 'PRODUCT') {
      throw new ValidationException('Product images are managed per product');
    }
    const folders = folderSegments(folder);
    if (folders.length > 0 && !FOLDER_CONTENT_TYPES.includes(type)) {
      throw new ValidationException(`Files of type ${type} cannot be placed in folders`);
    }
    return folders;
  }

  async addFile(storeCode: string, file: InputContentFile): Promise<OutputContentFile> {
    const folders = this.resolveFolders(file.fileContentType, file.folder);
    const key = fileKey(storeCode, file.fileContentType, file.fileName, folders);
    await this.backend.put(key, file.content, file.mimeType);
    this.logger.log(`Stored ${key} (${file.content.length} bytes)`);
    return {
      fileName: file.fileName,
      mimeType: file.mimeType,
      fileContentType: file.fileContentType,
      folder: folders.length > 0 ? folders.join('/') : undefined,
      size: file.content.length,
      content: file.content,
      url: this.backend.publicUrl(key),
    };
  }

  async addFiles(storeCode: string, files: InputContentFile[]): Promise<OutputContentFile[]> {
    // Validate every name before the first write so a bad entry stores nothing.
    files.forEach((file) =>
      fileKey(storeCode, file.fileContentType, file.fileName, this.resolveFolders(file.fileContentType, file.folder)),
    );
    const stored: OutputContentFile[] = [];
    for (const file of files) {
      stored.push(await this.addFile(storeCode, file));
    }
    return stored;
  }

  async getFile(
    storeCode: string,
    type: FileContentType,
    fileName: string,
    folder?: string,
  ): Promise<OutputContentFile | null> {
    const folders = this.resolveFolders(type, folder);
    const key = fileKey(storeCode, type, fileName, folders);
    const blob = await this.backend.get(key);
    if (!blob) {
      return null;
    }
    return {
      fileName,
      mimeType: blob.mimeType,
      fileContentType: type,
      folder: folders.length > 0 ? folders.join('/') : undefined,
      size: blob.size,
      content: blob.content,
      url: this.backend.publicUrl(key),
    };
  }

  async getFiles(storeCode: string, type: FileContentType, folder?: string): Promise<OutputContentFile[]> {
    const names = await this.getFileNames(storeCode, type, folder);
    const files: OutputContentFile[] = [];
    for (const name of names) {
      const file = await this.getFile(storeCode, type, name, folder);
      if (file) files.push(file);
    }
    return files;
  }

  /** Names of the files directly inside the folder; sub-folders and markers are skipped. */
  async getFileNames(storeCode: string, type: FileContentType, folder?: string): Promise<string[]> {
    const prefix = typePrefix(storeCode, type, this.resolveFolders(type, folder));
    const keys = await this.backend.list(prefix);
    return keys
      .map((key) => key.slice(prefix.length))
      .filter((rest) => rest.length > 0 && !rest.includes('/') && rest !== FOLDER_MARKER);
  }

  async removeFile(storeCode: string, type: FileContentType, fileName: string, folder?: string): Promise<void> {
    const key = fileKey(storeCode, type, fileName, this.resolveFolders(type, folder));
    await this.backend.delete(key);
    this.logger.log(`Removed ${key}`);
  }

  /** Removes every file of the store, product images included. */
  async removeFiles(storeCode: string): Promise<number> {
    const removed = await this.backend.deletePrefix(storePrefix(storeCode));
    this.logger.log(`Removed ${removed} file(s) of store ${storeCode}`);
    return removed;
  }

  async addFolder(storeCode: string, type: FileContentType, folder: string): Promise<void> {
    const folders = this.resolveFolders(type, folder);
    if (folders.length === 0) {
      throw new ValidationException('Folder name is required');
    }
    await this.backend.put(folderMarkerKey(storeCode, type, folders), Buffer.alloc(0), 'application/x-directory');
  }

  /** Names of the folders directly below `parent` (or the type root). */
  async listFolders(storeCode: string, type: FileContentType, parent?: string): Promise<string[]> {
    const prefix = typePrefix(storeCode, type, this.resolveFolders(type, parent));
    const keys = await this.backend.list(prefix);
    const folders = new Set<string>();
    for (const key of keys) {
      const rest = key.slice(prefix.length);
      const separator = rest.indexOf('/');
      if (separator > 0) folders.add(rest.slice(0, separator));
    }
    return [...folders].sort();
  }

  /** Deletes the folder with everything below it. */
  async removeFolder(storeCode: string, type: FileContentType, folder: string): Promise<number> {
    const folders = this.resolveFolders(type, folder);
    if (folders.length === 0) {
      throw new ValidationException('Folder name is required');
    }
    const removed = await this.backend.deletePrefix(typePrefix(storeCode, type, folders));
    this.logger.log(`Removed folder ${folders.join('/')} of ${storeCode} (${removed} object(s))`);
    return removed;
  }

  fileUrl(storeCode: string, type: FileContentType, fileName: string, folder?: string): string {
    return this.backend.publicUrl(fileKey(storeCode, type, assertSegment(fileName, 'file name'), this.resolveFolders(type, folder)));
  }
}
