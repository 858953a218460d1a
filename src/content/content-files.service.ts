import { Injectable, Logger } from '@nestjs/common';
import { ContentFileManager } from '../cms/content-file-manager';
import { FileContentType, isFileContentType, OutputContentFile } from '../cms/file-content-type';
import { EntityNotFoundException, ValidationException } from '../common/errors/service.exception';
import { MerchantStoresService } from '../merchant-stores/merchant-stores.service';
import { ReadableContentFile } from './entities/content.entity';

export interface ContentFileUpload {
  fileName: string;
  mimeType: string;
  content: Buffer;
}

export function parseFileContentType(value: string): FileContentType {
  const type = value.toUpperCase();
  if (!isFileContentType(type)) {
    throw new ValidationException(`Unknown file type ${value}`);
  }
  return type;
}

/** Store files of the content section, kept through the CMS. */
@Injectable()
export class ContentFilesService {
  private readonly logger = new Logger(ContentFilesService.name);

  constructor(
    private readonly contentFileManager: ContentFileManager,
    private readonly merchantStoresService: MerchantStoresService,
  ) {}

  async upload(
    storeCode: string,
    type: FileContentType,
    upload: ContentFileUpload,
    folder?: string,
  ): Promise<ReadableContentFile> {
    await this.merchantStoresService.findByCode(storeCode);
    const file = await this.contentFileManager.addFile(storeCode, {
      fileName: upload.fileName,
      mimeType: upload.mimeType,
      fileContentType: type,
      content: upload.content,
      folder,
    });
    return this.toReadable(file);
  }

  async list(storeCode: string, type: FileContentType, folder?: string): Promise<ReadableContentFile[]> {
    await this.merchantStoresService.findByCode(storeCode);
    const files = await this.contentFileManager.getFiles(storeCode, type, folder);
    return files.map((file) => this.toReadable(file));
  }

  async download(storeCode: string, type: FileContentType, fileName: string, folder?: string): Promise<OutputContentFile> {
    const file = await this.contentFileManager.getFile(storeCode, type, fileName, folder);
    if (!file) {
      throw new EntityNotFoundException('ContentFile', folder ? `${folder}/${fileName}` : fileName);
    }
    return file;
  }

  async remove(storeCode: string, type: FileContentType, fileName: string, folder?: string): Promise<void> {
    await this.download(storeCode, type, fileName, folder);
    await this.contentFileManager.removeFile(storeCode, type, fileName, folder);
  }

  async addFolder(storeCode: string, type: FileContentType, folder: string): Promise<string[]> {
    await this.merchantStoresService.findByCode(storeCode);
    await this.contentFileManager.addFolder(storeCode, type, folder);
    this.logger.log(`Created folder ${folder} in ${storeCode}/${type}`);
    const separator = folder.lastIndexOf('/');
    return this.contentFileManager.listFolders(storeCode, type, separator > 0 ? folder.slice(0, separator) : undefined);
  }

  async listFolders(storeCode: string, type: FileContentType, parent?: string): Promise<string[]> {
    await this.merchantStoresService.findByCode(storeCode);
    return this.contentFileManager.listFolders(storeCode, type, parent);
  }

  async removeFolder(storeCode: string, type: FileContentType, folder: string): Promise<number> {
    await this.merchantStoresService.findByCode(storeCode);
    return this.contentFileManager.removeFolder(storeCode, type, folder);
  }

  private toReadable(file: OutputContentFile): ReadableContentFile {
    return {
      fileName: file.fileName,
      mimeType: file.mimeType,
      fileContentType: file.fileContentType,
      folder: file.folder ?? null,
      size: file.size,
      url: file.url,
    };
  }
}
