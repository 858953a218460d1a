import { Injectable, Logger } from '@nestjs/common';
import { ValidationException } from '../common/errors/service.exception';
import { BlobBackend } from './backends/blob-backend';
import { productImageKey, productPrefix } from './cms-keys';
import { ImageResizer } from './image-resizer';
import { OutputContentFile, PRODUCT_IMAGE_SIZES, ProductImageSize, isImageMimeType } from './file-content-type';

export interface ProductImageUpload {
  fileName: string;
  mimeType: string;
  content: Buffer;
}

export interface StoredProductImage {
  fileName: string;
  mimeType: string;
  urls: Record<ProductImageSize, string>;
}

/** Product pictures, kept as one SMALL and one LARGE rendition per file name. */
@Injectable()
export class ProductImageManager {
  private readonly logger = new Logger(ProductImageManager.name);

  constructor(
    private readonly backend: BlobBackend,
    private readonly resizer: ImageResizer,
  ) {}

  async addProductImage(storeCode: string, sku: string, image: ProductImageUpload): Promise<StoredProductImage> {
    if (!isImageMimeType(image.mimeType)) {
      throw new ValidationException(`Unsupported image type ${image.mimeType}`);
    }
    const keys = {
      SMALL: productImageKey(storeCode, sku, 'SMALL', image.fileName),
      LARGE: productImageKey(storeCode, sku, 'LARGE', image.fileName),
    };
    const renditions: Array<[ProductImageSize, Buffer]> = [];
    for (const size of PRODUCT_IMAGE_SIZES) {
      renditions.push([size, await this.resizer.resize(image.content, size)]);
    }
    try {
      for (const [size, rendition] of renditions) {
        await this.backend.put(keys[size], rendition, image.mimeType);
      }
    } catch (error) {
      await this.removeProductImage(storeCode, sku, image.fileName);
      throw error;
    }
    this.logger.log(`Stored image ${image.fileName} for ${storeCode}/${sku}`);
    return {
      fileName: image.fileName,
      mimeType: image.mimeType,
      urls: { SMALL: this.backend.publicUrl(keys.SMALL), LARGE: this.backend.publicUrl(keys.LARGE) },
    };
  }

  async getProductImage(
    storeCode: string,
    sku: string,
    fileName: string,
    size: ProductImageSize,
  ): Promise<OutputContentFile | null> {
    const key = productImageKey(storeCode, sku, size, fileName);
    const blob = await this.backend.get(key);
    if (!blob) {
      return null;
    }
    return {
      fileName,
      mimeType: blob.mimeType,
      fileContentType: 'PRODUCT',
      folder: `${sku}/${size}`,
      size: blob.size,
      content: blob.content,
      url: this.backend.publicUrl(key),
    };
  }

  /** File names of every image of the product, each listed once. */
  async getProductImages(storeCode: string, sku: string): Promise<string[]> {
    const prefix = productPrefix(storeCode, sku);
    const keys = await this.backend.list(prefix);
    const names = new Set<string>();
    for (const key of keys) {
      const [size, fileName] = key.slice(prefix.length).split('/');
      if (fileName && PRODUCT_IMAGE_SIZES.some((known) => known === size)) names.add(fileName);
    }
    return [...names].sort();
  }

  async removeProductImage(storeCode: string, sku: string, fileName: string): Promise<void> {
    for (const size of PRODUCT_IMAGE_SIZES) {
      await this.backend.delete(productImageKey(storeCode, sku, size, fileName));
    }
    this.logger.log(`Removed image ${fileName} of ${storeCode}/${sku}`);
  }

  async removeProductImages(storeCode: string, sku: string): Promise<number> {
    return this.backend.deletePrefix(productPrefix(storeCode, sku));
  }

  imageUrl(storeCode: string, sku: string, fileName: string, size: ProductImageSize): string {
    return this.backend.publicUrl(productImageKey(storeCode, sku, size, fileName));
  }
}
