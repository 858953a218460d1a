import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import sharp from 'sharp';
import { ValidationException } from '../common/errors/service.exception';
import { errorMessage } from '../common/utils/errors';
import { ProductImageSize } from './file-content-type';

@Injectable()
export class ImageResizer {
  private readonly logger = new Logger(ImageResizer.name);
  private readonly boxes: Record<ProductImageSize, number>;

  constructor(configService: ConfigService) {
    this.boxes = {
      SMALL: configService.get<number>('SMALL_IMAGE_SIZE') ?? 350,
      LARGE: configService.get<number>('LARGE_IMAGE_SIZE') ?? 900,
    };
  }

  boxFor(size: ProductImageSize): number {
    return this.boxes[size];
  }

  /**
   * Fits the image inside a square box of the given rendition size, keeping
   * its aspect ratio and format. Smaller images keep their dimensions.
   */
  async resize(content: Buffer, size: ProductImageSize): Promise<Buffer> {
    const box = this.boxes[size];
    try {
      return await sharp(content)
        .rotate()
        .resize({ width: box, height: box, fit: 'inside', withoutEnlargement: true })
        .toBuffer();
    } catch (error) {
      this.logger.warn(`Could not resize image to ${size}: ${errorMessage(error)}`);
      throw new ValidationException(`Unreadable image: ${errorMessage(error)}`);
    }
  }
}
