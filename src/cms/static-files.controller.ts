import { Controller, Get, Logger, Param, Query, Res } from '@nestjs/common';
import { Response } from 'express';
import { EntityNotFoundException } from '../common/errors/service.exception';
import { BlobBackend } from './backends/blob-backend';
import { assertSegment, folderSegments } from './cms-keys';

/**
 * Serves stored content for the backends without a public URL of their own
 * (local disk, Redis, memory). Paths mirror the storage key layout:
 * `static/{store}/{TYPE}/{folders...}/{fileName}`.
 */
@Controller('static')
export class StaticFilesController {
  private readonly logger = new Logger(StaticFilesController.name);

  constructor(private readonly backend: BlobBackend) {}

  @Get('*')
  async serve(@Param('0') path: string, @Query('folder') folder: string | undefined, @Res() res: Response): Promise<void> {
    const segments = path.split('/').map((segment) => assertSegment(segment, 'path segment'));
    if (folder && segments.length >= 3) {
      // `static/{store}/{TYPE}/{fileName}?folder=a/b` addresses the same key as the nested path.
      segments.splice(segments.length - 1, 0, ...folderSegments(folder));
    }
    const key = segments.join('/');
    const blob = await this.backend.get(key);
    if (!blob) {
      throw new EntityNotFoundException('File', key);
    }
    this.logger.debug(`Serving ${key}`);
    res.setHeader('Content-Type', blob.mimeType);
    res.setHeader('Content-Length', blob.size);
    res.setHeader('Cache-Control', 'public, max-age=3600');
    res.send(blob.content);
  }
}
