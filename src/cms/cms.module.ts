import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CmsMethod } from '../config/env.validation';
import { BlobBackend } from './backends/blob-backend';
import { GcsBlobBackend } from './backends/gcs-blob.backend';
import { LocalBlobBackend } from './backends/local-blob.backend';
import { MemoryBlobBackend } from './backends/memory-blob.backend';
import { RedisBlobBackend } from './backends/redis-blob.backend';
import { S3BlobBackend } from './backends/s3-blob.backend';
import { ContentFileManager } from './content-file-manager';
import { ImageResizer } from './image-resizer';
import { ProductImageManager } from './product-image-manager';
import { StaticFilesController } from './static-files.controller';

function required(configService: ConfigService, name: string): string {
  const value = configService.get<string>(name);
  if (!value) {
    throw new Error(`${name} must be set for the configured CMS_METHOD`);
  }
  return value;
}

export function createBlobBackend(configService: ConfigService): BlobBackend {
  const method = configService.get<CmsMethod>('CMS_METHOD') ?? 'local';
  const staticUrl = configService.get<string>('CMS_STATIC_URL') ?? '/api/v1/static';
  new Logger('CmsModule').log(`Content storage method: ${method}`);
  switch (method) {
    case 'aws':
      return new S3BlobBackend({
        bucket: required(configService, 'AWS_BUCKET'),
        region: required(configService, 'AWS_REGION'),
        accessKeyId: configService.get<string>('AWS_ACCESS_KEY_ID'),
        secretAccessKey: configService.get<string>('AWS_SECRET_ACCESS_KEY'),
        endpoint: configService.get<string>('AWS_ENDPOINT'),
      });
    case 'gcp':
      return new GcsBlobBackend({
        projectId: required(configService, 'GCP_PROJECT_ID'),
        bucket: required(configService, 'GCP_BUCKET'),
        keyFilename: configService.get<string>('GCP_KEY_FILENAME'),
      });
    case 'redis':
      return new RedisBlobBackend(configService.get<string>('REDIS_URL') ?? 'redis://localhost:6379', staticUrl);
    case 'memory':
      return new MemoryBlobBackend(staticUrl);
    case 'local':
      return new LocalBlobBackend(configService.get<string>('CMS_LOCAL_ROOT') ?? './files', staticUrl);
  }
}

@Module({
  controllers: [StaticFilesController],
  providers: [
    { provide: BlobBackend, useFactory: createBlobBackend, inject: [ConfigService] },
    ImageResizer,
    ContentFileManager,
    ProductImageManager,
  ],
  exports: [BlobBackend, ContentFileManager, ProductImageManager],
})
export class CmsModule {}
