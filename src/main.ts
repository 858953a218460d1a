import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import helmet from 'helmet';
import { AppModule } from './app.module';

const API_PREFIX = 'api/v1';

function corsOrigins(value: string | undefined): string[] | boolean {
  if (!value || value.trim() === '*') {
    return true;
  }
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'debug', 'log', 'verbose'],
    bufferLogs: true,
  });
  const logger = new Logger('Bootstrap');
  const configService = app.get(ConfigService);

  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));
  app.setGlobalPrefix(API_PREFIX);
  app.enableCors({ origin: corsOrigins(configService.get<string>('CORS_ORIGINS')) });
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.flushLogs();

  const port = configService.get<number>('PORT') ?? 3000;
  const host = '0.0.0.0';

  await app.listen(port, host);

  logger.log(`Application is listening on: ${await app.getUrl()}`);
  logger.debug('Debug logging is enabled');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start the application', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
