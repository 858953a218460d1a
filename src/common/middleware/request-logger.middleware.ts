import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

@Injectable()
export class RequestLoggerMiddleware implements NestMiddleware {
  private readonly logger = new Logger('RequestLogger');

  use(req: Request, res: Response, next: NextFunction) {
    const startTime = Date.now();
    const { method, originalUrl, headers } = req;
    const requestId = uuidv4().slice(0, 8);

    this.logger.log(
      `[${requestId}] [${method}] ${originalUrl}` +
        ` UA: ${headers['user-agent'] ?? 'unknown'}` +
        ` Auth: ${headers.authorization ? 'Bearer ***' : 'none'}`,
    );

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      const line = `[${requestId}] [${method}] ${originalUrl} - Status: ${res.statusCode} - Duration: ${duration}ms`;
      if (res.statusCode >= 500) {
        this.logger.error(line);
      } else if (res.statusCode >= 400) {
        this.logger.warn(line);
      } else {
        this.logger.log(line);
      }
    });

    next();
  }
}
