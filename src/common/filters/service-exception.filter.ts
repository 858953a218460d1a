import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { ServiceException } from '../errors/service.exception';

export interface ServiceErrorBody {
  statusCode: number;
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

@Catch(ServiceException)
export class ServiceExceptionFilter implements ExceptionFilter<ServiceException> {
  private readonly logger = new Logger(ServiceExceptionFilter.name);

  catch(exception: ServiceException, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.code}: ${exception.message}`, exception.stack);
    } else {
      this.logger.warn(`${exception.code}: ${exception.message}`);
    }

    const body: ServiceErrorBody = {
      statusCode: exception.status,
      error: exception.code,
      message: exception.message,
    };
    if (exception.details) {
      body.details = exception.details;
    }
    response.status(exception.status).json(body);
  }
}
