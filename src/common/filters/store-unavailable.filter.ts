import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { StoreUnavailableError } from '../../database/store-unavailable.error';

@Catch(StoreUnavailableError)
export class StoreUnavailableFilter implements ExceptionFilter {
  private readonly logger = new Logger(StoreUnavailableFilter.name);

  catch(exception: StoreUnavailableError, host: ArgumentsHost) {
    this.logger.error(exception.message, exception.cause instanceof Error ? exception.cause.stack : undefined);

    const response = host.switchToHttp().getResponse<Response>();
    response.status(HttpStatus.SERVICE_UNAVAILABLE).json({
      statusCode: HttpStatus.SERVICE_UNAVAILABLE,
      message: 'Service temporarily unavailable, please try again later',
    });
  }
}
