import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { CrawlPrimeError } from '../errors/crawl-prime.errors';

/**
 * Translates the CrawlPrime taxonomy into HTTP responses:
 * ValidationError → 400, JobNotFoundError → 404, CollaboratorUnavailableError → 503.
 * Nest's own HttpExceptions are handled by the default filter.
 */
@Catch(CrawlPrimeError)
export class CrawlPrimeExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(CrawlPrimeExceptionFilter.name);

  catch(exception: CrawlPrimeError, host: ArgumentsHost): void {
    if (host.getType() !== 'http') {
      throw exception;
    }

    const response = host.switchToHttp().getResponse<Response>();

    if (exception.statusCode >= 500) {
      this.logger.error(
        `${exception.code}: ${exception.message}`,
        exception.stack,
      );
    } else {
      this.logger.warn(`${exception.code}: ${exception.message}`);
    }

    response.status(exception.statusCode).json({
      statusCode: exception.statusCode,
      error: exception.code,
      message: exception.message,
    });
  }
}
