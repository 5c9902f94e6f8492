import { ExceptionFilter, Catch, ArgumentsHost, Logger } from '@nestjs/common';
import { Response } from 'express';
import { TollgateError } from './tollgate-error';

@Catch(TollgateError)
export class TollgateErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(TollgateErrorFilter.name);

  catch(exception: TollgateError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();

    const stack =
      exception.originalError instanceof Error
        ? exception.originalError.stack
        : undefined;

    if (exception.httpStatusCode >= 500) {
      this.logger.error(`${exception.code}: ${exception.message}`, stack);
    } else {
      this.logger.warn(`${exception.code}: ${exception.message}`);
    }

    for (const [name, value] of Object.entries(exception.headers)) {
      response.setHeader(name, value);
    }

    response.status(exception.httpStatusCode).json(exception.toJSON());
  }
}
