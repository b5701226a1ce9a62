import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { ErrorResponseDto } from '../dto/error-response.dto';
import { ValidationFailedException } from '../validation/validation-failed.exception';

/**
 * Renders every error as an {@link ErrorResponseDto}.
 *
 * HttpExceptions keep their status; the error code is the exception class
 * name without its `Exception` suffix (`NotFoundException` -> `NotFound`).
 * Anything else is logged and reported as a 500.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = this.toErrorResponse(exception);
    response.status(body.status_code).json(body);
  }

  toErrorResponse(exception: unknown): ErrorResponseDto {
    if (exception instanceof ValidationFailedException) {
      return {
        status_code: exception.getStatus(),
        error_code: 'ValidationFailed',
        message: exception.message,
        errors: exception.fieldErrors,
      };
    }

    if (exception instanceof HttpException) {
      return {
        status_code: exception.getStatus(),
        error_code: errorCodeOf(exception),
        message: messageOf(exception),
      };
    }

    const stack = exception instanceof Error ? exception.stack : String(exception);
    this.logger.error('Unhandled error', stack);

    return {
      status_code: HttpStatus.INTERNAL_SERVER_ERROR,
      error_code: 'InternalServerError',
      message: 'Internal server error',
    };
  }
}

function errorCodeOf(exception: HttpException): string {
  const name = exception.constructor.name;
  if (name === HttpException.name) {
    return 'HttpError';
  }
  return name.endsWith('Exception') ? name.slice(0, -'Exception'.length) : name;
}

function messageOf(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return response;
  }
  if ('message' in response) {
    const { message } = response;
    if (Array.isArray(message)) {
      return message.join('; ');
    }
    if (typeof message === 'string') {
      return message;
    }
  }
  return exception.message;
}
