import { ValidationPipe } from '@nestjs/common';
import { validationExceptionFactory } from './validation-failed.exception';

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: validationExceptionFactory,
  });
}
