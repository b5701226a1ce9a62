import {
  BadRequestException,
  ConflictException,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { ValidationFailedException } from '../validation/validation-failed.exception';
import { ApiExceptionFilter } from './api-exception.filter';

describe('ApiExceptionFilter', () => {
  const filter = new ApiExceptionFilter();

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should name the error after the exception class', () => {
    expect(
      filter.toErrorResponse(new ConflictException('Email already registered')),
    ).toEqual({
      status_code: 409,
      error_code: 'Conflict',
      message: 'Email already registered',
    });
  });

  it('should join message arrays', () => {
    expect(
      filter.toErrorResponse(new BadRequestException(['first', 'second'])),
    ).toEqual({
      status_code: 400,
      error_code: 'BadRequest',
      message: 'first; second',
    });
  });

  it('should use HttpError for a bare HttpException', () => {
    expect(
      filter.toErrorResponse(new HttpException('Teapot', HttpStatus.I_AM_A_TEAPOT)),
    ).toEqual({
      status_code: 418,
      error_code: 'HttpError',
      message: 'Teapot',
    });
  });

  it('should include field errors for validation failures', () => {
    const errors = [
      { field_name: 'cost', error_code: 'Positive', message: 'cost must be a positive number' },
    ];

    expect(filter.toErrorResponse(new ValidationFailedException(errors))).toEqual({
      status_code: 400,
      error_code: 'ValidationFailed',
      message: 'cost must be a positive number',
      errors,
    });
  });

  it('should hide and log unexpected errors', () => {
    const logSpy = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);

    expect(filter.toErrorResponse(new Error('connection refused'))).toEqual({
      status_code: 500,
      error_code: 'InternalServerError',
      message: 'Internal server error',
    });
    expect(logSpy).toHaveBeenCalledTimes(1);
  });
});
