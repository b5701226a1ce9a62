import { ApiError } from '../api/client';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Something went wrong';
}

export function fieldErrorOf(error: unknown, fieldName: string): string | undefined {
  return error instanceof ApiError ? error.fieldError(fieldName) : undefined;
}
