import { BadRequestException } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { FieldError } from '../dto/error-response.dto';

export class ValidationFailedException extends BadRequestException {
  constructor(readonly fieldErrors: FieldError[]) {
    super(fieldErrors.length > 0 ? fieldErrors[0].message : 'Validation failed');
  }
}

/**
 * Flattens nested class-validator errors into one entry per failed
 * constraint. Nested properties are reported with a dotted path.
 */
export function toFieldErrors(
  errors: ValidationError[],
  parentPath?: string,
): FieldError[] {
  const fieldErrors: FieldError[] = [];

  for (const error of errors) {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;

    for (const [constraint, message] of Object.entries(error.constraints ?? {})) {
      fieldErrors.push({
        field_name: path,
        error_code: toErrorCode(constraint),
        message,
      });
    }

    if (error.children && error.children.length > 0) {
      fieldErrors.push(...toFieldErrors(error.children, path));
    }
  }

  return fieldErrors;
}

// isNotEmpty -> NotEmpty, whitelistValidation -> WhitelistValidation
function toErrorCode(constraint: string): string {
  const name = constraint.startsWith('is') && constraint.length > 2
    ? constraint.slice(2)
    : constraint;
  return name.charAt(0).toUpperCase() + name.slice(1);
}

export function validationExceptionFactory(
  errors: ValidationError[],
): ValidationFailedException {
  return new ValidationFailedException(toFieldErrors(errors));
}
