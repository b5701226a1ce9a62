export interface FieldError {
  field_name: string;
  error_code: string;
  message: string;
}

export interface ErrorResponseDto {
  status_code: number;
  error_code: string;
  message: string;
  errors?: FieldError[];
}
