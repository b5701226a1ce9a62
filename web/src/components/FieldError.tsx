import React from 'react';
import { fieldErrorOf } from './errors';

interface FieldErrorProps {
  error: unknown;
  field: string;
}

const FieldError: React.FC<FieldErrorProps> = ({ error, field }) => {
  const message = fieldErrorOf(error, field);
  return message ? <span className="field-error">{message}</span> : null;
};

export default FieldError;
