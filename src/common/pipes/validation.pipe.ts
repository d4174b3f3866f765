import { Injectable, ValidationError, ValidationPipe as NestValidationPipe } from '@nestjs/common';
import { FieldErrors, ValidationFailedException } from '../exceptions';

export function flattenValidationErrors(errors: ValidationError[], parent?: string): FieldErrors {
  const result: FieldErrors = {};

  for (const error of errors) {
    const path = parent ? `${parent}.${error.property}` : error.property;

    if (error.constraints) {
      result[path] = Object.values(error.constraints);
    }
    if (error.children && error.children.length > 0) {
      Object.assign(result, flattenValidationErrors(error.children, path));
    }
  }

  return result;
}

/**
 * Global validation pipe: strips unknown properties, converts primitives and
 * reports failures field by field.
 */
@Injectable()
export class ValidationPipe extends NestValidationPipe {
  constructor() {
    super({
      whitelist: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
      exceptionFactory: (errors: ValidationError[]) =>
        new ValidationFailedException('Validation failed', flattenValidationErrors(errors)),
    });
  }
}
