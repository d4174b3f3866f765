import { ValidationError } from '@nestjs/common';
import { flattenValidationErrors } from './validation.pipe';

function fieldError(property: string, constraints?: Record<string, string>, children: ValidationError[] = []): ValidationError {
  return { property, constraints, children };
}

describe('flattenValidationErrors', () => {
  it('keys messages by field path', () => {
    const errors = [
      fieldError('email', { isEmail: 'email must be an email' }),
      fieldError('profile', undefined, [fieldError('country', { maxLength: 'country is too long' })]),
    ];

    expect(flattenValidationErrors(errors)).toEqual({
      email: ['email must be an email'],
      'profile.country': ['country is too long'],
    });
  });
});
