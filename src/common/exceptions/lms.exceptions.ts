import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';

/**
 * Domain exceptions. Each carries an `errorCode` that ErrorTrackingFilter
 * copies into the response body.
 */

export type FieldErrors = Record<string, string[]>;

export class ValidationFailedException extends BadRequestException {
  constructor(message: string, details?: FieldErrors) {
    super({ message, errorCode: 'VALIDATION_ERROR', details });
  }
}

export class AuthenticationRequiredException extends UnauthorizedException {
  constructor(message = 'Authentication credentials were not provided') {
    super({ message, errorCode: 'AUTHENTICATION_REQUIRED' });
  }
}

export class InvalidCredentialsException extends UnauthorizedException {
  constructor(message = 'Invalid credentials') {
    super({ message, errorCode: 'INVALID_CREDENTIALS' });
  }
}

export class PermissionDeniedException extends ForbiddenException {
  constructor(message = 'Permission denied') {
    super({ message, errorCode: 'PERMISSION_DENIED' });
  }
}

export class AccessDeniedException extends ForbiddenException {
  constructor(message = 'Access denied') {
    super({ message, errorCode: 'ACCESS_DENIED' });
  }
}

export class NotAStudentException extends ForbiddenException {
  constructor() {
    super({ message: 'Only students can enroll in courses', errorCode: 'NOT_A_STUDENT' });
  }
}

export class NotEnrolledException extends ForbiddenException {
  constructor(message = 'You are not enrolled in this course') {
    super({ message, errorCode: 'NOT_ENROLLED' });
  }
}

export class ResourceNotFoundException extends NotFoundException {
  constructor(resource: string) {
    super({ message: `${resource} not found`, errorCode: 'NOT_FOUND' });
  }
}

export class AlreadyEnrolledException extends ConflictException {
  constructor() {
    super({ message: 'Already enrolled in this course', errorCode: 'ALREADY_ENROLLED' });
  }
}

export class CourseFullException extends ConflictException {
  constructor() {
    super({ message: 'Course is full', errorCode: 'COURSE_FULL' });
  }
}

export class DuplicateReviewException extends ConflictException {
  constructor() {
    super({ message: 'You have already reviewed this course', errorCode: 'DUPLICATE_REVIEW' });
  }
}

export class EmailAlreadyRegisteredException extends ConflictException {
  constructor() {
    super({ message: 'A user with this email already exists', errorCode: 'EMAIL_ALREADY_REGISTERED' });
  }
}

export class DuplicateOrderException extends ConflictException {
  constructor(parent: string) {
    super({ message: `Another item in this ${parent} already uses that order`, errorCode: 'CONFLICT' });
  }
}

export class TokenNotFoundException extends BadRequestException {
  constructor() {
    super({ message: 'Invalid token', errorCode: 'TOKEN_NOT_FOUND' });
  }
}

export class TokenExpiredException extends BadRequestException {
  constructor() {
    super({ message: 'Token has expired', errorCode: 'TOKEN_EXPIRED' });
  }
}

export class TokenAlreadyUsedException extends ConflictException {
  constructor() {
    super({ message: 'Token has already been used', errorCode: 'TOKEN_ALREADY_USED' });
  }
}

export class DuplicateCategoryException extends ConflictException {
  constructor() {
    super({ message: 'A category with this title already exists', errorCode: 'CONFLICT' });
  }
}
