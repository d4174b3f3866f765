import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { RolesGuard } from './roles.guard';
import { Roles } from '../decorators/roles.decorator';
import { AuthenticationRequiredException, PermissionDeniedException } from '../exceptions';
import { AuthUser } from '../../modules/auth/interfaces/auth-user.interface';

class GuardedController {
  @Roles('Admin')
  purge(): void {}

  @Roles('Teacher')
  createCourse(): void {}

  open(): void {}
}

function caller(overrides: Partial<AuthUser> = {}): AuthUser {
  return { sub: 'user-1', email: 'user@example.com', role: 'Student', is_staff: false, ...overrides };
}

function contextFor(handler: () => void, user?: AuthUser): ExecutionContextHost {
  return new ExecutionContextHost([{ user }], GuardedController, handler);
}

describe('RolesGuard', () => {
  const guard = new RolesGuard(new Reflector());
  const { purge, createCourse, open } = GuardedController.prototype;

  it('lets any caller through routes without a role requirement', () => {
    expect(guard.canActivate(contextFor(open, caller()))).toBe(true);
  });

  it('requires an authenticated caller on role-protected routes', () => {
    expect(() => guard.canActivate(contextFor(purge))).toThrow(AuthenticationRequiredException);
  });

  it('refuses Admin routes to a non-staff account whose profile role is Admin', () => {
    expect(() => guard.canActivate(contextFor(purge, caller({ role: 'Admin' })))).toThrow(PermissionDeniedException);
  });

  it('opens Admin routes to staff accounts', () => {
    expect(guard.canActivate(contextFor(purge, caller({ role: null, is_staff: true })))).toBe(true);
  });

  it('matches other roles against the profile role', () => {
    expect(guard.canActivate(contextFor(createCourse, caller({ role: 'Teacher' })))).toBe(true);
    expect(() => guard.canActivate(contextFor(createCourse, caller({ role: 'Student' })))).toThrow(
      PermissionDeniedException,
    );
  });
});
