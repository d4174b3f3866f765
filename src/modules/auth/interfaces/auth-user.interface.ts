import { RoleName } from '../../users/entities/role.entity';
import { AuthenticationRequiredException } from '../../../common/exceptions';

/**
 * Caller identity attached to the request by JwtStrategy.
 * The role is resolved once per request and never re-queried.
 */
export interface AuthUser {
  sub: string;
  email: string;
  role: RoleName | null;
  is_staff: boolean;
}

/** Narrows the caller on routes the global JWT guard protects. */
export function requireUser(user: AuthUser | null): AuthUser {
  if (!user) {
    throw new AuthenticationRequiredException();
  }
  return user;
}
