import { Injectable, CanActivate, ExecutionContext } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { AuthenticationRequiredException, PermissionDeniedException } from '../exceptions';
import { RoleName } from '../../modules/users/entities/role.entity';
import { AuthUser } from '../../modules/auth/interfaces/auth-user.interface';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const requiredRoles = this.reflector.getAllAndOverride<RoleName[]>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (!requiredRoles || requiredRoles.length === 0) {
      return true;
    }

    const { user }: { user?: AuthUser } = context.switchToHttp().getRequest();

    if (!user) {
      throw new AuthenticationRequiredException();
    }

    // Admin is granted by the staff flag alone; a profile role named Admin is not enough.
    const granted = requiredRoles.some((role) => (role === 'Admin' ? user.is_staff : user.role === role));
    if (!granted) {
      throw new PermissionDeniedException(`This action requires the ${requiredRoles.join(' or ')} role`);
    }

    return true;
  }
}
