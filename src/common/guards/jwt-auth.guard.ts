import { ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthGuard } from '@nestjs/passport';
import { lastValueFrom, Observable } from 'rxjs';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { AuthenticationRequiredException } from '../exceptions';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  constructor(private readonly reflector: Reflector) {
    super();
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);

    if (!isPublic) {
      return this.authenticate(context);
    }

    const request = context.switchToHttp().getRequest<{ headers: Record<string, string | undefined> }>();
    if (!request.headers.authorization) {
      return true;
    }

    try {
      return await this.authenticate(context);
    } catch {
      // A bad token on a public route leaves the caller anonymous.
      return true;
    }
  }

  handleRequest<TUser>(err: unknown, user: TUser | false): TUser {
    if (err) {
      throw err;
    }
    if (!user) {
      throw new AuthenticationRequiredException();
    }
    return user;
  }

  private async authenticate(context: ExecutionContext): Promise<boolean> {
    const result = super.canActivate(context);
    return result instanceof Observable ? lastValueFrom(result) : result;
  }
}
