import { Injectable, Logger } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { JwtPayload, requireJwtSecret } from '../../../config/jwt.config';
import { UsersService } from '../../users/services/users.service';
import { AuthUser } from '../interfaces/auth-user.interface';
import { AuthenticationRequiredException } from '../../../common/exceptions';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private usersService: UsersService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: requireJwtSecret(configService),
    });
  }

  /**
   * Loads the account and its role once; the result becomes `request.user`.
   */
  async validate(payload: JwtPayload): Promise<AuthUser> {
    if (!payload?.sub) {
      Logger.warn('JWT payload missing sub', JwtStrategy.name);
      throw new AuthenticationRequiredException('Invalid token');
    }

    const user = await this.usersService.findAuthUser(payload.sub);
    if (!user) {
      Logger.warn(`User not found or inactive for sub=${payload.sub}`, JwtStrategy.name);
      throw new AuthenticationRequiredException('Invalid token');
    }

    return user;
  }
}
