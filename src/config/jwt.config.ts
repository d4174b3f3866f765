import { JwtModuleOptions } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { RoleName } from '../modules/users/entities/role.entity';

export const requireJwtSecret = (configService: ConfigService): string => {
  const secret = configService.get<string>('JWT_SECRET');
  if (!secret) {
    throw new Error('JWT_SECRET is not set');
  }
  return secret;
};

export const getJwtConfig = (configService: ConfigService): JwtModuleOptions => {
  return {
    secret: requireJwtSecret(configService),
    signOptions: {
      expiresIn: configService.get<string>('JWT_EXPIRES_IN') || '1d',
    },
  };
};

export interface JwtRefreshOptions {
  secret: string;
  expiresIn: string;
}

export const getJwtRefreshConfig = (configService: ConfigService): JwtRefreshOptions => {
  const secret = configService.get<string>('JWT_REFRESH_SECRET');
  if (!secret) {
    throw new Error('JWT_REFRESH_SECRET is not set');
  }
  return {
    secret,
    expiresIn: configService.get<string>('JWT_REFRESH_EXPIRES_IN') || '7d',
  };
};

export interface JwtPayload {
  sub: string; // user ID
  email: string;
  role: RoleName | null;
  iat?: number;
  exp?: number;
}

export interface JwtRefreshPayload {
  sub: string; // user ID
  type: 'refresh';
  iat?: number;
  exp?: number;
}

export default getJwtConfig;
