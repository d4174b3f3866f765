import { ConfigService } from '@nestjs/config';

export interface BootstrapAdminConfig {
  email: string;
  password: string;
}

/**
 * Credentials of the staff account created on first start.
 * Returns null unless both variables are set.
 */
export const getBootstrapAdminConfig = (configService: ConfigService): BootstrapAdminConfig | null => {
  const email = configService.get<string>('ADMIN_EMAIL');
  const password = configService.get<string>('ADMIN_PASSWORD');

  if (!email || !password) {
    return null;
  }

  return { email: email.trim().toLowerCase(), password };
};
