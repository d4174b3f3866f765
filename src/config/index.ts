export { getDatabaseConfig } from './database.config';
export { getJwtConfig, getJwtRefreshConfig, requireJwtSecret, JwtPayload, JwtRefreshPayload, JwtRefreshOptions } from './jwt.config';
export { getMailConfig, MailConfig } from './mail.config';
export { getBootstrapAdminConfig, BootstrapAdminConfig } from './admin.config';
export { getWinstonConfig } from './winston.config';
