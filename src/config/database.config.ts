import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';

export const getDatabaseConfig = (configService: ConfigService): TypeOrmModuleOptions => {
  const databaseUrl = configService.get<string>('DATABASE_URL');
  const shared = {
    type: 'postgres' as const,
    entities: [__dirname + '/../**/*.entity{.ts,.js}'],
    migrations: [__dirname + '/../../database/migrations/*{.ts,.js}'],
    synchronize: false,
    logging: configService.get<string>('DB_LOGGING') === 'true',
  };

  if (databaseUrl) {
    return { ...shared, url: databaseUrl };
  }

  // Fallback to individual connection parameters
  return {
    ...shared,
    host: configService.get<string>('DB_HOST') || 'localhost',
    port: Number(configService.get<string>('DB_PORT') || 5432),
    username: configService.get<string>('DB_USERNAME') || 'lms',
    password: configService.get<string>('DB_PASSWORD') || 'lms',
    database: configService.get<string>('DB_NAME') || 'lms',
  };
};

export default getDatabaseConfig;
