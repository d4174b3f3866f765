import 'reflect-metadata';
import { DataSource } from 'typeorm';

// Used by the TypeORM CLI (migration:run / migration:revert).
export default new DataSource({
  type: 'postgres',
  url: process.env.DATABASE_URL,
  host: process.env.DB_HOST || 'localhost',
  port: Number(process.env.DB_PORT || 5432),
  username: process.env.DB_USERNAME || 'lms',
  password: process.env.DB_PASSWORD || 'lms',
  database: process.env.DB_NAME || 'lms',
  entities: [__dirname + '/../src/**/*.entity{.ts,.js}'],
  migrations: [__dirname + '/migrations/*{.ts,.js}'],
  synchronize: false,
});
