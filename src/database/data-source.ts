import 'reflect-metadata';
import 'dotenv/config';
import { DataSource } from 'typeorm';
import { parseDatabaseLogging } from './config/database.config';

// Used by the TypeORM CLI for migrations
export const AppDataSource = new DataSource({
  type: 'postgres',
  url: process.env.DATABASE_URL,
  host: process.env.DATABASE_HOST,
  port: process.env.DATABASE_PORT
    ? parseInt(process.env.DATABASE_PORT, 10)
    : 5432,
  username: process.env.DATABASE_USERNAME,
  password: process.env.DATABASE_PASSWORD,
  database: process.env.DATABASE_NAME,
  synchronize: process.env.DATABASE_SYNCHRONIZE === 'true',
  dropSchema: false,
  logging: parseDatabaseLogging(process.env.DATABASE_LOGGING),
  entities: [
    __dirname + '/../**/infrastructure/persistence/**/*.entity{.ts,.js}',
  ],
  migrations: [__dirname + '/migrations/**/*{.ts,.js}'],
  extra: {
    max: process.env.DATABASE_MAX_CONNECTIONS
      ? parseInt(process.env.DATABASE_MAX_CONNECTIONS, 10)
      : 100,
    ssl:
      process.env.DATABASE_SSL_ENABLED === 'true'
        ? {
            rejectUnauthorized:
              process.env.DATABASE_REJECT_UNAUTHORIZED === 'true',
            ca: process.env.DATABASE_CA,
          }
        : undefined,
  },
});
