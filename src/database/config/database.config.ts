import { registerAs } from '@nestjs/config';
import {
  IsBooleanString,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateIf,
} from 'class-validator';
import { DatabaseConfig, DatabaseLogging } from './database-config.type';
import validateConfig from '../../utils/validate-config';

const LOG_KINDS = ['query', 'error', 'schema', 'warn', 'info', 'log'] as const;
type LogKind = (typeof LOG_KINDS)[number];

class EnvironmentVariablesValidator {
  @ValidateIf((envValues) => envValues.DATABASE_URL)
  @IsString()
  DATABASE_URL?: string;

  @ValidateIf((envValues) => !envValues.DATABASE_URL)
  @IsString()
  DATABASE_HOST?: string;

  @ValidateIf((envValues) => !envValues.DATABASE_URL)
  @IsInt()
  @Min(0)
  @Max(65535)
  DATABASE_PORT?: number;

  @ValidateIf((envValues) => !envValues.DATABASE_URL)
  @IsString()
  DATABASE_PASSWORD?: string;

  @ValidateIf((envValues) => !envValues.DATABASE_URL)
  @IsString()
  DATABASE_NAME?: string;

  @ValidateIf((envValues) => !envValues.DATABASE_URL)
  @IsString()
  DATABASE_USERNAME?: string;

  @IsBooleanString()
  @IsOptional()
  DATABASE_SYNCHRONIZE?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  DATABASE_MAX_CONNECTIONS?: number;

  @IsBooleanString()
  @IsOptional()
  DATABASE_SSL_ENABLED?: string;

  @IsBooleanString()
  @IsOptional()
  DATABASE_REJECT_UNAUTHORIZED?: string;

  @IsString()
  @IsOptional()
  DATABASE_CA?: string;

  @IsString()
  @IsOptional()
  DATABASE_LOGGING?: string;
}

function isLogKind(value: string): value is LogKind {
  return LOG_KINDS.some((kind) => kind === value);
}

/**
 * DATABASE_LOGGING accepts "true", "false", "all" or a comma separated list
 * such as "error,warn".
 */
export function parseDatabaseLogging(raw: string | undefined): DatabaseLogging {
  if (!raw || raw === 'false') return false;
  if (raw === 'true') return true;
  if (raw === 'all') return 'all';
  return raw
    .split(',')
    .map((kind) => kind.trim())
    .filter(isLogKind);
}

export default registerAs<DatabaseConfig>('database', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    url: process.env.DATABASE_URL,
    host: process.env.DATABASE_HOST,
    port: process.env.DATABASE_PORT
      ? parseInt(process.env.DATABASE_PORT, 10)
      : 5432,
    password: process.env.DATABASE_PASSWORD,
    name: process.env.DATABASE_NAME,
    username: process.env.DATABASE_USERNAME,
    synchronize: process.env.DATABASE_SYNCHRONIZE === 'true',
    maxConnections: process.env.DATABASE_MAX_CONNECTIONS
      ? parseInt(process.env.DATABASE_MAX_CONNECTIONS, 10)
      : 100,
    sslEnabled: process.env.DATABASE_SSL_ENABLED === 'true',
    rejectUnauthorized: process.env.DATABASE_REJECT_UNAUTHORIZED === 'true',
    ca: process.env.DATABASE_CA,
    logging: parseDatabaseLogging(process.env.DATABASE_LOGGING),
  };
});
