import { AppConfig } from './app-config.type';
import { ThrottlerConfig } from './throttler-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { CardIngestionConfig } from '../card-ingestion/config/card-ingestion-config.type';

export type AllConfigType = {
  app: AppConfig;
  throttler: ThrottlerConfig;
  database: DatabaseConfig;
  cardIngestion: CardIngestionConfig;
};
