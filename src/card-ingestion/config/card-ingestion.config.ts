import { registerAs } from '@nestjs/config';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { CardIngestionConfig } from './card-ingestion-config.type';
import validateConfig from '../../utils/validate-config';

export const DEFAULT_ALLOWED_MIME_TYPES = [
  'image/jpeg',
  'image/png',
  'image/webp',
  'image/gif',
  'application/pdf',
];

class EnvironmentVariablesValidator {
  @IsIn(['drive', 'imap'])
  @IsOptional()
  CARD_INGESTION_SOURCE?: string;

  @IsString()
  @IsOptional()
  CARD_INGESTION_DRIVE_FOLDER_ID?: string;

  @IsInt()
  @Min(1)
  @Max(1000)
  @IsOptional()
  CARD_INGESTION_DRIVE_PAGE_SIZE?: number;

  @IsString()
  @IsOptional()
  IMAP_HOST?: string;

  @IsInt()
  @Min(1)
  @Max(65535)
  @IsOptional()
  IMAP_PORT?: number;

  @IsBooleanString()
  @IsOptional()
  IMAP_SECURE?: string;

  @IsString()
  @IsOptional()
  IMAP_USER?: string;

  @IsString()
  @IsOptional()
  IMAP_PASSWORD?: string;

  @IsString()
  @IsOptional()
  IMAP_MAILBOX?: string;

  @IsInt()
  @Min(1)
  @Max(365)
  @IsOptional()
  IMAP_LOOKBACK_DAYS?: number;

  @IsString()
  @IsOptional()
  CARD_INGESTION_ALLOWED_MIME_TYPES?: string;

  @IsInt()
  @Min(1)
  @Max(40)
  @IsOptional()
  CARD_INGESTION_MAX_FILE_SIZE_MB?: number;

  @IsInt()
  @Min(1)
  @Max(32)
  @IsOptional()
  CARD_INGESTION_CONCURRENCY?: number;

  @IsBooleanString()
  @IsOptional()
  CARD_INGESTION_SCHEDULE_ENABLED?: string;

  @IsNumber()
  @Min(0)
  @Max(1)
  @IsOptional()
  CARD_EXTRACTION_ACCEPTANCE_THRESHOLD?: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  @IsOptional()
  CARD_EXTRACTION_MIN_CONFIDENCE?: number;

  @IsString()
  @IsOptional()
  MAILCHIMP_API_KEY?: string;

  // Data center of the account, e.g. "us21"
  @Matches(/^[a-z]+\d+$/)
  @IsOptional()
  MAILCHIMP_SERVER_PREFIX?: string;

  @IsString()
  @IsOptional()
  MAILCHIMP_LIST_ID?: string;

  @IsString()
  @IsOptional()
  MAILCHIMP_TAG?: string;

  @IsInt()
  @Min(1000)
  @IsOptional()
  MAILCHIMP_TIMEOUT_MS?: number;
}

function parseNumber(raw: string | undefined, fallback: number): number {
  return raw ? Number(raw) : fallback;
}

export default registerAs<CardIngestionConfig>('cardIngestion', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    source: process.env.CARD_INGESTION_SOURCE === 'imap' ? 'imap' : 'drive',
    drive: {
      folderId: process.env.CARD_INGESTION_DRIVE_FOLDER_ID,
      pageSize: parseNumber(process.env.CARD_INGESTION_DRIVE_PAGE_SIZE, 100),
    },
    imap: {
      host: process.env.IMAP_HOST,
      port: parseNumber(process.env.IMAP_PORT, 993),
      secure: process.env.IMAP_SECURE !== 'false',
      user: process.env.IMAP_USER,
      password: process.env.IMAP_PASSWORD,
      mailbox: process.env.IMAP_MAILBOX ?? 'INBOX',
      lookbackDays: parseNumber(process.env.IMAP_LOOKBACK_DAYS, 7),
    },
    allowedMimeTypes: process.env.CARD_INGESTION_ALLOWED_MIME_TYPES
      ? process.env.CARD_INGESTION_ALLOWED_MIME_TYPES.split(',')
          .map((type) => type.trim())
          .filter(Boolean)
      : DEFAULT_ALLOWED_MIME_TYPES,
    maxFileSizeMb: parseNumber(process.env.CARD_INGESTION_MAX_FILE_SIZE_MB, 10),
    concurrency: parseNumber(process.env.CARD_INGESTION_CONCURRENCY, 4),
    scheduleEnabled: process.env.CARD_INGESTION_SCHEDULE_ENABLED === 'true',
    extraction: {
      acceptanceThreshold: parseNumber(
        process.env.CARD_EXTRACTION_ACCEPTANCE_THRESHOLD,
        0.6,
      ),
      minConfidence: parseNumber(process.env.CARD_EXTRACTION_MIN_CONFIDENCE, 0.3),
    },
    mailchimp: {
      apiKey: process.env.MAILCHIMP_API_KEY,
      serverPrefix: process.env.MAILCHIMP_SERVER_PREFIX,
      listId: process.env.MAILCHIMP_LIST_ID,
      tag: process.env.MAILCHIMP_TAG ?? 'Referral Source',
      timeoutMs: parseNumber(process.env.MAILCHIMP_TIMEOUT_MS, 15000),
    },
  };
});
