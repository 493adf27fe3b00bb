import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MulterModule } from '@nestjs/platform-express';
import { ScheduleModule } from '@nestjs/schedule';
import { AllConfigType } from '../config/config.type';
import { CardIngestionController } from './card-ingestion.controller';
import { CardIngestionService } from './card-ingestion.service';
import { CardIngestionScheduler } from './card-ingestion.scheduler';
import { createCardUploadOptions } from './card-upload.options';
import { CardIngestionDomainService } from './domain/services/card-ingestion.domain.service';
import { ProcessedFileEntity } from './infrastructure/persistence/relational/entities/processed-file.entity';
import { ProcessedFileLedgerRepository } from './infrastructure/persistence/relational/repositories/processed-file-ledger.repository';
import { GoogleDriveCardSourceAdapter } from './infrastructure/source/google-drive-card-source.adapter';
import { ImapCardSourceAdapter } from './infrastructure/source/imap-card-source.adapter';
import { CardSourcePort } from './domain/ports/card-source.port';
import { GcpVisionOcrAdapter } from './infrastructure/ocr/gcp-vision-ocr.adapter';
import { MailchimpContactSinkAdapter } from './infrastructure/sink/mailchimp-contact-sink.adapter';

@Module({
  imports: [
    // Database
    TypeOrmModule.forFeature([ProcessedFileEntity]),

    // File upload
    MulterModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) =>
        createCardUploadOptions(
          configService.getOrThrow('cardIngestion', { infer: true }),
        ),
    }),

    // Hourly folder ingestion
    ScheduleModule.forRoot(),
  ],
  controllers: [CardIngestionController],
  providers: [
    // Application layer
    CardIngestionService,
    CardIngestionScheduler,

    // Domain layer
    CardIngestionDomainService,

    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: 'ProcessedFileLedgerPort',
      useClass: ProcessedFileLedgerRepository,
    },
    GoogleDriveCardSourceAdapter,
    ImapCardSourceAdapter,
    {
      // CARD_INGESTION_SOURCE picks the Drive folder or the inbox
      provide: 'CardSourcePort',
      inject: [ConfigService, GoogleDriveCardSourceAdapter, ImapCardSourceAdapter],
      useFactory: (
        configService: ConfigService<AllConfigType>,
        drive: GoogleDriveCardSourceAdapter,
        imap: ImapCardSourceAdapter,
      ): CardSourcePort =>
        configService.getOrThrow('cardIngestion.source', { infer: true }) ===
        'imap'
          ? imap
          : drive,
    },
    {
      provide: 'OcrServicePort',
      useClass: GcpVisionOcrAdapter,
    },
    {
      provide: 'ContactSinkPort',
      useClass: MailchimpContactSinkAdapter,
    },
  ],
  exports: [CardIngestionService],
})
export class CardIngestionModule {}
