import {
  Inject,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import {
  ExtractionOutcome,
  ExtractionOptions,
  ExtractionResult,
  extractContact,
} from '../card-extraction';
import { AllConfigType } from '../config/config.type';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { missingCardSourceSetting } from './config/card-source.settings';
import { CardIngestionDomainService } from './domain/services/card-ingestion.domain.service';
import { FileProcessingResult } from './domain/entities/file-processing-result.entity';
import { ProcessedFileEntry } from './domain/entities/processed-file.entity';
import { ProcessedFileLedgerPort } from './domain/ports/processed-file-ledger.port';
import { ExtractCardDto } from './dto/extract-card.dto';
import { ExtractionResponseDto } from './dto/extraction-response.dto';
import {
  FileProcessingResultResponseDto,
  IngestionRunResponseDto,
} from './dto/file-processing-result-response.dto';
import { ProcessedFileQueryDto } from './dto/processed-file-query.dto';
import { ProcessedFileResponseDto } from './dto/processed-file-response.dto';

export type UploadedCard = {
  buffer: Buffer;
  originalname: string;
  mimetype: string;
  size: number;
};

const INLINE_SOURCE_ID = 'inline';

/**
 * Application service behind the cards controller.
 *
 * Maps HTTP input onto the extraction engine and the ingestion domain
 * service, and domain results onto response DTOs.
 */
@Injectable()
export class CardIngestionService {
  private readonly logger = new Logger(CardIngestionService.name);

  constructor(
    private readonly domainService: CardIngestionDomainService,
    @Inject('ProcessedFileLedgerPort')
    private readonly ledger: ProcessedFileLedgerPort,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  /**
   * Pure extraction of already-recognized lines. No ledger, no sink.
   */
  extract(dto: ExtractCardDto): ExtractionResponseDto {
    const options: ExtractionOptions = this.configService.getOrThrow(
      'cardIngestion.extraction',
      { infer: true },
    );
    const result = extractContact(
      dto.lines,
      dto.sourceFileId ?? INLINE_SOURCE_ID,
      options,
    );
    return this.toExtractionResponse(result);
  }

  /**
   * Full pipeline for an uploaded card. The content hash is the source id, so
   * uploading the same bytes twice is answered from the ledger.
   */
  async scanUpload(
    card: UploadedCard,
  ): Promise<FileProcessingResultResponseDto> {
    const digest = createHash('sha256').update(card.buffer).digest('hex');
    const sourceFileId = `upload:${digest}`;

    this.logger.log(
      `[SCAN] Upload received - Id: ${sourceFileId}, MIME: ${card.mimetype}, Bytes: ${card.size}`,
    );

    const result = await this.domainService.processFile(
      {
        id: sourceFileId,
        name: card.originalname,
        mimeType: card.mimetype,
        size: card.size,
      },
      () => Promise.resolve(card.buffer),
    );
    return this.toResultResponse(result);
  }

  /**
   * @throws ServiceUnavailableException when the card source is not configured
   */
  async runIngestion(): Promise<IngestionRunResponseDto> {
    const missing = missingCardSourceSetting(
      this.configService.getOrThrow('cardIngestion', { infer: true }),
    );
    if (missing) {
      throw new ServiceUnavailableException(
        `Card ingestion is not configured: ${missing} is missing`,
      );
    }

    const summary = await this.domainService.runIngestion();
    return {
      ...summary,
      results: summary.results.map((result) => this.toResultResponse(result)),
    };
  }

  async listProcessedFiles(
    query: ProcessedFileQueryDto,
  ): Promise<InfinityPaginationResponseDto<ProcessedFileResponseDto>> {
    const page = query.page ?? 1;
    const limit = query.limit ?? 20;
    const skip = (page - 1) * limit;

    const result = await this.ledger.list({
      skip,
      limit,
      outcome: query.outcome,
    });

    return {
      data: result.data.map((entry) => this.toProcessedFileResponse(entry)),
      hasNextPage: skip + limit < result.total,
    };
  }

  toExtractionResponse(result: ExtractionResult): ExtractionResponseDto {
    if (result.outcome === ExtractionOutcome.SKIPPED) {
      return {
        outcome: result.outcome,
        reason: result.reason,
        fields: result.fields,
        lines: result.lines,
      };
    }
    return {
      outcome: result.outcome,
      contact: result.contact,
      fields: result.fields,
      lines: result.lines,
    };
  }

  private toResultResponse(
    result: FileProcessingResult,
  ): FileProcessingResultResponseDto {
    return {
      sourceFileId: result.sourceFileId,
      fileName: result.fileName,
      status: result.status,
      state: result.state,
      reason: result.reason,
      extraction: result.extraction
        ? this.toExtractionResponse(result.extraction)
        : undefined,
    };
  }

  private toProcessedFileResponse(
    entry: ProcessedFileEntry,
  ): ProcessedFileResponseDto {
    return {
      sourceFileId: entry.sourceFileId,
      outcome: entry.outcome,
      processedAt: entry.processedAt,
      fileName: entry.fileName,
      detail: entry.detail,
    };
  }
}
