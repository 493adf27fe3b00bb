import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ExtractionOptions,
  ExtractionOutcome,
  extractContact,
} from '../../../card-extraction';
import { AllConfigType } from '../../../config/config.type';
import { mapWithConcurrency } from '../../../utils/concurrency-limiter';
import {
  FileProcessingResult,
  IngestionRunSummary,
} from '../entities/file-processing-result.entity';
import { SourceFile } from '../entities/source-file.entity';
import { CardProcessingState } from '../enums/card-processing-state.enum';
import { FileProcessingStatus } from '../enums/file-processing-status.enum';
import { CardSourcePort } from '../ports/card-source.port';
import { ContactSinkPort } from '../ports/contact-sink.port';
import { OcrServicePort } from '../ports/ocr.service.port';
import { ProcessedFileLedgerPort } from '../ports/processed-file-ledger.port';
import { CardStateTracker } from '../utils/card-state-machine.util';

/**
 * Drives one source file through
 * FETCHED → OCR_COMPLETE → PARSED → ACCEPTED | SKIPPED → RECORDED.
 *
 * The ledger is consulted before any collaborator call and written exactly
 * once per file that reaches ACCEPTED or SKIPPED. Files that fail are not
 * recorded, so the next run picks them up again.
 */
@Injectable()
export class CardIngestionDomainService {
  private readonly logger = new Logger(CardIngestionDomainService.name);

  // One in-flight run per source file id inside this process
  private readonly inFlight = new Map<string, Promise<FileProcessingResult>>();

  private readonly extractionOptions: ExtractionOptions;
  private readonly concurrency: number;
  private readonly allowedMimeTypes: string[];

  constructor(
    @Inject('ProcessedFileLedgerPort')
    private readonly ledger: ProcessedFileLedgerPort,
    @Inject('CardSourcePort')
    private readonly source: CardSourcePort,
    @Inject('OcrServicePort')
    private readonly ocr: OcrServicePort,
    @Inject('ContactSinkPort')
    private readonly sink: ContactSinkPort,
    private readonly configService: ConfigService<AllConfigType>,
  ) {
    this.extractionOptions = this.configService.getOrThrow(
      'cardIngestion.extraction',
      { infer: true },
    );
    this.concurrency = this.configService.getOrThrow(
      'cardIngestion.concurrency',
      { infer: true },
    );
    this.allowedMimeTypes = this.configService.getOrThrow(
      'cardIngestion.allowedMimeTypes',
      { infer: true },
    );
  }

  /**
   * Process one file at most once. Concurrent calls for the same id share a
   * single run and receive the same result.
   */
  processFile(
    file: SourceFile,
    loadContent: () => Promise<Buffer>,
  ): Promise<FileProcessingResult> {
    const pending = this.inFlight.get(file.id);
    if (pending) {
      this.logger.debug(`[INGESTION] Joining in-flight run for ${file.id}`);
      return pending;
    }

    const run = this.runFile(file, loadContent).finally(() =>
      this.inFlight.delete(file.id),
    );
    this.inFlight.set(file.id, run);
    return run;
  }

  /**
   * List the source folder and process every eligible file with bounded
   * concurrency. A failing file never aborts the batch.
   *
   * @throws UpstreamError when the source cannot be listed
   */
  async runIngestion(): Promise<IngestionRunSummary> {
    const startedAt = new Date();
    const files = await this.source.listFiles();
    const eligible = files.filter((file) =>
      this.allowedMimeTypes.includes(file.mimeType),
    );

    this.logger.log(
      `[INGESTION] Run started - Listed: ${files.length}, Eligible: ${eligible.length}, Concurrency: ${this.concurrency}`,
    );

    const results = await mapWithConcurrency(
      eligible,
      this.concurrency,
      (file) => this.processFile(file, () => this.source.download(file.id)),
    );

    const count = (status: FileProcessingStatus) =>
      results.filter((result) => result.status === status).length;

    const summary: IngestionRunSummary = {
      startedAt,
      finishedAt: new Date(),
      total: results.length,
      accepted: count(FileProcessingStatus.ACCEPTED),
      skipped: count(FileProcessingStatus.SKIPPED),
      alreadyProcessed: count(FileProcessingStatus.ALREADY_PROCESSED),
      failed: count(FileProcessingStatus.FAILED),
      results,
    };

    this.logger.log(
      `[INGESTION] Run complete - Accepted: ${summary.accepted}, Skipped: ${summary.skipped}, Already processed: ${summary.alreadyProcessed}, Failed: ${summary.failed}`,
    );

    return summary;
  }

  private async runFile(
    file: SourceFile,
    loadContent: () => Promise<Buffer>,
  ): Promise<FileProcessingResult> {
    const base = { sourceFileId: file.id, fileName: file.name };

    if (await this.ledger.hasProcessed(file.id)) {
      this.logger.debug(`[INGESTION] ${file.id} already processed`);
      return { ...base, status: FileProcessingStatus.ALREADY_PROCESSED };
    }

    const tracker = new CardStateTracker();

    try {
      const content = await loadContent();
      tracker.advance(CardProcessingState.FETCHED);

      const { lines, pageCount } = await this.ocr.recognize(
        content,
        file.mimeType,
      );
      tracker.advance(CardProcessingState.OCR_COMPLETE);
      this.logger.debug(
        `[INGESTION] ${file.id} OCR complete - Pages: ${pageCount}, Lines: ${lines.length}`,
      );

      const extraction = extractContact(
        lines,
        file.id,
        this.extractionOptions,
      );
      tracker.advance(CardProcessingState.PARSED);

      if (extraction.outcome === ExtractionOutcome.SKIPPED) {
        tracker.advance(CardProcessingState.SKIPPED);
        this.logger.warn(
          `[INGESTION] ${file.id} (${file.name}): no email detected, skipping contact upsert`,
        );
      } else {
        tracker.advance(CardProcessingState.ACCEPTED);
        await this.sink.upsert(extraction.contact);
      }

      const created = await this.ledger.recordOutcome(
        file.id,
        extraction.outcome,
        new Date(),
        {
          fileName: file.name,
          detail:
            extraction.outcome === ExtractionOutcome.SKIPPED
              ? extraction.reason
              : undefined,
        },
      );
      if (!created) {
        this.logger.warn(
          `[INGESTION] ${file.id} was recorded by another worker first`,
        );
      }
      tracker.advance(CardProcessingState.RECORDED);

      const accepted = extraction.outcome === ExtractionOutcome.ACCEPTED;
      this.logger.log(
        `[INGESTION] ${file.id} ${accepted ? 'accepted' : 'skipped'} - Phones: ${extraction.fields.phones.length}`,
      );

      return {
        ...base,
        status: accepted
          ? FileProcessingStatus.ACCEPTED
          : FileProcessingStatus.SKIPPED,
        state: tracker.state,
        reason:
          extraction.outcome === ExtractionOutcome.SKIPPED
            ? extraction.reason
            : undefined,
        extraction,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `[INGESTION] ${file.id} failed in state ${tracker.state ?? 'PENDING'}: ${message}`,
      );
      tracker.fail();

      return {
        ...base,
        status: FileProcessingStatus.FAILED,
        state: tracker.state,
        reason: message,
      };
    }
  }
}
