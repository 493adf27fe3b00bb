import { ExtractionOutcome } from '../../../card-extraction';
import { NullableType } from '../../../utils/types/nullable.type';
import { ProcessedFileEntry } from '../entities/processed-file.entity';

export interface ProcessedFileLedgerPort {
  hasProcessed(sourceFileId: string): Promise<boolean>;

  /**
   * Insert-if-absent.
   * @returns true when this call created the entry, false when one existed
   */
  recordOutcome(
    sourceFileId: string,
    outcome: ExtractionOutcome,
    processedAt: Date,
    details?: { fileName?: string; detail?: string },
  ): Promise<boolean>;

  findBySourceFileId(
    sourceFileId: string,
  ): Promise<NullableType<ProcessedFileEntry>>;

  list(options: {
    skip: number;
    limit: number;
    outcome?: ExtractionOutcome;
  }): Promise<{ data: ProcessedFileEntry[]; total: number }>;
}
