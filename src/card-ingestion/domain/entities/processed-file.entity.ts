import { ExtractionOutcome } from '../../../card-extraction';

/**
 * Ledger entry: a source file that reached a terminal outcome.
 *
 * At most one entry exists per `sourceFileId`.
 */
export class ProcessedFileEntry {
  constructor(
    readonly sourceFileId: string,
    readonly outcome: ExtractionOutcome,
    readonly processedAt: Date,
    readonly fileName: string | null = null,
    readonly detail: string | null = null,
    readonly createdAt?: Date,
  ) {}
}
