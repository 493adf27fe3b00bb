import { ExtractionResult } from '../../../card-extraction';
import { CardProcessingState } from '../enums/card-processing-state.enum';
import { FileProcessingStatus } from '../enums/file-processing-status.enum';

export interface FileProcessingResult {
  sourceFileId: string;
  fileName: string;
  status: FileProcessingStatus;
  /** Last state reached; absent when the ledger already had the file */
  state?: CardProcessingState;
  reason?: string;
  extraction?: ExtractionResult;
}

export interface IngestionRunSummary {
  startedAt: Date;
  finishedAt: Date;
  total: number;
  accepted: number;
  skipped: number;
  alreadyProcessed: number;
  failed: number;
  results: FileProcessingResult[];
}
