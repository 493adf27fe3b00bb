import { ResolvedFields } from './candidate.entity';
import {
  ExtractionOutcome,
  SkipReason,
} from '../enums/extraction-outcome.enum';

export interface ContactRecord {
  sourceFileId: string;
  email: string;
  phones: string[]; // Normalized digit form, de-duplicated, card order
  name?: string;
  title?: string;
  company?: string;
  website?: string;
}

export type ContactAssembly =
  | {
      outcome: ExtractionOutcome.ACCEPTED;
      contact: ContactRecord;
      fields: ResolvedFields;
    }
  | {
      outcome: ExtractionOutcome.SKIPPED;
      reason: SkipReason;
      fields: ResolvedFields;
    };

/**
 * Assembly plus the normalized lines that `lineIndex` provenance points into.
 */
export type ExtractionResult = ContactAssembly & { lines: string[] };
