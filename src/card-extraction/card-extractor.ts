import { ExtractionResult } from './domain/entities/contact-record.entity';
import { assembleContact } from './contact-assembler';
import { applyMutualExclusion, detectCandidates } from './detectors';
import { resolveFields } from './field-resolver';
import { normalizeLines } from './utils/line-normalizer';

export interface ExtractionOptions {
  /** Confidence at which a candidate claims its line from other field types */
  acceptanceThreshold: number;
  /** Candidates below this floor never resolve */
  minConfidence: number;
}

export const DEFAULT_EXTRACTION_OPTIONS: ExtractionOptions = {
  acceptanceThreshold: 0.6,
  minConfidence: 0.3,
};

/**
 * Turn the OCR lines of one card into a contact record or a skip decision.
 *
 * Pure and self-contained: concurrent calls share no state.
 *
 * @throws TypeError when `lines` is not an array of strings
 */
export function extractContact(
  lines: readonly string[],
  sourceFileId: string,
  options: ExtractionOptions = DEFAULT_EXTRACTION_OPTIONS,
): ExtractionResult {
  const normalized = normalizeLines(lines);
  const candidates = applyMutualExclusion(
    detectCandidates(normalized),
    options.acceptanceThreshold,
  );
  const fields = resolveFields(candidates, options.minConfidence);

  return { ...assembleContact(fields, sourceFileId), lines: normalized };
}
