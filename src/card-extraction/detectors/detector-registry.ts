import { Candidate } from '../domain/entities/candidate.entity';
import { FIELD_PRIORITY, FieldType } from '../domain/enums/field-type.enum';
import { companyDetector } from './company.detector';
import { emailDetector } from './email.detector';
import { FieldDetector } from './field-detector';
import { nameDetector } from './name.detector';
import { phoneDetector } from './phone.detector';
import { titleDetector } from './title.detector';
import { websiteDetector } from './website.detector';

export const FIELD_DETECTORS: readonly FieldDetector[] = [
  emailDetector,
  phoneDetector,
  websiteDetector,
  nameDetector,
  titleDetector,
  companyDetector,
];

/**
 * Run every detector over the same lines. Detectors are independent, so the
 * result is the plain concatenation of their candidates.
 */
export function detectCandidates(
  lines: readonly string[],
  detectors: readonly FieldDetector[] = FIELD_DETECTORS,
): Candidate[] {
  return detectors.flatMap((detector) => detector.detect(lines));
}

function outranks(challenger: Candidate, holder: Candidate): boolean {
  const challengerIsEmail = challenger.fieldType === FieldType.EMAIL;
  if (challengerIsEmail !== (holder.fieldType === FieldType.EMAIL)) {
    return challengerIsEmail;
  }
  if (challenger.confidence !== holder.confidence) {
    return challenger.confidence > holder.confidence;
  }
  return (
    FIELD_PRIORITY.indexOf(challenger.fieldType) <
    FIELD_PRIORITY.indexOf(holder.fieldType)
  );
}

/**
 * A candidate at or above `acceptanceThreshold` claims its line; candidates of
 * other field types on a claimed line are dropped from the pool. The strongest
 * candidate claims, ties go to the higher-priority field type.
 *
 * An email always claims its line, whatever its score.
 */
export function applyMutualExclusion(
  candidates: readonly Candidate[],
  acceptanceThreshold: number,
): Candidate[] {
  const claims = new Map<number, Candidate>();

  for (const candidate of candidates) {
    if (
      candidate.confidence < acceptanceThreshold &&
      candidate.fieldType !== FieldType.EMAIL
    ) {
      continue;
    }
    const holder = claims.get(candidate.lineIndex);
    if (!holder || outranks(candidate, holder)) {
      claims.set(candidate.lineIndex, candidate);
    }
  }

  return candidates.filter((candidate) => {
    const claim = claims.get(candidate.lineIndex);
    return !claim || claim.fieldType === candidate.fieldType;
  });
}
