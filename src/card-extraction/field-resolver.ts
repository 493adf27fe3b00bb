import {
  Candidate,
  ResolvedField,
  ResolvedFields,
} from './domain/entities/candidate.entity';
import { FIELD_PRIORITY, FieldType } from './domain/enums/field-type.enum';

function toResolvedField(candidate: Candidate): ResolvedField {
  return {
    value: candidate.value,
    lineIndex: candidate.lineIndex,
    confidence: candidate.confidence,
  };
}

/**
 * Highest confidence wins; equal confidence goes to the earliest line, i.e.
 * the text printed higher on the card.
 */
export function pickBest(candidates: readonly Candidate[]): Candidate | null {
  let best: Candidate | null = null;
  for (const candidate of candidates) {
    if (
      !best ||
      candidate.confidence > best.confidence ||
      (candidate.confidence === best.confidence &&
        candidate.lineIndex < best.lineIndex)
    ) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Reduce the candidate pool to one value per field (all distinct values for
 * phones).
 *
 * Fields resolve in priority order and a line that already contributed to one
 * field type is not available to another, so no line index ends up in two
 * different resolved fields.
 */
export function resolveFields(
  candidates: readonly Candidate[],
  minConfidence: number,
): ResolvedFields {
  const eligible = candidates.filter(
    (candidate) => candidate.confidence >= minConfidence,
  );
  const takenLines = new Map<number, FieldType>();
  const resolved: ResolvedFields = { phones: [] };

  const isAvailable = (candidate: Candidate) => {
    const owner = takenLines.get(candidate.lineIndex);
    return owner === undefined || owner === candidate.fieldType;
  };

  for (const fieldType of FIELD_PRIORITY) {
    const pool = eligible.filter(
      (candidate) => candidate.fieldType === fieldType && isAvailable(candidate),
    );

    if (fieldType === FieldType.PHONE) {
      const seen = new Set<string>();
      const ordered = [...pool].sort((a, b) => a.lineIndex - b.lineIndex);
      for (const candidate of ordered) {
        if (seen.has(candidate.value)) continue;
        seen.add(candidate.value);
        resolved.phones.push(toResolvedField(candidate));
        takenLines.set(candidate.lineIndex, fieldType);
      }
      continue;
    }

    const winner = pickBest(pool);
    if (winner) {
      resolved[fieldType] = toResolvedField(winner);
      takenLines.set(winner.lineIndex, fieldType);
    }
  }

  return resolved;
}
