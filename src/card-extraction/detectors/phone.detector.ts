import { Candidate } from '../domain/entities/candidate.entity';
import { FieldType } from '../domain/enums/field-type.enum';
import { hasOtherWords, isFaxLine } from '../utils/contact-patterns';
import { normalizePhone } from '../utils/phone-normalizer';
import { FieldDetector } from './field-detector';

export const PHONE_STANDALONE_CONFIDENCE = 0.9;
export const PHONE_EMBEDDED_CONFIDENCE = 0.75;

// Digits or parenthesized groups joined by up to two separators, optional
// leading "+", optional extension: "+1 (555) 012-3456 ext. 12"
const PHONE_PATTERN =
  /(?:\+\s?)?(?:\(\s?\d{1,4}\s?\)|\d)(?:[\s./-]{0,2}(?:\(\s?\d{1,4}\s?\)|\d))*(?:\s*(?:ext\.?|x|#)\s*\d{1,6})?/gi;

export const phoneDetector: FieldDetector = {
  fieldType: FieldType.PHONE,

  detect(lines: readonly string[]): Candidate[] {
    const candidates: Candidate[] = [];

    lines.forEach((line, lineIndex) => {
      if (isFaxLine(line)) return;

      const matches = Array.from(
        line.matchAll(PHONE_PATTERN),
        (match) => match[0],
      );
      const phones = matches.flatMap((raw) => {
        const normalized = normalizePhone(raw);
        return normalized ? [{ raw, normalized }] : [];
      });
      if (phones.length === 0) return;

      const confidence = hasOtherWords(
        line,
        phones.map((phone) => phone.raw),
      )
        ? PHONE_EMBEDDED_CONFIDENCE
        : PHONE_STANDALONE_CONFIDENCE;

      for (const phone of phones) {
        candidates.push({
          fieldType: FieldType.PHONE,
          value: phone.normalized,
          lineIndex,
          confidence,
        });
      }
    });

    return candidates;
  },
};
