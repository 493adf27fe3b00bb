import { Candidate } from '../domain/entities/candidate.entity';
import { FieldType } from '../domain/enums/field-type.enum';
import {
  blankOutEmails,
  hasOtherWords,
  matchAllWebsites,
  toScore,
} from '../utils/contact-patterns';
import { FieldDetector } from './field-detector';

export const WEBSITE_PREFIXED_CONFIDENCE = 0.9;
export const WEBSITE_BARE_CONFIDENCE = 0.7;
const SHARED_LINE_PENALTY = 0.1;

const TRAILING_PUNCTUATION_PATTERN = /[),.;:]+$/;
const PREFIX_PATTERN = /^(?:https?:\/\/|www\.)/i;

export const websiteDetector: FieldDetector = {
  fieldType: FieldType.WEBSITE,

  detect(lines: readonly string[]): Candidate[] {
    const candidates: Candidate[] = [];

    lines.forEach((line, lineIndex) => {
      // An address's domain is never read as a website
      const matches = matchAllWebsites(line);
      if (matches.length === 0) return;

      const shared = hasOtherWords(blankOutEmails(line), matches);

      for (const match of matches) {
        const value = match.replace(TRAILING_PUNCTUATION_PATTERN, '');
        const base = PREFIX_PATTERN.test(value)
          ? WEBSITE_PREFIXED_CONFIDENCE
          : WEBSITE_BARE_CONFIDENCE;

        candidates.push({
          fieldType: FieldType.WEBSITE,
          value,
          lineIndex,
          confidence: toScore(shared ? base - SHARED_LINE_PENALTY : base),
        });
      }
    });

    return candidates;
  },
};
