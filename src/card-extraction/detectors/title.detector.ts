import { Candidate } from '../domain/entities/candidate.entity';
import { FieldType } from '../domain/enums/field-type.enum';
import {
  containsWebsite,
  hasCompanySuffix,
  hasTitleKeyword,
} from '../utils/contact-patterns';
import { FieldDetector } from './field-detector';

export const TITLE_SHORT_LINE_CONFIDENCE = 0.85;
export const TITLE_LONG_LINE_CONFIDENCE = 0.7;
const SHORT_LINE_MAX_TOKENS = 5;

export const titleDetector: FieldDetector = {
  fieldType: FieldType.TITLE,

  detect(lines: readonly string[]): Candidate[] {
    const candidates: Candidate[] = [];

    lines.forEach((line, lineIndex) => {
      if (/\d|@/.test(line) || containsWebsite(line)) return;
      // "Lead Generation Inc" names a company, not a role
      if (!hasTitleKeyword(line) || hasCompanySuffix(line)) return;

      const tokenCount = line.split(' ').length;
      candidates.push({
        fieldType: FieldType.TITLE,
        value: line,
        lineIndex,
        confidence:
          tokenCount <= SHORT_LINE_MAX_TOKENS
            ? TITLE_SHORT_LINE_CONFIDENCE
            : TITLE_LONG_LINE_CONFIDENCE,
      });
    });

    return candidates;
  },
};
