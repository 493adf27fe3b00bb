import { Candidate } from '../domain/entities/candidate.entity';
import { FieldType } from '../domain/enums/field-type.enum';
import {
  containsWebsite,
  hasCompanySuffix,
  hasLetters,
  hasOrganizationWord,
  hasTitleKeyword,
  toScore,
} from '../utils/contact-patterns';
import { FieldDetector } from './field-detector';

export const COMPANY_SUFFIX_CONFIDENCE = 0.85;
export const COMPANY_ORGANIZATION_WORD_CONFIDENCE = 0.7;
export const COMPANY_FALLBACK_CONFIDENCE = 0.4;
const FALLBACK_POSITION_PENALTY = 0.02;

/**
 * Legal suffixes ("Inc", "GmbH") and organisation words ("Group") mark a
 * company line. Every other plain text line is a weak fallback that ranks by
 * position, so the highest line nobody else claimed wins when no marker exists.
 */
export const companyDetector: FieldDetector = {
  fieldType: FieldType.COMPANY,

  detect(lines: readonly string[]): Candidate[] {
    const candidates: Candidate[] = [];

    lines.forEach((line, lineIndex) => {
      if (/\d|@/.test(line) || containsWebsite(line) || !hasLetters(line)) {
        return;
      }

      let confidence: number;
      if (hasCompanySuffix(line)) {
        confidence = COMPANY_SUFFIX_CONFIDENCE;
      } else if (hasOrganizationWord(line)) {
        confidence = COMPANY_ORGANIZATION_WORD_CONFIDENCE;
      } else if (hasTitleKeyword(line)) {
        return;
      } else {
        confidence = toScore(
          COMPANY_FALLBACK_CONFIDENCE - FALLBACK_POSITION_PENALTY * lineIndex,
        );
      }

      candidates.push({
        fieldType: FieldType.COMPANY,
        value: line,
        lineIndex,
        confidence,
      });
    });

    return candidates;
  },
};
