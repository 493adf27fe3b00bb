import { Candidate } from '../domain/entities/candidate.entity';
import { FieldType } from '../domain/enums/field-type.enum';
import {
  containsWebsite,
  hasCompanySuffix,
  hasOrganizationWord,
  hasTitleKeyword,
  toScore,
} from '../utils/contact-patterns';
import { FieldDetector } from './field-detector';

const BASE_CONFIDENCE = 0.55;
const PROPER_CASE_WEIGHT = 0.35;
const LINE_POSITION_PENALTY = 0.08;
const MIN_PROPER_CASE_RATIO = 0.5;
const MIN_TOKENS = 2;
const MAX_TOKENS = 4;

// Letters, spaces and the punctuation found in printed names ("Jane A. O'Neil")
const NAME_CHARACTERS_PATTERN = /^[\p{L}\p{M}\s.'’-]+$/u;
const PROPER_CASE_TOKEN_PATTERN = /^\p{Lu}/u;
const LETTER_PATTERN = /\p{L}/u;

/**
 * Printed names sit near the top of the card, in proper case, with no digits
 * and nothing another detector would claim.
 */
export const nameDetector: FieldDetector = {
  fieldType: FieldType.NAME,

  detect(lines: readonly string[]): Candidate[] {
    const candidates: Candidate[] = [];

    lines.forEach((line, lineIndex) => {
      if (!NAME_CHARACTERS_PATTERN.test(line)) return;
      if (
        containsWebsite(line) ||
        hasTitleKeyword(line) ||
        hasCompanySuffix(line) ||
        hasOrganizationWord(line)
      ) {
        return;
      }

      const tokens = line
        .split(' ')
        .filter((token) => LETTER_PATTERN.test(token));
      if (tokens.length < MIN_TOKENS || tokens.length > MAX_TOKENS) return;

      const properCaseRatio =
        tokens.filter((token) => PROPER_CASE_TOKEN_PATTERN.test(token))
          .length / tokens.length;
      if (properCaseRatio < MIN_PROPER_CASE_RATIO) return;

      candidates.push({
        fieldType: FieldType.NAME,
        value: line,
        lineIndex,
        confidence: toScore(
          BASE_CONFIDENCE +
            PROPER_CASE_WEIGHT * properCaseRatio -
            LINE_POSITION_PENALTY * lineIndex,
        ),
      });
    });

    return candidates;
  },
};
