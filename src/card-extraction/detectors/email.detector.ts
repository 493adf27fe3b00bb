import { Candidate } from '../domain/entities/candidate.entity';
import { FieldType } from '../domain/enums/field-type.enum';
import {
  hasOtherWords,
  matchAllEmails,
  matchAllWebsites,
} from '../utils/contact-patterns';
import { FieldDetector } from './field-detector';

export const EMAIL_STANDALONE_CONFIDENCE = 0.95;
export const EMAIL_EMBEDDED_CONFIDENCE = 0.7;

export const emailDetector: FieldDetector = {
  fieldType: FieldType.EMAIL,

  detect(lines: readonly string[]): Candidate[] {
    const candidates: Candidate[] = [];

    lines.forEach((line, lineIndex) => {
      const emails = matchAllEmails(line);
      if (emails.length === 0) return;

      // A line that is "just" the address (or a labelled address, or an
      // address next to the company site) is the strongest signal; addresses
      // inside sentences rank lower.
      const confidence = hasOtherWords(line, [
        ...emails,
        ...matchAllWebsites(line),
      ])
        ? EMAIL_EMBEDDED_CONFIDENCE
        : EMAIL_STANDALONE_CONFIDENCE;

      for (const value of emails) {
        candidates.push({
          fieldType: FieldType.EMAIL,
          value,
          lineIndex,
          confidence,
        });
      }
    });

    return candidates;
  },
};
