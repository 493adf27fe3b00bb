import { ResolvedFields } from './domain/entities/candidate.entity';
import {
  ContactAssembly,
  ContactRecord,
} from './domain/entities/contact-record.entity';
import {
  ExtractionOutcome,
  SkipReason,
} from './domain/enums/extraction-outcome.enum';

/**
 * Build the contact record for one card.
 *
 * The contact store is keyed by email, so a card without one is skipped and
 * never reaches the upsert. Optional fields that did not resolve are left out
 * of the record entirely.
 */
export function assembleContact(
  fields: ResolvedFields,
  sourceFileId: string,
): ContactAssembly {
  if (!fields.email) {
    return {
      outcome: ExtractionOutcome.SKIPPED,
      reason: SkipReason.NO_EMAIL,
      fields,
    };
  }

  const contact: ContactRecord = {
    sourceFileId,
    email: fields.email.value,
    phones: fields.phones.map((phone) => phone.value),
  };
  if (fields.name) contact.name = fields.name.value;
  if (fields.title) contact.title = fields.title.value;
  if (fields.company) contact.company = fields.company.value;
  if (fields.website) contact.website = fields.website.value;

  return { outcome: ExtractionOutcome.ACCEPTED, contact, fields };
}
