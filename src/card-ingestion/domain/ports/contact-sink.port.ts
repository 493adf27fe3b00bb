import { ContactRecord } from '../../../card-extraction';

export interface ContactSinkPort {
  /** Create or update the audience member keyed by the contact's email */
  upsert(contact: ContactRecord): Promise<void>;
}
