export enum ExtractionOutcome {
  ACCEPTED = 'ACCEPTED', // Email resolved, ready for upsert
  SKIPPED = 'SKIPPED', // Required field missing, never upserted
}

export enum SkipReason {
  NO_EMAIL = 'no email',
}
