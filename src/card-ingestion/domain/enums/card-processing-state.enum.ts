/**
 * Lifecycle of one source file through a single ingestion attempt.
 *
 * FETCHED → OCR_COMPLETE → PARSED → ACCEPTED | SKIPPED → RECORDED
 * Any non-terminal state may end in FAILED.
 */
export enum CardProcessingState {
  FETCHED = 'FETCHED', // Content downloaded
  OCR_COMPLETE = 'OCR_COMPLETE', // Text lines recognized
  PARSED = 'PARSED', // Contact extraction finished
  ACCEPTED = 'ACCEPTED', // Email present, contact upserted
  SKIPPED = 'SKIPPED', // Required field missing, nothing upserted
  RECORDED = 'RECORDED', // Ledger entry written (terminal)
  FAILED = 'FAILED', // Collaborator error, not recorded (terminal)
}
