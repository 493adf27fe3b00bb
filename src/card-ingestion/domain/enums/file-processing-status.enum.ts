export enum FileProcessingStatus {
  ACCEPTED = 'ACCEPTED',
  SKIPPED = 'SKIPPED',
  ALREADY_PROCESSED = 'ALREADY_PROCESSED',
  FAILED = 'FAILED',
}
