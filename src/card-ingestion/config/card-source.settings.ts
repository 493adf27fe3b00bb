import { CardIngestionConfig } from './card-ingestion-config.type';

/**
 * First environment variable the selected card source still needs, or null
 * when the source is ready to list.
 */
export function missingCardSourceSetting(
  config: CardIngestionConfig,
): string | null {
  if (config.source === 'imap') {
    if (!config.imap.host) return 'IMAP_HOST';
    if (!config.imap.user) return 'IMAP_USER';
    if (!config.imap.password) return 'IMAP_PASSWORD';
    return null;
  }
  return config.drive.folderId ? null : 'CARD_INGESTION_DRIVE_FOLDER_ID';
}
