import { missingCardSourceSetting } from './card-source.settings';
import { TEST_CARD_INGESTION_CONFIG } from '../../../test/utils/test-helpers';

describe('missingCardSourceSetting', () => {
  it('should require a folder for the Drive source', () => {
    expect(missingCardSourceSetting(TEST_CARD_INGESTION_CONFIG)).toBeNull();
    expect(
      missingCardSourceSetting({
        ...TEST_CARD_INGESTION_CONFIG,
        drive: { pageSize: 100 },
      }),
    ).toBe('CARD_INGESTION_DRIVE_FOLDER_ID');
  });

  it('should require host and credentials for the inbox source', () => {
    const imap = { ...TEST_CARD_INGESTION_CONFIG, source: 'imap' as const };

    expect(missingCardSourceSetting(imap)).toBeNull();
    expect(
      missingCardSourceSetting({
        ...imap,
        imap: { ...imap.imap, password: undefined },
      }),
    ).toBe('IMAP_PASSWORD');
    expect(
      missingCardSourceSetting({
        ...imap,
        imap: { ...imap.imap, host: undefined },
      }),
    ).toBe('IMAP_HOST');
  });
});
