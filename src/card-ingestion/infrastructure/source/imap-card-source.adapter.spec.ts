import { ImapFlow } from 'imapflow';
import { simpleParser } from 'mailparser';
import { ImapCardSourceAdapter } from './imap-card-source.adapter';
import { UpstreamError } from '../../../utils/upstream-error';
import {
  createTestConfigService,
  TEST_CONFIG,
} from '../../../../test/utils/test-helpers';

jest.mock('imapflow');
jest.mock('mailparser', () => ({ simpleParser: jest.fn() }));

const attachment = (
  filename: string | undefined,
  contentType: string,
  content: string,
) => ({
  filename,
  contentType,
  content: Buffer.from(content),
  size: content.length,
});

// Parsed messages keyed by their raw source
const MESSAGES: Record<string, { attachments: unknown[] }> = {
  'raw-41': {
    attachments: [
      attachment('card.jpg', 'image/jpeg', 'jpeg-bytes'),
      attachment('notes.txt', 'text/plain', 'hello'),
    ],
  },
  'raw-42': {
    attachments: [
      attachment('signature.txt', 'text/plain', 'bye'),
      attachment(undefined, 'application/pdf', 'pdf'),
    ],
  },
};

describe('ImapCardSourceAdapter', () => {
  let client: {
    connect: jest.Mock;
    getMailboxLock: jest.Mock;
    search: jest.Mock;
    fetch: jest.Mock;
    fetchOne: jest.Mock;
    logout: jest.Mock;
  };
  let release: jest.Mock;
  const parse = simpleParser as unknown as jest.Mock;

  beforeEach(() => {
    release = jest.fn();
    client = {
      connect: jest.fn().mockResolvedValue(undefined),
      getMailboxLock: jest.fn().mockResolvedValue({ release }),
      search: jest.fn(),
      fetch: jest.fn(),
      fetchOne: jest.fn(),
      logout: jest.fn().mockResolvedValue(undefined),
    };
    jest
      .mocked(ImapFlow)
      .mockImplementation(() => client as unknown as ImapFlow);
    parse.mockImplementation((source: Buffer) =>
      Promise.resolve(MESSAGES[source.toString()]),
    );
  });

  afterEach(() => {
    jest.clearAllMocks();
    jest.useRealTimers();
  });

  const createAdapter = (imap = TEST_CONFIG.cardIngestion.imap) =>
    new ImapCardSourceAdapter(
      createTestConfigService({
        ...TEST_CONFIG,
        cardIngestion: { ...TEST_CONFIG.cardIngestion, source: 'imap', imap },
      }),
    );

  describe('listFiles', () => {
    it('should list image and PDF attachments of recent messages', async () => {
      jest.useFakeTimers({ now: new Date('2026-03-10T12:00:00Z') });
      client.search.mockResolvedValue([41, 42]);
      client.fetch.mockImplementation(async function* () {
        yield { uid: 41, source: Buffer.from('raw-41') };
        yield { uid: 42, source: Buffer.from('raw-42') };
      });

      const files = await createAdapter().listFiles();

      expect(files).toEqual([
        { id: 'imap:41:0', name: 'card.jpg', mimeType: 'image/jpeg', size: 10 },
        {
          id: 'imap:42:1',
          name: 'message-42-attachment-2',
          mimeType: 'application/pdf',
          size: 3,
        },
      ]);
      expect(ImapFlow).toHaveBeenCalledWith({
        host: 'imap.example.com',
        port: 993,
        secure: true,
        auth: { user: 'cards@example.com', pass: 'test-secret' },
        logger: false,
      });
      expect(client.getMailboxLock).toHaveBeenCalledWith('INBOX');
      expect(client.search).toHaveBeenCalledWith(
        { since: new Date('2026-03-03T12:00:00Z') },
        { uid: true },
      );
      expect(client.fetch).toHaveBeenCalledWith(
        [41, 42],
        { uid: true, source: true },
        { uid: true },
      );
      expect(release).toHaveBeenCalledTimes(1);
      expect(client.logout).toHaveBeenCalledTimes(1);
    });

    it('should not fetch when nothing matches', async () => {
      client.search.mockResolvedValue([]);

      await expect(createAdapter().listFiles()).resolves.toEqual([]);
      expect(client.fetch).not.toHaveBeenCalled();
    });

    it('should wrap connection failures in an UpstreamError', async () => {
      client.connect.mockRejectedValue(new Error('Invalid credentials'));

      const error: unknown = await createAdapter()
        .listFiles()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({
        status: 502,
        message: 'IMAP SEARCH failed: Invalid credentials',
        upstreamPath: 'imap://imap.example.com/INBOX',
      });
      expect(client.logout).toHaveBeenCalledTimes(1);
    });

    it('should refuse to connect without credentials', async () => {
      await expect(
        createAdapter({
          ...TEST_CONFIG.cardIngestion.imap,
          password: undefined,
        }).listFiles(),
      ).rejects.toThrow('IMAP inbox is not configured');
      expect(ImapFlow).not.toHaveBeenCalled();
    });
  });

  describe('download', () => {
    it('should return the bytes of the addressed attachment', async () => {
      client.fetchOne.mockResolvedValue({
        uid: 42,
        source: Buffer.from('raw-42'),
      });

      const content = await createAdapter().download('imap:42:1');

      expect(content).toEqual(Buffer.from('pdf'));
      expect(client.fetchOne).toHaveBeenCalledWith(
        '42',
        { source: true },
        { uid: true },
      );
      expect(release).toHaveBeenCalledTimes(1);
    });

    it('should fail when the message is gone', async () => {
      client.fetchOne.mockResolvedValue(false);

      await expect(createAdapter().download('imap:7:0')).rejects.toThrow(
        'IMAP FETCH failed: Message 7 is no longer in INBOX',
      );
    });

    it('should reject ids from other sources', async () => {
      await expect(createAdapter().download('drive-file-1')).rejects.toThrow(
        'Not an inbox card id: drive-file-1',
      );
      expect(ImapFlow).not.toHaveBeenCalled();
    });
  });
});
