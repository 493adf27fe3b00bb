import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ImapFlow } from 'imapflow';
import { Attachment, simpleParser } from 'mailparser';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { UpstreamError } from '../../../utils/upstream-error';
import { CardSourcePort } from '../../domain/ports/card-source.port';
import { SourceFile } from '../../domain/entities/source-file.entity';

const DAY_MS = 24 * 60 * 60 * 1000;

// imap:<message uid>:<attachment index>
const FILE_ID_PATTERN = /^imap:(\d+):(\d+)$/;

function isCardAttachment(attachment: Attachment): boolean {
  return (
    attachment.contentType.startsWith('image/') ||
    attachment.contentType === 'application/pdf'
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface ImapSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  mailbox: string;
  lookbackDays: number;
}

/**
 * IMAP Card Source
 *
 * Treats the image and PDF attachments of recent messages in one mailbox as
 * card files. Messages are neither flagged nor moved; the processed-file
 * ledger keeps a card from being ingested twice.
 */
@Injectable()
export class ImapCardSourceAdapter implements CardSourcePort {
  private readonly logger = new Logger(ImapCardSourceAdapter.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  async listFiles(): Promise<SourceFile[]> {
    const settings = this.settings();
    const since = new Date(Date.now() - settings.lookbackDays * DAY_MS);

    const files = await this.withMailbox(settings, 'SEARCH', async (client) => {
      const found = await client.search({ since }, { uid: true });
      const uids = Array.isArray(found) ? found : [];
      if (uids.length === 0) {
        return [];
      }

      const listed: SourceFile[] = [];
      for await (const message of client.fetch(
        uids,
        { uid: true, source: true },
        { uid: true },
      )) {
        if (!message.source) continue;

        const { attachments } = await simpleParser(message.source);
        attachments.forEach((attachment, index) => {
          if (!isCardAttachment(attachment)) return;
          listed.push({
            id: `imap:${message.uid}:${index}`,
            name:
              attachment.filename ??
              `message-${message.uid}-attachment-${index + 1}`,
            mimeType: attachment.contentType,
            size: attachment.size,
          });
        });
      }
      return listed;
    });

    this.logger.log(
      `[IMAP] Listed ${files.length} attachment(s) from ${settings.mailbox}`,
    );
    return files;
  }

  async download(fileId: string): Promise<Buffer> {
    const match = FILE_ID_PATTERN.exec(fileId);
    if (!match) {
      throw new Error(`Not an inbox card id: ${fileId}`);
    }
    const [, uid, index] = match;

    const settings = this.settings();
    const content = await this.withMailbox(settings, 'FETCH', async (client) => {
      const message = await client.fetchOne(
        uid,
        { source: true },
        { uid: true },
      );
      if (!message || !message.source) {
        throw new Error(`Message ${uid} is no longer in ${settings.mailbox}`);
      }

      const { attachments } = await simpleParser(message.source);
      const attachment = attachments[Number(index)];
      if (!attachment) {
        throw new Error(`Message ${uid} has no attachment ${index}`);
      }
      return attachment.content;
    });

    this.logger.debug(`[IMAP] Downloaded ${fileId} - Bytes: ${content.length}`);
    return content;
  }

  private settings(): ImapSettings {
    const { host, port, secure, user, password, mailbox, lookbackDays } =
      this.configService.getOrThrow('cardIngestion.imap', { infer: true });
    if (!host || !user || !password) {
      throw new Error('IMAP inbox is not configured');
    }
    return { host, port, secure, user, password, mailbox, lookbackDays };
  }

  /**
   * One connection per operation, holding the mailbox lock while `work` runs.
   */
  private async withMailbox<T>(
    settings: ImapSettings,
    operation: string,
    work: (client: ImapFlow) => Promise<T>,
  ): Promise<T> {
    const client = new ImapFlow({
      host: settings.host,
      port: settings.port,
      secure: settings.secure,
      auth: { user: settings.user, pass: settings.password },
      logger: false,
    });
    const upstreamPath = `imap://${settings.host}/${settings.mailbox}`;

    try {
      await client.connect();
      const lock = await client.getMailboxLock(settings.mailbox);
      try {
        return await work(client);
      } finally {
        lock.release();
      }
    } catch (error) {
      this.logger.error(`[IMAP] ${operation} ${upstreamPath} failed`);
      throw new UpstreamError({
        status: 502,
        message: `IMAP ${operation} failed: ${errorMessage(error)}`,
        requestId: randomUUID(),
        upstreamPath,
      });
    } finally {
      await client.logout().catch((error: unknown) => {
        this.logger.warn(`[IMAP] Logout failed: ${errorMessage(error)}`);
      });
    }
  }
}
