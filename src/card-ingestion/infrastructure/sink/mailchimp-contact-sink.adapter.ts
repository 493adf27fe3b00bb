import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, randomUUID } from 'crypto';
import { ContactRecord } from '../../../card-extraction';
import { AllConfigType } from '../../../config/config.type';
import { UpstreamError } from '../../../utils/upstream-error';
import { ContactSinkPort } from '../../domain/ports/contact-sink.port';
import { splitPersonName } from '../../domain/utils/person-name.util';

type MailchimpSettings = {
  apiKey: string;
  serverPrefix: string;
  listId: string;
  tag: string;
  timeoutMs: number;
};

/**
 * Mailchimp Contact Sink
 *
 * Upserts each accepted contact into one audience with
 * `PUT /3.0/lists/{list}/members/{md5(lowercase email)}`, then applies the
 * configured tag. New members are subscribed; the status of existing
 * members is left alone.
 *
 * Contact values are never logged; members are referred to by hash.
 */
@Injectable()
export class MailchimpContactSinkAdapter implements ContactSinkPort {
  private readonly logger = new Logger(MailchimpContactSinkAdapter.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  async upsert(contact: ContactRecord): Promise<void> {
    const settings = this.getSettings();
    const email = contact.email.toLowerCase();
    const memberHash = createHash('md5').update(email).digest('hex');
    const baseUrl = `https://${settings.serverPrefix}.api.mailchimp.com/3.0`;
    const memberPath = `/lists/${settings.listId}/members/${memberHash}`;

    const { firstName, lastName } = splitPersonName(contact.name ?? '');
    const body = {
      email_address: email,
      status_if_new: 'subscribed',
      merge_fields: {
        FNAME: firstName,
        LNAME: lastName,
        COMPANY: contact.company ?? '',
        PHONE: contact.phones[0] ?? '',
        WEBSITE: contact.website ?? '',
      },
    };

    const response = await this.send(settings, baseUrl, memberPath, 'PUT', body);
    if (!response.ok) {
      throw await UpstreamError.fromResponse(
        response,
        randomUUID(),
        memberPath,
        body,
      );
    }
    this.logger.log(`[MAILCHIMP] Upserted member ${memberHash}`);

    if (settings.tag) {
      await this.applyTag(settings, baseUrl, memberPath, memberHash);
    }
  }

  /**
   * A failed tag leaves the member in place, so it is reported and not thrown.
   */
  private async applyTag(
    settings: MailchimpSettings,
    baseUrl: string,
    memberPath: string,
    memberHash: string,
  ): Promise<void> {
    const tagsPath = `${memberPath}/tags`;
    try {
      const response = await this.send(settings, baseUrl, tagsPath, 'POST', {
        tags: [{ name: settings.tag, status: 'active' }],
      });
      if (!response.ok) {
        this.logger.warn(
          `[MAILCHIMP] Tagging member ${memberHash} failed with status ${response.status}`,
        );
      }
    } catch (error) {
      this.logger.warn(
        `[MAILCHIMP] Tagging member ${memberHash} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async send(
    settings: MailchimpSettings,
    baseUrl: string,
    path: string,
    method: 'PUT' | 'POST',
    body: unknown,
  ): Promise<Response> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const credentials = Buffer.from(`anystring:${settings.apiKey}`).toString(
      'base64',
    );

    try {
      const response = await fetch(`${baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Basic ${credentials}`,
          'Content-Type': 'application/json',
          'X-Request-Id': requestId,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(settings.timeoutMs),
      });

      this.logger.debug(
        `[MAILCHIMP] ${method} ${path} | Status: ${response.status} | Duration: ${Date.now() - startTime}ms | RequestId: ${requestId}`,
      );
      return response;
    } catch (error) {
      this.logger.error(
        `[MAILCHIMP] ${method} ${path} | Duration: ${Date.now() - startTime}ms | RequestId: ${requestId} | Network error`,
      );
      throw UpstreamError.fromNetworkError(error, requestId, path, body);
    }
  }

  private getSettings(): MailchimpSettings {
    const { apiKey, serverPrefix, listId, tag, timeoutMs } =
      this.configService.getOrThrow('cardIngestion.mailchimp', {
        infer: true,
      });
    if (!apiKey || !serverPrefix || !listId) {
      throw new Error(
        'Mailchimp is not configured: MAILCHIMP_API_KEY, MAILCHIMP_SERVER_PREFIX and MAILCHIMP_LIST_ID are required',
      );
    }
    return { apiKey, serverPrefix, listId, tag, timeoutMs };
  }
}
