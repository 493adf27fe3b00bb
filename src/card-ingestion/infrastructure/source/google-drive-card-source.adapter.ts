import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleAuth } from 'google-auth-library';
import { randomUUID } from 'crypto';
import { AllConfigType } from '../../../config/config.type';
import { UpstreamError } from '../../../utils/upstream-error';
import { CardSourcePort } from '../../domain/ports/card-source.port';
import { SourceFile } from '../../domain/entities/source-file.entity';

const DRIVE_FILES_URL = 'https://www.googleapis.com/drive/v3/files';
const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive.readonly'];

interface DriveFileResource {
  id: string;
  name: string;
  mimeType: string;
  size?: string; // int64 is serialized as a string
}

interface DriveFileList {
  files: DriveFileResource[];
  nextPageToken?: string;
}

function isDriveFileResource(value: unknown): value is DriveFileResource {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'id' in value &&
    typeof value.id === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'mimeType' in value &&
    typeof value.mimeType === 'string'
  );
}

function toDriveFileList(data: unknown): DriveFileList {
  if (typeof data !== 'object' || data === null) {
    return { files: [] };
  }
  const files =
    'files' in data && Array.isArray(data.files)
      ? data.files.filter(isDriveFileResource)
      : [];
  const nextPageToken =
    'nextPageToken' in data && typeof data.nextPageToken === 'string'
      ? data.nextPageToken
      : undefined;
  return { files, nextPageToken };
}

/**
 * Gaxios errors carry the HTTP response; anything else is a network failure.
 */
function statusOf(error: unknown): number {
  if (
    typeof error === 'object' &&
    error !== null &&
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return 502;
}

/**
 * Google Drive Card Source
 *
 * Lists the images and PDFs directly inside one Drive folder and downloads
 * their bytes. Authenticates with Application Default Credentials and the
 * read-only Drive scope.
 */
@Injectable()
export class GoogleDriveCardSourceAdapter implements CardSourcePort {
  private readonly logger = new Logger(GoogleDriveCardSourceAdapter.name);
  private readonly auth: GoogleAuth;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    this.auth = new GoogleAuth({ scopes: DRIVE_SCOPES });
  }

  async listFiles(): Promise<SourceFile[]> {
    const { folderId, pageSize } = this.configService.getOrThrow(
      'cardIngestion.drive',
      { infer: true },
    );
    if (!folderId) {
      throw new Error('Drive folder is not configured');
    }

    const query =
      `'${folderId}' in parents and trashed = false and ` +
      `(mimeType contains 'image/' or mimeType = 'application/pdf')`;

    const files: SourceFile[] = [];
    let pageToken: string | undefined;
    do {
      const page = await this.call('/drive/v3/files', async () => {
        const response = await this.auth.request<unknown>({
          url: DRIVE_FILES_URL,
          method: 'GET',
          params: {
            q: query,
            fields: 'nextPageToken, files(id, name, mimeType, size)',
            pageSize,
            pageToken,
          },
        });
        return toDriveFileList(response.data);
      });

      for (const file of page.files) {
        files.push({
          id: file.id,
          name: file.name,
          mimeType: file.mimeType,
          size: file.size === undefined ? undefined : Number(file.size),
        });
      }
      pageToken = page.nextPageToken;
    } while (pageToken);

    this.logger.log(`[DRIVE] Listed ${files.length} file(s)`);
    return files;
  }

  async download(fileId: string): Promise<Buffer> {
    const startTime = Date.now();
    const content = await this.call('/drive/v3/files/{id}', async () => {
      const response = await this.auth.request<ArrayBuffer>({
        url: `${DRIVE_FILES_URL}/${encodeURIComponent(fileId)}`,
        method: 'GET',
        params: { alt: 'media' },
        responseType: 'arraybuffer',
      });
      return Buffer.from(response.data);
    });

    this.logger.debug(
      `[DRIVE] Downloaded ${fileId} - Bytes: ${content.length}, Time: ${Date.now() - startTime}ms`,
    );
    return content;
  }

  private async call<T>(
    upstreamPath: string,
    request: () => Promise<T>,
  ): Promise<T> {
    try {
      return await request();
    } catch (error) {
      const status = statusOf(error);
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`[DRIVE] ${upstreamPath} failed (${status})`);
      throw new UpstreamError({
        status,
        message: `Drive request failed: ${reason}`,
        requestId: randomUUID(),
        upstreamPath,
      });
    }
  }
}
