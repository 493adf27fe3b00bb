import { Injectable, Logger } from '@nestjs/common';
import { ImageAnnotatorClient } from '@google-cloud/vision';
import { randomUUID } from 'crypto';
import {
  OcrResult,
  OcrServicePort,
} from '../../domain/ports/ocr.service.port';
import { UpstreamError } from '../../../utils/upstream-error';

const PDF_MIME_TYPE = 'application/pdf';

/**
 * GCP Vision OCR Adapter
 *
 * Uses DOCUMENT_TEXT_DETECTION for every card:
 * - Images (JPEG, PNG, WEBP, GIF): synchronous `images:annotate`
 * - PDF: synchronous `files:annotate` on the first page only
 *
 * Content is sent inline; nothing is written to Cloud Storage. Credentials
 * come from Application Default Credentials.
 *
 * IAM Requirements:
 * - Service account needs: roles/cloudvision.apiUser
 */
@Injectable()
export class GcpVisionOcrAdapter implements OcrServicePort {
  private readonly logger = new Logger(GcpVisionOcrAdapter.name);
  private readonly client: ImageAnnotatorClient;

  constructor() {
    this.client = new ImageAnnotatorClient();
  }

  async recognize(content: Buffer, mimeType: string): Promise<OcrResult> {
    const startTime = Date.now();
    const isPdf = mimeType === PDF_MIME_TYPE;
    const upstreamPath = isPdf ? '/v1/files:annotate' : '/v1/images:annotate';

    this.logger.debug(
      `[VISION OCR] ${isPdf ? 'PDF' : 'Image'} request - MIME: ${mimeType}, Bytes: ${content.length}`,
    );

    let text: string;
    try {
      text = isPdf
        ? await this.recognizePdf(content)
        : await this.recognizeImage(content);
    } catch (error) {
      this.logger.error(
        `[VISION OCR] Request failed: ${this.sanitizeError(error)}`,
      );
      throw new UpstreamError({
        status: 502,
        message: `Vision OCR failed: ${this.sanitizeError(error)}`,
        requestId: randomUUID(),
        upstreamPath,
      });
    }

    const lines = text.split(/\r?\n/);
    this.logger.log(
      `[VISION OCR] Text extracted - Lines: ${lines.length}, Time: ${Date.now() - startTime}ms`,
    );

    return { lines: text ? lines : [], pageCount: 1 };
  }

  private async recognizeImage(content: Buffer): Promise<string> {
    const [response] = await this.client.batchAnnotateImages({
      requests: [
        {
          image: { content },
          features: [{ type: 'DOCUMENT_TEXT_DETECTION' }],
        },
      ],
    });

    const image = response.responses?.[0];
    if (image?.error?.message) {
      throw new Error(image.error.message);
    }
    return image?.fullTextAnnotation?.text ?? '';
  }

  private async recognizePdf(content: Buffer): Promise<string> {
    const [response] = await this.client.batchAnnotateFiles({
      requests: [
        {
          inputConfig: { content, mimeType: PDF_MIME_TYPE },
          features: [{ type: 'DOCUMENT_TEXT_DETECTION' }],
          pages: [1],
        },
      ],
    });

    const page = response.responses?.[0]?.responses?.[0];
    if (page?.error?.message) {
      throw new Error(page.error.message);
    }
    return page?.fullTextAnnotation?.text ?? '';
  }

  private sanitizeError(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    return message
      .replace(/projects\/[^/\s]+/g, 'projects/[PROJECT_REDACTED]')
      .substring(0, 200);
  }
}
