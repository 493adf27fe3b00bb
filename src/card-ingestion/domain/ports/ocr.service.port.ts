export interface OcrResult {
  lines: string[]; // Raw text lines in reading order
  pageCount: number;
}

export interface OcrServicePort {
  /**
   * Recognize the printed text of one card.
   * Returns no lines (never throws) when the image holds no text.
   */
  recognize(content: Buffer, mimeType: string): Promise<OcrResult>;
}
