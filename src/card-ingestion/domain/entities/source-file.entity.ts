/**
 * A card image or PDF as listed by a card source.
 */
export interface SourceFile {
  id: string; // Stable identifier, used as the ledger key
  name: string;
  mimeType: string;
  size?: number;
}
