import { SourceFile } from '../entities/source-file.entity';

export interface CardSourcePort {
  /** Every candidate file currently in the source folder */
  listFiles(): Promise<SourceFile[]>;
  download(fileId: string): Promise<Buffer>;
}
