import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryColumn,
} from 'typeorm';
import { ExtractionOutcome } from '../../../../../card-extraction';

@Entity({ name: 'processed_files' })
export class ProcessedFileEntity {
  @PrimaryColumn({ name: 'source_file_id', type: 'varchar', length: 255 })
  sourceFileId!: string;

  @Column({ type: 'enum', enum: ExtractionOutcome })
  outcome!: ExtractionOutcome;

  @Column({ name: 'file_name', type: 'varchar', length: 512, nullable: true })
  fileName!: string | null;

  // Skip reason for SKIPPED entries
  @Column({ type: 'varchar', length: 255, nullable: true })
  detail!: string | null;

  @Column({ name: 'processed_at', type: 'timestamptz' })
  @Index()
  processedAt!: Date;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
