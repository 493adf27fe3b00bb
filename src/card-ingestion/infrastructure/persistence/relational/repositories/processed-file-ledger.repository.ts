import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ExtractionOutcome } from '../../../../../card-extraction';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { ProcessedFileEntry } from '../../../../domain/entities/processed-file.entity';
import { ProcessedFileLedgerPort } from '../../../../domain/ports/processed-file-ledger.port';
import { ProcessedFileEntity } from '../entities/processed-file.entity';
import { ProcessedFileMapper } from '../mappers/processed-file.mapper';

@Injectable()
export class ProcessedFileLedgerRepository implements ProcessedFileLedgerPort {
  private readonly logger = new Logger(ProcessedFileLedgerRepository.name);

  constructor(
    @InjectRepository(ProcessedFileEntity)
    private readonly processedFileRepository: Repository<ProcessedFileEntity>,
  ) {}

  async hasProcessed(sourceFileId: string): Promise<boolean> {
    return this.processedFileRepository.exists({ where: { sourceFileId } });
  }

  /**
   * INSERT ... ON CONFLICT DO NOTHING RETURNING: a single statement, so two
   * workers racing on the same file cannot both create the entry.
   */
  async recordOutcome(
    sourceFileId: string,
    outcome: ExtractionOutcome,
    processedAt: Date,
    details?: { fileName?: string; detail?: string },
  ): Promise<boolean> {
    const entity = ProcessedFileMapper.toPersistence(
      new ProcessedFileEntry(
        sourceFileId,
        outcome,
        processedAt,
        details?.fileName ?? null,
        details?.detail ?? null,
      ),
    );

    const result = await this.processedFileRepository
      .createQueryBuilder()
      .insert()
      .into(ProcessedFileEntity)
      .values(entity)
      .orIgnore()
      .returning(['source_file_id'])
      .execute();

    const created = Array.isArray(result.raw) && result.raw.length > 0;
    this.logger.debug(
      `[LEDGER] recordOutcome ${sourceFileId} ${outcome} - Created: ${created}`,
    );
    return created;
  }

  async findBySourceFileId(
    sourceFileId: string,
  ): Promise<NullableType<ProcessedFileEntry>> {
    const entity = await this.processedFileRepository.findOne({
      where: { sourceFileId },
    });
    return entity ? ProcessedFileMapper.toDomain(entity) : null;
  }

  async list(options: {
    skip: number;
    limit: number;
    outcome?: ExtractionOutcome;
  }): Promise<{ data: ProcessedFileEntry[]; total: number }> {
    const [entities, total] = await this.processedFileRepository.findAndCount({
      where: options.outcome ? { outcome: options.outcome } : {},
      skip: options.skip,
      take: options.limit,
      order: { processedAt: 'DESC' },
    });

    return {
      data: entities.map((entity) => ProcessedFileMapper.toDomain(entity)),
      total,
    };
  }
}
