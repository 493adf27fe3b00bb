import { ProcessedFileEntry } from '../../../../domain/entities/processed-file.entity';
import { ProcessedFileEntity } from '../entities/processed-file.entity';

export class ProcessedFileMapper {
  static toDomain(entity: ProcessedFileEntity): ProcessedFileEntry {
    return new ProcessedFileEntry(
      entity.sourceFileId,
      entity.outcome,
      entity.processedAt,
      entity.fileName,
      entity.detail,
      entity.createdAt,
    );
  }

  static toPersistence(domain: ProcessedFileEntry): ProcessedFileEntity {
    const entity = new ProcessedFileEntity();
    entity.sourceFileId = domain.sourceFileId;
    entity.outcome = domain.outcome;
    entity.fileName = domain.fileName;
    entity.detail = domain.detail;
    entity.processedAt = domain.processedAt;
    if (domain.createdAt) entity.createdAt = domain.createdAt;
    return entity;
  }
}
