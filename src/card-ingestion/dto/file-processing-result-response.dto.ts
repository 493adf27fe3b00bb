import { ApiProperty } from '@nestjs/swagger';
import { CardProcessingState } from '../domain/enums/card-processing-state.enum';
import { FileProcessingStatus } from '../domain/enums/file-processing-status.enum';
import { ExtractionResponseDto } from './extraction-response.dto';

export class FileProcessingResultResponseDto {
  @ApiProperty({ example: 'upload:9f86d081884c7d65…' })
  sourceFileId!: string;

  @ApiProperty()
  fileName!: string;

  @ApiProperty({ enum: FileProcessingStatus })
  status!: FileProcessingStatus;

  @ApiProperty({ enum: CardProcessingState, required: false })
  state?: CardProcessingState;

  @ApiProperty({ required: false, example: 'no email' })
  reason?: string;

  @ApiProperty({ type: ExtractionResponseDto, required: false })
  extraction?: ExtractionResponseDto;
}

export class IngestionRunResponseDto {
  @ApiProperty()
  startedAt!: Date;

  @ApiProperty()
  finishedAt!: Date;

  @ApiProperty()
  total!: number;

  @ApiProperty()
  accepted!: number;

  @ApiProperty()
  skipped!: number;

  @ApiProperty()
  alreadyProcessed!: number;

  @ApiProperty()
  failed!: number;

  @ApiProperty({ type: [FileProcessingResultResponseDto] })
  results!: FileProcessingResultResponseDto[];
}
