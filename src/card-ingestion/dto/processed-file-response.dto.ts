import { ApiProperty } from '@nestjs/swagger';
import { ExtractionOutcome } from '../../card-extraction';

export class ProcessedFileResponseDto {
  @ApiProperty()
  sourceFileId!: string;

  @ApiProperty({ enum: ExtractionOutcome })
  outcome!: ExtractionOutcome;

  @ApiProperty()
  processedAt!: Date;

  @ApiProperty({ type: String, nullable: true })
  fileName!: string | null;

  @ApiProperty({ type: String, nullable: true, example: 'no email' })
  detail!: string | null;
}
