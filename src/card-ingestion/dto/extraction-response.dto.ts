import { ApiProperty } from '@nestjs/swagger';
import { ExtractionOutcome, SkipReason } from '../../card-extraction';

export class ResolvedFieldResponseDto {
  @ApiProperty({ example: 'jane@acme.com' })
  value!: string;

  @ApiProperty({ description: 'Index into the normalized lines' })
  lineIndex!: number;

  @ApiProperty({ minimum: 0, maximum: 1 })
  confidence!: number;
}

export class ResolvedFieldsResponseDto {
  @ApiProperty({ type: ResolvedFieldResponseDto, required: false })
  email?: ResolvedFieldResponseDto;

  @ApiProperty({ type: ResolvedFieldResponseDto, required: false })
  website?: ResolvedFieldResponseDto;

  @ApiProperty({ type: ResolvedFieldResponseDto, required: false })
  name?: ResolvedFieldResponseDto;

  @ApiProperty({ type: ResolvedFieldResponseDto, required: false })
  title?: ResolvedFieldResponseDto;

  @ApiProperty({ type: ResolvedFieldResponseDto, required: false })
  company?: ResolvedFieldResponseDto;

  @ApiProperty({ type: [ResolvedFieldResponseDto] })
  phones!: ResolvedFieldResponseDto[];
}

export class ContactResponseDto {
  @ApiProperty()
  sourceFileId!: string;

  @ApiProperty({ example: 'jane@acme.com' })
  email!: string;

  @ApiProperty({ type: [String], example: ['+15551234567'] })
  phones!: string[];

  @ApiProperty({ required: false })
  name?: string;

  @ApiProperty({ required: false })
  title?: string;

  @ApiProperty({ required: false })
  company?: string;

  @ApiProperty({ required: false })
  website?: string;
}

export class ExtractionResponseDto {
  @ApiProperty({ enum: ExtractionOutcome })
  outcome!: ExtractionOutcome;

  @ApiProperty({ enum: SkipReason, required: false })
  reason?: SkipReason;

  @ApiProperty({ type: ContactResponseDto, required: false })
  contact?: ContactResponseDto;

  @ApiProperty({ type: ResolvedFieldsResponseDto })
  fields!: ResolvedFieldsResponseDto;

  @ApiProperty({
    type: [String],
    description: 'Normalized lines that lineIndex refers to',
  })
  lines!: string[];
}
