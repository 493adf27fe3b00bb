import { ApiProperty } from '@nestjs/swagger';
import {
  ArrayMaxSize,
  IsArray,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class ExtractCardDto {
  @ApiProperty({
    type: [String],
    description: 'Raw OCR lines of one card, in reading order',
    example: ['Jane Smith', 'Marketing Director', 'jane@acme.com'],
    maxItems: 200,
  })
  @IsArray()
  @ArrayMaxSize(200)
  @IsString({ each: true })
  @MaxLength(1000, { each: true })
  lines!: string[];

  @ApiProperty({
    required: false,
    description: 'Identifier echoed into the contact record',
    default: 'inline',
    maxLength: 255,
  })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  sourceFileId?: string;
}
