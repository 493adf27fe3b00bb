import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
  Query,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiBody,
  ApiConsumes,
  ApiOkResponse,
  ApiOperation,
  ApiResponse,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { ServiceApiKeyGuard } from '../auth/guards/service-api-key.guard';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { UpstreamError } from '../utils/upstream-error';
import { CardIngestionService } from './card-ingestion.service';
import { ExtractCardDto } from './dto/extract-card.dto';
import { ExtractionResponseDto } from './dto/extraction-response.dto';
import {
  FileProcessingResultResponseDto,
  IngestionRunResponseDto,
} from './dto/file-processing-result-response.dto';
import { ProcessedFileQueryDto } from './dto/processed-file-query.dto';
import { ProcessedFileResponseDto } from './dto/processed-file-response.dto';

/**
 * Cards Controller
 *
 * - `extract` is a pure function of its body and needs no key
 * - Every other route requires the service API key
 * - Responses never include raw card bytes
 */
@ApiTags('Cards')
@Controller({ path: 'cards', version: '1' })
export class CardIngestionController {
  private readonly logger = new Logger(CardIngestionController.name);

  constructor(private readonly cardIngestionService: CardIngestionService) {}

  @Post('extract')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Extract contact fields from OCR lines',
    description:
      'Runs field detection and resolution on already-recognized text. Nothing is recorded or sent.',
  })
  @ApiOkResponse({ type: ExtractionResponseDto })
  @ApiBadRequestResponse({ description: 'Lines missing or not strings' })
  extract(@Body() dto: ExtractCardDto): ExtractionResponseDto {
    return this.cardIngestionService.extract(dto);
  }

  @Post('scan')
  @HttpCode(HttpStatus.OK)
  @UseGuards(ServiceApiKeyGuard)
  @ApiBearerAuth()
  @Throttle({ default: { limit: 10, ttl: 60000 } }) // 10 scans per minute
  @ApiOperation({
    summary: 'Scan one business card',
    description:
      'OCRs the uploaded image or PDF, extracts the contact and upserts it when an email is found. The same bytes are processed at most once.',
  })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        file: {
          type: 'string',
          format: 'binary',
          description: 'Card image (JPEG, PNG, WEBP, GIF) or PDF',
        },
      },
      required: ['file'],
    },
  })
  @ApiOkResponse({ type: FileProcessingResultResponseDto })
  @ApiBadRequestResponse({ description: 'Missing or unsupported file' })
  @ApiUnauthorizedResponse({ description: 'Missing or invalid service key' })
  @ApiResponse({ status: 429, description: 'Too many requests' })
  @UseInterceptors(FileInterceptor('file')) // Limits and filter from MulterModule
  async scan(
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<FileProcessingResultResponseDto> {
    if (!file) {
      this.logger.warn('[SCAN] No file provided');
      throw new BadRequestException('File is required');
    }

    return this.cardIngestionService.scanUpload(file);
  }

  @Post('ingestion-runs')
  @HttpCode(HttpStatus.OK)
  @UseGuards(ServiceApiKeyGuard)
  @ApiBearerAuth()
  @Throttle({ default: { limit: 2, ttl: 60000 } })
  @ApiOperation({
    summary: 'Process the card source once',
    description:
      'Lists the configured Drive folder or inbox and processes every card not yet in the ledger.',
  })
  @ApiOkResponse({ type: IngestionRunResponseDto })
  @ApiUnauthorizedResponse({ description: 'Missing or invalid service key' })
  @ApiResponse({ status: 502, description: 'Card source could not be listed' })
  @ApiResponse({ status: 503, description: 'No card source configured' })
  async runIngestion(): Promise<IngestionRunResponseDto> {
    try {
      return await this.cardIngestionService.runIngestion();
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Get('processed-files')
  @UseGuards(ServiceApiKeyGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'List ledger entries, newest first' })
  @ApiOkResponse({ type: InfinityPaginationResponseDto })
  @ApiUnauthorizedResponse({ description: 'Missing or invalid service key' })
  listProcessedFiles(
    @Query() query: ProcessedFileQueryDto,
  ): Promise<InfinityPaginationResponseDto<ProcessedFileResponseDto>> {
    return this.cardIngestionService.listProcessedFiles(query);
  }

  /**
   * Upstream failures surface as 502 with the upstream status in the body.
   */
  private handleError(error: unknown): HttpException {
    if (error instanceof UpstreamError) {
      return new HttpException(error.toJSON(), HttpStatus.BAD_GATEWAY);
    }

    if (error instanceof HttpException) {
      return error;
    }

    this.logger.error(
      `Unexpected error: ${error instanceof Error ? error.message : 'Unknown'}`,
    );

    return new HttpException(
      {
        error: 'InternalError',
        message: 'An unexpected error occurred',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}
