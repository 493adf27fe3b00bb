import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { CardIngestionDomainService } from './card-ingestion.domain.service';
import { CardSourcePort } from '../ports/card-source.port';
import { ContactSinkPort } from '../ports/contact-sink.port';
import { OcrServicePort } from '../ports/ocr.service.port';
import { SourceFile } from '../entities/source-file.entity';
import { CardProcessingState } from '../enums/card-processing-state.enum';
import { FileProcessingStatus } from '../enums/file-processing-status.enum';
import { ExtractionOutcome } from '../../../card-extraction';
import { UpstreamError } from '../../../utils/upstream-error';
import { InMemoryProcessedFileLedger } from '../../../../test/utils/in-memory-processed-file-ledger';
import { createTestConfigService } from '../../../../test/utils/test-helpers';
import {
  CARD_WITHOUT_EMAIL_LINES,
  TYPICAL_CARD_LINES,
} from '../../../../test/utils/constants';

describe('CardIngestionDomainService', () => {
  let service: CardIngestionDomainService;
  let ledger: InMemoryProcessedFileLedger;
  let mockSource: jest.Mocked<CardSourcePort>;
  let mockOcr: jest.Mocked<OcrServicePort>;
  let mockSink: jest.Mocked<ContactSinkPort>;

  const cardFile: SourceFile = {
    id: 'drive-file-1',
    name: 'jane.jpg',
    mimeType: 'image/jpeg',
  };
  const loadContent = () => Promise.resolve(Buffer.from('image-bytes'));

  beforeEach(async () => {
    ledger = new InMemoryProcessedFileLedger();
    mockSource = {
      listFiles: jest.fn(),
      download: jest.fn().mockResolvedValue(Buffer.from('image-bytes')),
    };
    mockOcr = {
      recognize: jest
        .fn()
        .mockResolvedValue({ lines: TYPICAL_CARD_LINES, pageCount: 1 }),
    };
    mockSink = {
      upsert: jest.fn().mockResolvedValue(undefined),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CardIngestionDomainService,
        { provide: 'ProcessedFileLedgerPort', useValue: ledger },
        { provide: 'CardSourcePort', useValue: mockSource },
        { provide: 'OcrServicePort', useValue: mockOcr },
        { provide: 'ContactSinkPort', useValue: mockSink },
        { provide: ConfigService, useValue: createTestConfigService() },
      ],
    }).compile();

    service = module.get<CardIngestionDomainService>(
      CardIngestionDomainService,
    );
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('processFile', () => {
    it('should upsert and record an accepted card', async () => {
      const result = await service.processFile(cardFile, loadContent);

      expect(result.status).toBe(FileProcessingStatus.ACCEPTED);
      expect(result.state).toBe(CardProcessingState.RECORDED);
      expect(mockOcr.recognize).toHaveBeenCalledWith(
        Buffer.from('image-bytes'),
        'image/jpeg',
      );
      expect(mockSink.upsert).toHaveBeenCalledWith({
        sourceFileId: 'drive-file-1',
        email: 'jane.smith@acme.com',
        phones: ['15550123456'],
        name: 'Jane A. Smith',
        title: 'Marketing Director',
        company: 'Acme Corp',
        website: 'www.acme.com',
      });

      const entry = await ledger.findBySourceFileId('drive-file-1');
      expect(entry?.outcome).toBe(ExtractionOutcome.ACCEPTED);
      expect(entry?.fileName).toBe('jane.jpg');
      expect(entry?.detail).toBeNull();
    });

    it('should record a card without email as skipped and never upsert it', async () => {
      mockOcr.recognize.mockResolvedValue({
        lines: CARD_WITHOUT_EMAIL_LINES,
        pageCount: 1,
      });

      const result = await service.processFile(cardFile, loadContent);

      expect(result.status).toBe(FileProcessingStatus.SKIPPED);
      expect(result.reason).toBe('no email');
      expect(mockSink.upsert).not.toHaveBeenCalled();
      expect((await ledger.findBySourceFileId('drive-file-1'))?.detail).toBe(
        'no email',
      );
    });

    it('should skip a card with no text at all', async () => {
      mockOcr.recognize.mockResolvedValue({ lines: [], pageCount: 1 });

      const result = await service.processFile(cardFile, loadContent);

      expect(result.status).toBe(FileProcessingStatus.SKIPPED);
      expect(ledger.entries.size).toBe(1);
    });

    it('should not touch any collaborator for a recorded file', async () => {
      await ledger.recordOutcome(
        'drive-file-1',
        ExtractionOutcome.SKIPPED,
        new Date(),
      );
      const load = jest.fn(loadContent);

      const result = await service.processFile(cardFile, load);

      expect(result).toEqual({
        sourceFileId: 'drive-file-1',
        fileName: 'jane.jpg',
        status: FileProcessingStatus.ALREADY_PROCESSED,
      });
      expect(load).not.toHaveBeenCalled();
      expect(mockOcr.recognize).not.toHaveBeenCalled();
      expect(mockSink.upsert).not.toHaveBeenCalled();
    });

    it('should process a file only once across sequential runs', async () => {
      await service.processFile(cardFile, loadContent);
      const second = await service.processFile(cardFile, loadContent);

      expect(second.status).toBe(FileProcessingStatus.ALREADY_PROCESSED);
      expect(mockSink.upsert).toHaveBeenCalledTimes(1);
    });

    it('should share one run between concurrent calls for the same file', async () => {
      const recordSpy = jest.spyOn(ledger, 'recordOutcome');

      const [first, second] = await Promise.all([
        service.processFile(cardFile, loadContent),
        service.processFile(cardFile, loadContent),
      ]);

      expect(first).toBe(second);
      expect(mockOcr.recognize).toHaveBeenCalledTimes(1);
      expect(mockSink.upsert).toHaveBeenCalledTimes(1);
      expect(recordSpy).toHaveBeenCalledTimes(1);
    });

    it('should fail without recording when the upsert fails', async () => {
      mockSink.upsert.mockRejectedValue(
        new UpstreamError({
          status: 503,
          message: 'Service Unavailable',
          requestId: 'req-1',
          upstreamPath: '/3.0/lists/list-1/members',
        }),
      );

      const result = await service.processFile(cardFile, loadContent);

      expect(result).toEqual({
        sourceFileId: 'drive-file-1',
        fileName: 'jane.jpg',
        status: FileProcessingStatus.FAILED,
        state: CardProcessingState.FAILED,
        reason: 'Service Unavailable',
      });
      expect(await ledger.hasProcessed('drive-file-1')).toBe(false);
    });

    it('should retry a failed file on the next call', async () => {
      mockOcr.recognize.mockRejectedValueOnce(new Error('OCR unavailable'));

      const failed = await service.processFile(cardFile, loadContent);
      const retried = await service.processFile(cardFile, loadContent);

      expect(failed.status).toBe(FileProcessingStatus.FAILED);
      expect(retried.status).toBe(FileProcessingStatus.ACCEPTED);
    });

    it('should fail when the content cannot be downloaded', async () => {
      const result = await service.processFile(cardFile, () =>
        Promise.reject(new Error('download failed')),
      );

      expect(result.status).toBe(FileProcessingStatus.FAILED);
      expect(result.reason).toBe('download failed');
      expect(mockOcr.recognize).not.toHaveBeenCalled();
    });
  });

  describe('runIngestion', () => {
    it('should process eligible files and summarize the run', async () => {
      mockSource.listFiles.mockResolvedValue([
        { id: 'a', name: 'a.jpg', mimeType: 'image/jpeg' },
        { id: 'b', name: 'b.pdf', mimeType: 'application/pdf' },
        { id: 'c', name: 'notes.txt', mimeType: 'text/plain' },
        { id: 'd', name: 'd.png', mimeType: 'image/png' },
      ]);
      mockOcr.recognize.mockImplementation((_content, mimeType) =>
        Promise.resolve({
          lines:
            mimeType === 'application/pdf'
              ? CARD_WITHOUT_EMAIL_LINES
              : TYPICAL_CARD_LINES,
          pageCount: 1,
        }),
      );
      await ledger.recordOutcome('d', ExtractionOutcome.ACCEPTED, new Date());

      const summary = await service.runIngestion();

      expect(summary.total).toBe(3);
      expect(summary.accepted).toBe(1);
      expect(summary.skipped).toBe(1);
      expect(summary.alreadyProcessed).toBe(1);
      expect(summary.failed).toBe(0);
      expect(summary.results.map((r) => r.sourceFileId)).toEqual([
        'a',
        'b',
        'd',
      ]);
      expect(mockSource.download).toHaveBeenCalledTimes(2);
    });

    it('should keep going when one file fails', async () => {
      mockSource.listFiles.mockResolvedValue([
        { id: 'a', name: 'a.jpg', mimeType: 'image/jpeg' },
        { id: 'b', name: 'b.jpg', mimeType: 'image/jpeg' },
      ]);
      mockSource.download.mockImplementation((fileId) =>
        fileId === 'a'
          ? Promise.reject(new Error('not found'))
          : Promise.resolve(Buffer.from('image-bytes')),
      );

      const summary = await service.runIngestion();

      expect(summary.failed).toBe(1);
      expect(summary.accepted).toBe(1);
      expect(await ledger.hasProcessed('a')).toBe(false);
      expect(await ledger.hasProcessed('b')).toBe(true);
    });

    it('should propagate a listing failure', async () => {
      mockSource.listFiles.mockRejectedValue(new Error('listing failed'));

      await expect(service.runIngestion()).rejects.toThrow('listing failed');
    });
  });
});
