import { extractContact } from './card-extractor';
import {
  ExtractionOutcome,
  SkipReason,
} from './domain/enums/extraction-outcome.enum';

describe('extractContact', () => {
  it('should extract a complete contact from a typical card', () => {
    const result = extractContact(
      [
        'Jane A. Smith',
        'Marketing Director',
        'Acme Corp',
        'jane.smith@acme.com',
        '+1 (555) 012-3456',
        'www.acme.com',
      ],
      'drive-file-1',
    );

    expect(result.outcome).toBe(ExtractionOutcome.ACCEPTED);
    if (result.outcome !== ExtractionOutcome.ACCEPTED) return;

    expect(result.contact).toEqual({
      sourceFileId: 'drive-file-1',
      email: 'jane.smith@acme.com',
      phones: ['15550123456'],
      name: 'Jane A. Smith',
      title: 'Marketing Director',
      company: 'Acme Corp',
      website: 'www.acme.com',
    });
    expect(result.fields.name).toEqual({
      value: 'Jane A. Smith',
      lineIndex: 0,
      confidence: 0.9,
    });
    expect(result.fields.company?.lineIndex).toBe(2);
  });

  it('should skip a card with no email', () => {
    const result = extractContact(
      ['Acme Corp', '123 Main St', '(555) 012-3456'],
      'drive-file-2',
    );

    expect(result.outcome).toBe(ExtractionOutcome.SKIPPED);
    if (result.outcome !== ExtractionOutcome.SKIPPED) return;

    expect(result.reason).toBe(SkipReason.NO_EMAIL);
    expect(result.fields.company?.value).toBe('Acme Corp');
    expect(result.fields.phones.map((p) => p.value)).toEqual(['5550123456']);
  });

  it('should report provenance against the normalized lines', () => {
    const result = extractContact(
      ['', '  Jane   Smith ', '---', 'jane@acme.com'],
      'upload:abc',
    );

    expect(result.lines).toEqual(['Jane Smith', 'jane@acme.com']);
    expect(result.fields.email?.lineIndex).toBe(1);
    expect(result.fields.name?.lineIndex).toBe(0);
  });

  it('should never assign one line to two fields', () => {
    const result = extractContact(
      [
        'Jane Smith',
        'Director, Acme Inc',
        'jane@acme.com | www.acme.com',
        'T: 555-012-3456 | M: 555-012-7890',
        'Fax: 555-012-9999',
      ],
      'drive-file-3',
    );

    const { phones, ...single } = result.fields;
    const lineIndexes = [
      ...new Set(phones.map((p) => p.lineIndex)),
      ...Object.values(single).flatMap((f) => (f ? [f.lineIndex] : [])),
    ];

    expect(new Set(lineIndexes).size).toBe(lineIndexes.length);
    expect(result.fields.company?.value).toBe('Director, Acme Inc');
    expect(result.fields.title).toBeUndefined();
    expect(result.fields.website).toBeUndefined();
    expect(phones.map((p) => p.value)).toEqual(['5550123456', '5550127890']);
  });

  describe('email lines', () => {
    it('should keep an email printed beside a phone number', () => {
      const result = extractContact(
        ['Jane Smith', 'Reach me 555-012-3456 or jane@acme.com'],
        'f',
      );

      expect(result.outcome).toBe(ExtractionOutcome.ACCEPTED);
      expect(result.fields.email).toEqual({
        value: 'jane@acme.com',
        lineIndex: 1,
        confidence: 0.7,
      });
      expect(result.fields.phones).toEqual([]);
    });

    it('should keep an email printed beside a website', () => {
      const result = extractContact(
        ['Jane Smith', 'Contact jane@acme.com or visit www.acme.com'],
        'f',
      );

      expect(result.outcome).toBe(ExtractionOutcome.ACCEPTED);
      expect(result.fields.email?.value).toBe('jane@acme.com');
      expect(result.fields.website).toBeUndefined();
      expect(result.fields.name?.value).toBe('Jane Smith');
    });

    it('should prefer a standalone address over one inside a sentence', () => {
      const result = extractContact(
        ['Write to sales@acme.com today', 'jane@acme.com'],
        'f',
      );

      expect(result.fields.email).toEqual({
        value: 'jane@acme.com',
        lineIndex: 1,
        confidence: 0.95,
      });
    });

    it('should take the higher of two standalone addresses', () => {
      const result = extractContact(['jane@acme.com', 'sales@acme.com'], 'f');

      expect(result.fields.email).toEqual({
        value: 'jane@acme.com',
        lineIndex: 0,
        confidence: 0.95,
      });
    });
  });

  it('should read a suffixed line under the title as the company', () => {
    const result = extractContact(
      ['Jane Smith', 'Sales Manager', 'Lead Generation Inc', 'jane@lg.com'],
      'f',
    );

    expect(result.fields.title?.value).toBe('Sales Manager');
    expect(result.fields.company).toEqual({
      value: 'Lead Generation Inc',
      lineIndex: 2,
      confidence: 0.85,
    });
  });

  it('should keep a labelled phone line apart from the company above it', () => {
    const result = extractContact(
      ['Jane Smith', 'Acme Corp', 'tel 555 012 3456', 'jane@acme.com'],
      'f',
    );

    expect(result.lines).toEqual([
      'Jane Smith',
      'Acme Corp',
      'tel 555 012 3456',
      'jane@acme.com',
    ]);
    expect(result.fields.company?.value).toBe('Acme Corp');
    expect(result.fields.phones.map((p) => p.value)).toEqual(['5550123456']);
  });

  it('should accept a name with initials or a degree', () => {
    const result = extractContact(
      ['Jane A.Smith', 'jane@acme.com', 'John Doe M.Sc'],
      'f',
    );

    expect(result.fields.name?.value).toBe('Jane A.Smith');
    expect(result.fields.website).toBeUndefined();
  });

  it('should be deterministic', () => {
    const lines = ['Jane Smith', 'jane@acme.com', 'Acme Corp'];

    expect(extractContact(lines, 'f')).toEqual(extractContact(lines, 'f'));
  });

  it('should honour custom thresholds', () => {
    const result = extractContact(['Northwind', 'jane@acme.com'], 'f', {
      acceptanceThreshold: 0.6,
      minConfidence: 0.5,
    });

    expect(result.fields.company).toBeUndefined();
  });
});
