export * from './domain/enums/field-type.enum';
export * from './domain/enums/extraction-outcome.enum';
export * from './domain/entities/candidate.entity';
export * from './domain/entities/contact-record.entity';
export * from './detectors';
export { resolveFields, pickBest } from './field-resolver';
export { assembleContact } from './contact-assembler';
export {
  extractContact,
  ExtractionOptions,
  DEFAULT_EXTRACTION_OPTIONS,
} from './card-extractor';
export { normalizeLines } from './utils/line-normalizer';
export { normalizePhone } from './utils/phone-normalizer';
