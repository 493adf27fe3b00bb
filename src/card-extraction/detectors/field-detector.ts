import { Candidate } from '../domain/entities/candidate.entity';
import { FieldType } from '../domain/enums/field-type.enum';

/**
 * One stateless pattern matcher per field type.
 *
 * `detect` sees the normalized lines of a single card and returns every
 * candidate it finds for its own field type; it never looks at other
 * detectors' output.
 */
export interface FieldDetector {
  readonly fieldType: FieldType;
  detect(lines: readonly string[]): Candidate[];
}
