import { FieldType } from '../enums/field-type.enum';

/**
 * Provisional value proposed by one detector.
 *
 * `confidence` lies in [0, 1] and only ranks candidates of the same field type.
 */
export interface Candidate {
  fieldType: FieldType;
  value: string;
  lineIndex: number; // Index into the normalized lines
  confidence: number;
}

export interface ResolvedField {
  value: string;
  lineIndex: number;
  confidence: number;
}

export interface ResolvedFields {
  email?: ResolvedField;
  website?: ResolvedField;
  name?: ResolvedField;
  title?: ResolvedField;
  company?: ResolvedField;
  phones: ResolvedField[];
}
