/**
 * Contact fields a business card can carry.
 *
 * Declaration order is the resolution priority: a line claimed by an earlier
 * field is not available to a later one.
 */
export enum FieldType {
  EMAIL = 'email',
  PHONE = 'phone',
  WEBSITE = 'website',
  NAME = 'name',
  TITLE = 'title',
  COMPANY = 'company',
}

export const FIELD_PRIORITY: readonly FieldType[] = [
  FieldType.EMAIL,
  FieldType.PHONE,
  FieldType.WEBSITE,
  FieldType.NAME,
  FieldType.TITLE,
  FieldType.COMPANY,
];

export type SingleValuedField = Exclude<FieldType, FieldType.PHONE>;
