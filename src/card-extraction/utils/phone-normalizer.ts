export const MIN_PHONE_DIGITS = 7;
export const MAX_PHONE_DIGITS = 15;

const EXTENSION_PATTERN = /(?:ext\.?|x|#)\s*(\d{1,6})\s*$/i;

/**
 * Canonical digit form of a phone number: the digits of the main number,
 * followed by `x<digits>` when an extension is printed.
 *
 * Returns null when the main number has fewer than 7 or more than 15 digits.
 * Normalizing an already normalized value returns it unchanged.
 */
export function normalizePhone(raw: string): string | null {
  const extension = EXTENSION_PATTERN.exec(raw);
  const main = extension ? raw.slice(0, extension.index) : raw;
  const digits = main.replace(/\D/g, '');

  if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) {
    return null;
  }

  return extension ? `${digits}x${extension[1]}` : digits;
}
