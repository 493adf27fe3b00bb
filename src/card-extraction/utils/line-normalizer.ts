import {
  EMAIL_PATTERN,
  containsWebsite,
  startsWithContactLabel,
} from './contact-patterns';

const NOISE_ONLY_PATTERN = /^[^\p{L}\p{N}]*$/u;

// Borders and bullets OCR picks up around a line; trailing "-" is left alone
// because it marks a hyphenated wrap.
const LEADING_GLYPHS_PATTERN = /^[|•·*~_=#>»\-–—\s]+/u;
const TRAILING_GLYPHS_PATTERN = /[|•·*~_=#<«\s]+$/u;

const WRAPPABLE_END_PATTERN = /[\p{L}-]$/u;
const HYPHENATED_END_PATTERN = /\p{L}-$/u;
const CONTINUATION_START_PATTERN = /^\p{Ll}/u;

function cleanLine(raw: string): string {
  return raw
    .replace(/\s+/g, ' ')
    .replace(LEADING_GLYPHS_PATTERN, '')
    .replace(TRAILING_GLYPHS_PATTERN, '')
    .trim();
}

function isContinuation(previous: string, next: string): boolean {
  if (!WRAPPABLE_END_PATTERN.test(previous)) return false;
  if (!CONTINUATION_START_PATTERN.test(next)) return false;
  // Lowercase e-mail addresses and domains start lines of their own
  if (next.includes('@') || /www\.|:\/\//i.test(next)) return false;
  if (EMAIL_PATTERN.test(next) || containsWebsite(next)) return false;
  // "tel 555 012 3456" and "suite 200" are lines of their own
  if (/\d/.test(next) || startsWithContactLabel(next)) return false;
  return true;
}

function joinWrapped(previous: string, next: string): string {
  if (HYPHENATED_END_PATTERN.test(previous)) {
    return `${previous.slice(0, -1)}${next}`;
  }
  return `${previous} ${next}`;
}

/**
 * Clean the raw OCR lines of one card.
 *
 * Collapses whitespace, drops empty and glyph-only lines and re-joins words
 * that OCR wrapped onto the next line. Output order follows input order.
 *
 * @throws TypeError when `lines` is not an array of strings
 */
export function normalizeLines(lines: readonly string[]): string[] {
  const input: unknown = lines;
  if (!Array.isArray(input)) {
    throw new TypeError('OCR lines must be an array of strings');
  }

  const normalized: string[] = [];

  lines.forEach((raw: unknown, index: number) => {
    if (typeof raw !== 'string') {
      throw new TypeError(`OCR line ${index} is not a string`);
    }

    const line = cleanLine(raw);
    if (!line || NOISE_ONLY_PATTERN.test(line)) {
      return;
    }

    const last = normalized.length - 1;
    if (last >= 0 && isContinuation(normalized[last], line)) {
      normalized[last] = joinWrapped(normalized[last], line);
      return;
    }

    normalized.push(line);
  });

  return normalized;
}
