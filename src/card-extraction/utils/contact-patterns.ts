import vocabulary from '../data/vocabulary.json';

/**
 * Shared patterns for business card lines.
 *
 * Non-global regexes are exported for `test`; helpers that scan a whole line
 * build their own global copy so no `lastIndex` state leaks between calls.
 */

export const EMAIL_PATTERN = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i;

export const WEBSITE_PATTERN =
  /\b(?:https?:\/\/)?(?:www\.)?(?:[a-z0-9](?:[a-z0-9-]*[a-z0-9])?\.)+[a-z]{2,}\b(?:\/[^\s]*)?/i;

// Contact labels printed in front of a value: "E:", "Tel.", "Mobile", "Web:"
const CONTACT_LABEL_PATTERN =
  /\b(?:(?:e-?mail|mail|tel|telephone|phone|ph|mobile|mob|cell|office|direct|main|work|web|website|url)\b\s*[:.]?|[etmpodcw]\s*:)/gi;

const LEADING_CONTACT_LABEL_PATTERN = new RegExp(
  `^${CONTACT_LABEL_PATTERN.source}`,
  'i',
);

const WEBSITE_PREFIX_PATTERN = /^(?:https?:\/\/|www\.)/i;

const FAX_PATTERN = /\bfax\b|\bf\s*:/i;

const LETTER_PATTERN = /\p{L}/u;

function escapeForPattern(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const TITLE_PATTERN = new RegExp(
  `\\b(?:${[...vocabulary.titleKeywords]
    .sort((a, b) => b.length - a.length)
    .map(escapeForPattern)
    .join('|')})\\b`,
  'i',
);

const COMPANY_SUFFIXES = new Set(vocabulary.companySuffixes);
const ORGANIZATION_WORDS = new Set(vocabulary.organizationWords);

export function matchAllEmails(line: string): string[] {
  return Array.from(
    line.matchAll(new RegExp(EMAIL_PATTERN.source, 'gi')),
    (match) => match[0],
  );
}

export function blankOutEmails(line: string): string {
  return line.replace(new RegExp(EMAIL_PATTERN.source, 'gi'), ' ');
}

/**
 * A bare domain needs labels of two or more characters and a TLD in one case,
 * which keeps "M.Sc" and "A.Smith" out.
 */
function isPlausibleWebsite(match: string): boolean {
  if (WEBSITE_PREFIX_PATTERN.test(match)) return true;

  const labels = match.split('/')[0].split('.');
  const tld = labels[labels.length - 1];
  return (
    labels.every((label) => label.length >= 2) &&
    (tld === tld.toLowerCase() || tld === tld.toUpperCase())
  );
}

export function matchAllWebsites(line: string): string[] {
  return Array.from(
    blankOutEmails(line).matchAll(new RegExp(WEBSITE_PATTERN.source, 'gi')),
    (match) => match[0],
  ).filter(isPlausibleWebsite);
}

export function containsWebsite(line: string): boolean {
  return matchAllWebsites(line).length > 0;
}

export function startsWithContactLabel(line: string): boolean {
  return LEADING_CONTACT_LABEL_PATTERN.test(line);
}

export function isFaxLine(line: string): boolean {
  return FAX_PATTERN.test(line);
}

export function hasTitleKeyword(line: string): boolean {
  return TITLE_PATTERN.test(line);
}

function lowerTokens(line: string): string[] {
  return line
    .toLowerCase()
    .split(/[\s,&()]+/)
    .map((token) => token.replace(/\.+$/, ''))
    .filter(Boolean);
}

export function hasCompanySuffix(line: string): boolean {
  return lowerTokens(line).some((token) => COMPANY_SUFFIXES.has(token));
}

export function hasOrganizationWord(line: string): boolean {
  return lowerTokens(line).some((token) => ORGANIZATION_WORDS.has(token));
}

/**
 * Whether anything alphabetic is left on the line once the given matches and
 * any contact labels are removed.
 */
export function hasOtherWords(line: string, matches: string[]): boolean {
  let rest = line;
  for (const match of matches) {
    rest = rest.replace(match, ' ');
  }
  rest = rest.replace(CONTACT_LABEL_PATTERN, ' ');
  return LETTER_PATTERN.test(rest);
}

export function hasLetters(line: string): boolean {
  return LETTER_PATTERN.test(line);
}

/**
 * Clamp to [0, 1] and round to two decimals so scores compare exactly.
 */
export function toScore(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 100) / 100;
}
