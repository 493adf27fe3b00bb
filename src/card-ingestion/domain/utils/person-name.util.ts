export type PersonName = {
  firstName: string;
  lastName: string;
};

// Particles that belong to the surname: "Ana de la Cruz", "Jan van Dijk"
const SURNAME_CONNECTORS = new Set([
  'de',
  'del',
  'della',
  'der',
  'den',
  'la',
  'las',
  'los',
  'da',
  'do',
  'dos',
  'das',
  'di',
  'du',
  'le',
  'van',
  'von',
  'ter',
  'ten',
  'st',
  'st.',
  'san',
  'santa',
  'bin',
  'ibn',
  'al',
  'el',
  'mac',
  'y',
]);

/**
 * Split a printed full name into mailing-list first and last name.
 *
 * The last token plus any connector particles in front of it form the
 * surname; everything before is the given name (middle initials included).
 * A single token is a first name only.
 */
export function splitPersonName(fullName: string): PersonName {
  const parts = fullName.trim().split(/\s+/).filter(Boolean);
  if (parts.length < 2) {
    return { firstName: parts[0] ?? '', lastName: '' };
  }

  let i = parts.length - 1;
  const last: string[] = [parts[i--]];
  while (i > 0 && SURNAME_CONNECTORS.has(parts[i].toLowerCase())) {
    last.unshift(parts[i--]);
  }

  return {
    firstName: parts.slice(0, i + 1).join(' '),
    lastName: last.join(' '),
  };
}
