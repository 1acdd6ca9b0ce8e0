export type WeekdayVocabulary = readonly string[];

export const WEEKDAY_VOCABULARIES = {
  de: ['Montag', 'Dienstag', 'Mittwoch', 'Donnerstag', 'Freitag'],
  en: ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday'],
} as const satisfies Record<string, WeekdayVocabulary>;

export type WeekdayLocale = keyof typeof WEEKDAY_VOCABULARIES;

export const DEFAULT_WEEKDAYS: WeekdayVocabulary = WEEKDAY_VOCABULARIES.de;

const MIN_ABBREVIATION_LENGTH = 2;

export function normalizeLabel(value: string): string {
  return value
    .normalize('NFD')
    .replaceAll(/\p{M}/gu, '')
    .toLowerCase();
}

function firstLine(text: string): string {
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.length > 0) return trimmed;
  }
  return '';
}

/**
 * Index of the weekday a header cell names, or null.
 *
 * A full name may be followed by anything ("Montag 12.10.", "Monday (A)").
 * An abbreviation must be a unique prefix and may only be followed by digits
 * and punctuation, so lesson text such as "FR KK E1" is not read as Friday.
 */
export function matchWeekday(
  text: string,
  vocabulary: WeekdayVocabulary,
): number | null {
  const line = normalizeLabel(firstLine(text));
  const match = line.match(/^(\p{L}+)(.*)$/u);
  if (!match) return null;
  const word = match[1] ?? '';
  const rest = match[2] ?? '';

  const names = vocabulary.map((name) => normalizeLabel(name));

  const exact = names.indexOf(word);
  if (exact !== -1) return exact;

  if (word.length < MIN_ABBREVIATION_LENGTH) return null;
  if (/\p{L}/u.test(rest)) return null;

  const candidates = names
    .map((name, index) => (name.startsWith(word) ? index : -1))
    .filter((index) => index !== -1);
  return candidates.length === 1 ? (candidates[0] ?? null) : null;
}
