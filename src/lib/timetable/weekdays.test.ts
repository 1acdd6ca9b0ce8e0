import { describe, expect, it } from 'vitest';

import {
  matchWeekday,
  normalizeLabel,
  WEEKDAY_VOCABULARIES,
} from '@/lib/timetable/weekdays';

const de = WEEKDAY_VOCABULARIES.de;
const en = WEEKDAY_VOCABULARIES.en;

describe('matchWeekday', () => {
  it('matches full names regardless of case and padding', () => {
    expect(matchWeekday('MONTAG', de)).toBe(0);
    expect(matchWeekday('  Freitag\n', de)).toBe(4);
    expect(matchWeekday('wednesday', en)).toBe(2);
  });

  it('accepts a full name followed by other text', () => {
    expect(matchWeekday('Donnerstag 12.10.', de)).toBe(3);
    expect(matchWeekday('Monday (week A)', en)).toBe(0);
  });

  it('reads the first non-empty line only', () => {
    expect(matchWeekday('\nDienstag\nMATH MM E201', de)).toBe(1);
  });

  it('accepts unique abbreviations', () => {
    expect(matchWeekday('Mo.', de)).toBe(0);
    expect(matchWeekday('Di', de)).toBe(1);
    expect(matchWeekday('Mi', de)).toBe(2);
    expect(matchWeekday('Do 14.10.', de)).toBe(3);
    expect(matchWeekday('Fr', de)).toBe(4);
    expect(matchWeekday('Th', en)).toBe(3);
    expect(matchWeekday('Tu', en)).toBe(1);
  });

  it('does not read lesson text as an abbreviated weekday', () => {
    expect(matchWeekday('FR KK E1', de)).toBeNull();
    expect(matchWeekday('Mo Klasse', de)).toBeNull();
  });

  it('rejects single letters and ambiguous prefixes', () => {
    expect(matchWeekday('T', en)).toBeNull();
    expect(matchWeekday('Sa', ['Saturday', 'Sunday', 'Sabbath'])).toBeNull();
  });

  it('ignores diacritics', () => {
    const cs = ['Pondělí', 'Úterý', 'Středa', 'Čtvrtek', 'Pátek'];
    expect(matchWeekday('Utery', cs)).toBe(1);
    expect(matchWeekday('ČTVRTEK', cs)).toBe(3);
  });

  it('returns null for cells that are not weekday labels', () => {
    expect(matchWeekday('', de)).toBeNull();
    expect(matchWeekday('1', de)).toBeNull();
    expect(matchWeekday('Klasse 5a', de)).toBeNull();
  });
});

describe('normalizeLabel', () => {
  it('lowercases and strips combining marks', () => {
    expect(normalizeLabel('Pondělí')).toBe('pondeli');
  });
});
