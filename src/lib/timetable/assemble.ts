import { parseCell } from '@/lib/timetable/cell';
import { CellParseError } from '@/lib/timetable/errors';
import { slotText, type ResolvedHeaders } from '@/lib/timetable/headers';
import { compareHours } from '@/lib/timetable/hours';
import type { ExtractedTimetable, Timetable } from '@/lib/timetable/types';
import type { WeekdayVocabulary } from '@/lib/timetable/weekdays';

const classTitleRegex = /\b(?:klasse|class)\s*[:\-]?\s*(\S+)/i;

export function classNameFromTitle(title: string | null): string | null {
  if (!title) return null;
  const match = title.match(classTitleRegex);
  const name = (match?.[1] ?? title).trim();
  return name.length > 0 ? name : null;
}

export function assembleTimetable(
  headers: ResolvedHeaders,
  vocabulary: WeekdayVocabulary,
): ExtractedTimetable {
  const timetable: Timetable = {};
  const hours = [...headers.hours].sort(compareHours);
  let className: string | null = null;

  for (const weekday of vocabulary) {
    const byHour: Timetable[string] = {};
    timetable[weekday] = byHour;
    if (!headers.weekdays.includes(weekday)) continue;

    for (const hour of hours) {
      const text = slotText(headers.slots, weekday, hour);
      const result = parseCell(text);
      if (!result.success) {
        throw new CellParseError({ weekday, hour, text }, result.reason);
      }
      byHour[hour] = result.entries;
      className ??= result.className;
    }
  }

  return {
    className: className ?? classNameFromTitle(headers.title),
    timetable,
    orientation: headers.orientation,
  };
}
