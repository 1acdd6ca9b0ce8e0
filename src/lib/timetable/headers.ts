import { HeaderResolutionFailedError } from '@/lib/timetable/errors';
import {
  cellAt,
  isCovered,
  ownerOf,
  transposeGrid,
  type Grid,
} from '@/lib/timetable/grid';
import { parseHourLabel } from '@/lib/timetable/hours';
import type { Orientation } from '@/lib/timetable/types';
import {
  matchWeekday,
  type WeekdayVocabulary,
} from '@/lib/timetable/weekdays';

// Header rows/columns are looked for in the first few lines only.
const HEADER_BAND = 3;

export type SlotTexts = ReadonlyMap<
  string,
  ReadonlyMap<string, readonly string[]>
>;

export type ResolvedHeaders = {
  orientation: Orientation;
  // vocabulary order
  weekdays: string[];
  // ascending
  hours: string[];
  title: string | null;
  // weekday -> hour -> texts of the grid cells mapped to that slot
  slots: SlotTexts;
};

type Candidate =
  | {
      ok: true;
      headers: ResolvedHeaders;
      distinctWeekdays: number;
      complete: boolean;
    }
  | { ok: false; reason: string; distinctWeekdays: number };

function collapseWhitespace(value: string): string {
  return value.replaceAll(/\s+/g, ' ').trim();
}

function countDistinct(values: ReadonlyArray<number | null>): number {
  return new Set(values.filter((value) => value !== null)).size;
}

function findWeekdayRow(
  grid: Grid,
  vocabulary: WeekdayVocabulary,
): { row: number; labels: Array<number | null> } | null {
  let best: { row: number; labels: Array<number | null> } | null = null;
  let bestCount = 0;
  const band = Math.min(HEADER_BAND, grid.rowCount);
  for (let row = 0; row < band; row += 1) {
    const labels: Array<number | null> = [];
    for (let column = 0; column < grid.columnCount; column += 1) {
      labels.push(matchWeekday(cellAt(grid, row, column), vocabulary));
    }
    const count = countDistinct(labels);
    if (count > bestCount) {
      best = { row, labels };
      bestCount = count;
    }
  }
  return best;
}

function isInVocabularyOrder(labels: ReadonlyArray<number | null>): boolean {
  let previous = -1;
  for (const label of labels) {
    if (label === null) continue;
    if (label < previous) return false;
    previous = label;
  }
  return true;
}

/**
 * Fills non-empty unreadable header cells that sit between two recognized
 * weekdays when their count equals the number of weekdays missing there.
 */
function inferUnreadableLabels(
  grid: Grid,
  row: number,
  labels: Array<number | null>,
): Array<number | null> {
  const inferred = [...labels];
  let previousColumn: number | null = null;
  for (let column = 0; column < inferred.length; column += 1) {
    const label = inferred[column];
    if (label === null || label === undefined) continue;

    if (previousColumn !== null) {
      const previousLabel = inferred[previousColumn] ?? label;
      const missing = label - previousLabel - 1;
      const unreadable: number[] = [];
      for (let c = previousColumn + 1; c < column; c += 1) {
        if (cellAt(grid, row, c).trim().length > 0) unreadable.push(c);
      }
      if (missing > 0 && unreadable.length === missing) {
        unreadable.forEach((c, offset) => {
          inferred[c] = previousLabel + 1 + offset;
        });
      }
    }
    previousColumn = column;
  }
  return inferred;
}

// An empty header cell belongs to the weekday on its left (merged header).
function spreadOverMergedColumns(
  grid: Grid,
  row: number,
  labels: ReadonlyArray<number | null>,
): Array<number | null> {
  const spread: Array<number | null> = [];
  let current: number | null = null;
  labels.forEach((label, column) => {
    if (label !== null) {
      current = label;
    } else if (cellAt(grid, row, column).trim().length > 0) {
      current = null;
    }
    spread.push(current);
  });
  return spread;
}

function findHourColumn(
  grid: Grid,
  headerRow: number,
  firstWeekdayColumn: number,
): number | null {
  let best: number | null = null;
  let bestCount = 0;
  for (let column = 0; column < firstWeekdayColumn; column += 1) {
    let count = 0;
    for (let row = headerRow + 1; row < grid.rowCount; row += 1) {
      if (parseHourLabel(cellAt(grid, row, column))) count += 1;
    }
    if (count > bestCount) {
      best = column;
      bestCount = count;
    }
  }
  return best;
}

// An empty hour cell continues the hour above only when a merged hour cell
// from an earlier row covers it.
function continuesHourCell(
  grid: Grid,
  row: number,
  hourColumn: number,
): boolean {
  if (cellAt(grid, row, hourColumn).trim().length > 0) return false;
  if (!isCovered(grid, row, hourColumn)) return false;
  const owner = ownerOf(grid, row, hourColumn);
  return owner !== null && owner.column === hourColumn && owner.row < row;
}

function findTitle(grid: Grid, headerRow: number): string | null {
  for (let row = 0; row < headerRow; row += 1) {
    for (let column = 0; column < grid.columnCount; column += 1) {
      const text = collapseWhitespace(cellAt(grid, row, column));
      if (text.length > 0) return text;
    }
  }
  return null;
}

function evaluate(
  grid: Grid,
  orientation: Orientation,
  vocabulary: WeekdayVocabulary,
): Candidate {
  const weekdayRow = findWeekdayRow(grid, vocabulary);
  if (!weekdayRow) {
    return {
      ok: false,
      reason: 'no weekday labels found',
      distinctWeekdays: 0,
    };
  }

  const { row: headerRow } = weekdayRow;
  const distinctMatched = countDistinct(weekdayRow.labels);
  if (!isInVocabularyOrder(weekdayRow.labels)) {
    return {
      ok: false,
      reason: 'weekday labels are out of order',
      distinctWeekdays: distinctMatched,
    };
  }

  const labels = inferUnreadableLabels(grid, headerRow, weekdayRow.labels);
  const distinctWeekdays = countDistinct(labels);
  const firstWeekdayColumn = labels.findIndex((label) => label !== null);
  const columnWeekdays = spreadOverMergedColumns(grid, headerRow, labels);

  const hourColumn = findHourColumn(grid, headerRow, firstWeekdayColumn);
  if (hourColumn === null) {
    return {
      ok: false,
      reason: 'no hour labels found beside the weekday header',
      distinctWeekdays,
    };
  }

  const hours: string[] = [];
  const rowHours: Array<string | null> = [];
  let current: string | null = null;
  let previousNumber: number | null = null;
  for (let row = 0; row < grid.rowCount; row += 1) {
    if (row <= headerRow) {
      rowHours.push(null);
      continue;
    }
    const text = cellAt(grid, row, hourColumn).trim();
    const hour = parseHourLabel(text);
    if (hour) {
      if (previousNumber !== null && hour.number <= previousNumber) {
        return {
          ok: false,
          reason: `hour labels are not increasing (${hour.label} after ${previousNumber})`,
          distinctWeekdays,
        };
      }
      previousNumber = hour.number;
      current = hour.label;
      hours.push(hour.label);
    } else if (!continuesHourCell(grid, row, hourColumn)) {
      // break rows ("Pause"), rows with an empty hour cell and other
      // labelled rows are not lessons
      current = null;
    }
    rowHours.push(current);
  }

  const weekdayIndexes = [
    ...new Set(labels.filter((label): label is number => label !== null)),
  ].sort((a, b) => a - b);
  const weekdays = weekdayIndexes.map((index) => vocabulary[index] ?? '');

  const slots = new Map<string, Map<string, string[]>>();
  for (const weekday of weekdays) {
    slots.set(
      weekday,
      new Map(hours.map((hour): [string, string[]] => [hour, []])),
    );
  }
  // a merged cell spanning several hour rows counts for each of its hours
  const creditedOwners = new Set<string>();
  columnWeekdays.forEach((index, column) => {
    if (index === null) return;
    const weekday = vocabulary[index] ?? '';
    const byHour = slots.get(weekday);
    if (!byHour) return;
    rowHours.forEach((hour, row) => {
      if (hour === null) return;
      const texts = byHour.get(hour);
      texts?.push(cellAt(grid, row, column));

      const owner = ownerOf(grid, row, column);
      if (!owner || columnWeekdays[owner.column] !== index) return;
      const ownerHour = rowHours[owner.row] ?? null;
      if (ownerHour === null || ownerHour === hour) return;
      const key = `${weekday}|${hour}|${owner.row}:${owner.column}`;
      if (creditedOwners.has(key)) return;
      creditedOwners.add(key);
      texts?.push(cellAt(grid, owner.row, owner.column));
    });
  });

  return {
    ok: true,
    headers: {
      orientation,
      weekdays,
      hours,
      title: findTitle(grid, headerRow),
      slots,
    },
    distinctWeekdays,
    complete: distinctWeekdays === vocabulary.length,
  };
}

function rank(
  a: Extract<Candidate, { ok: true }>,
  b: Extract<Candidate, { ok: true }>,
): number {
  if (a.complete !== b.complete) return a.complete ? -1 : 1;
  if (a.distinctWeekdays !== b.distinctWeekdays) {
    return b.distinctWeekdays - a.distinctWeekdays;
  }
  return b.headers.hours.length - a.headers.hours.length;
}

/**
 * Works out which axis carries weekdays and which carries hours.
 *
 * Both orientations are tried; a candidate naming every weekday of the
 * vocabulary beats a partial one, then more weekdays, then more hours, then
 * weekdays across a header row.
 */
export function resolveHeaders(
  grid: Grid,
  vocabulary: WeekdayVocabulary,
): ResolvedHeaders {
  const candidates = [
    evaluate(grid, 'weekdays-in-row', vocabulary),
    evaluate(transposeGrid(grid), 'weekdays-in-column', vocabulary),
  ];

  const resolved = candidates
    .filter(
      (candidate): candidate is Extract<Candidate, { ok: true }> =>
        candidate.ok,
    )
    .sort(rank);
  const best = resolved[0];
  if (best) return best.headers;

  let closest: Candidate | null = null;
  for (const candidate of candidates) {
    if (!closest || candidate.distinctWeekdays > closest.distinctWeekdays) {
      closest = candidate;
    }
  }
  const reason =
    closest && !closest.ok && closest.distinctWeekdays > 0
      ? closest.reason
      : 'no weekday labels found in the first rows or columns';
  throw new HeaderResolutionFailedError(reason);
}

export function slotText(
  slots: SlotTexts,
  weekday: string,
  hour: string,
): string {
  const texts = slots.get(weekday)?.get(hour) ?? [];
  return texts.filter((text) => text.trim().length > 0).join('\n');
}
