import type { TableDetector } from '@/lib/pdf/detector';
import { assembleTimetable } from '@/lib/timetable/assemble';
import {
  NoTableFoundError,
  TimetableError,
  type ExtractionFailure,
} from '@/lib/timetable/errors';
import { createGrid, type Grid } from '@/lib/timetable/grid';
import { resolveHeaders } from '@/lib/timetable/headers';
import type { ExtractedTimetable } from '@/lib/timetable/types';
import type { WeekdayVocabulary } from '@/lib/timetable/weekdays';

export type ExtractTimetableOptions = {
  detector: TableDetector;
  weekdays: WeekdayVocabulary;
  pageNumber?: number;
};

export type ExtractionResult =
  | { success: true; data: ExtractedTimetable }
  | { success: false; error: ExtractionFailure };

export function interpretGrid(
  grid: Grid,
  weekdays: WeekdayVocabulary,
): ExtractedTimetable {
  const headers = resolveHeaders(grid, weekdays);
  return assembleTimetable(headers, weekdays);
}

/**
 * PDF bytes in, timetable out. Failures the uploader can fix come back as
 * `success: false`; anything else is rethrown.
 */
export async function extractTimetable(
  pdf: Uint8Array,
  options: ExtractTimetableOptions,
): Promise<ExtractionResult> {
  try {
    const table = await options.detector.detectTable(pdf, {
      verticalStrategy: 'lines',
      horizontalStrategy: 'lines',
      pageNumber: options.pageNumber,
    });
    if (!table) throw new NoTableFoundError();

    const grid = createGrid(table.rows, table.merges);
    return { success: true, data: interpretGrid(grid, options.weekdays) };
  } catch (err) {
    if (err instanceof TimetableError) {
      return { success: false, error: err.toFailure() };
    }
    throw err;
  }
}
