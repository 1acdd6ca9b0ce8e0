import {
  Specialization,
  type LessonEntry,
} from '@/lib/timetable/types';

export type CellParseResult =
  | { success: true; entries: LessonEntry[]; className: string | null }
  | { success: false; reason: string };

type EntryResult =
  | { success: true; entry: LessonEntry; className: string | null }
  | { success: false; reason: string };

const subjectRegex = /^\p{L}[\p{L}\d-]*$/u;
const teacherRegex = /^\p{L}{1,8}$/u;
const roomRegex = /^[\p{L}\d][\p{L}\d.-]*$/u;

const DASH_SEPARATOR = '--';

export function splitCellLines(text: string): string[] {
  return text
    .replaceAll(/\r\n?/g, '\n')
    .replaceAll('|', '\n')
    .split('\n')
    .map((line) => line.replaceAll(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0);
}

function parsePlainLine(
  line: string,
  specialization: Specialization,
): EntryResult {
  const tokens = line.split(' ');
  if (tokens.length !== 3) {
    return {
      success: false,
      reason: `expected "SUBJECT TEACHER ROOM" but found ${tokens.length} token(s) in "${line}"`,
    };
  }
  const [subject = '', teacher = '', room = ''] = tokens;
  if (!subjectRegex.test(subject)) {
    return { success: false, reason: `invalid subject "${subject}"` };
  }
  if (!teacherRegex.test(teacher)) {
    return { success: false, reason: `invalid teacher "${teacher}"` };
  }
  if (!roomRegex.test(room)) {
    return { success: false, reason: `invalid room "${room}"` };
  }
  return {
    success: true,
    entry: { subject, teacher, room, specialization },
    className: null,
  };
}

function splitOnDash(line: string): [string, string] | null {
  const index = line.indexOf(DASH_SEPARATOR);
  if (index === -1) return null;
  return [
    line.slice(0, index).trim(),
    line.slice(index + DASH_SEPARATOR.length).trim(),
  ];
}

function groupToSpecialization(group: string): Specialization {
  const normalized = group.trim().toUpperCase();
  if (normalized === 'A') return Specialization.GroupA;
  if (normalized === 'B') return Specialization.GroupB;
  return Specialization.WholeClass;
}

// "5a/A -- MATH" followed by "MM -- E201"
function parseDashedPair(classLine: string, teacherLine: string): EntryResult {
  const classSubject = splitOnDash(classLine);
  const teacherRoom = splitOnDash(teacherLine);
  if (!classSubject || !teacherRoom) {
    return {
      success: false,
      reason: `expected "CLASS -- SUBJECT" and "TEACHER -- ROOM" but found "${classLine}" / "${teacherLine}"`,
    };
  }
  const [schoolClass, subject] = classSubject;
  const [teacher, room] = teacherRoom;
  if (!schoolClass || !subject || !teacher || !room) {
    return {
      success: false,
      reason: `incomplete entry "${classLine}" / "${teacherLine}"`,
    };
  }

  const slash = schoolClass.indexOf('/');
  const baseClass =
    slash === -1 ? schoolClass : schoolClass.slice(0, slash).trim();
  const specialization =
    slash === -1
      ? Specialization.WholeClass
      : groupToSpecialization(schoolClass.slice(slash + 1));

  return {
    success: true,
    entry: { subject, teacher, room, specialization },
    className: baseClass || null,
  };
}

function isSplitPair(a: Specialization, b: Specialization): boolean {
  return (
    (a === Specialization.GroupA && b === Specialization.GroupB) ||
    (a === Specialization.GroupB && b === Specialization.GroupA)
  );
}

// Group A and group B sharing subject, teacher and room is one lesson.
function mergeSplitGroups(entries: LessonEntry[]): LessonEntry[] {
  const merged: LessonEntry[] = [];
  for (const entry of entries) {
    const twin = merged.find(
      (existing) =>
        existing.subject === entry.subject &&
        existing.teacher === entry.teacher &&
        existing.room === entry.room &&
        isSplitPair(existing.specialization, entry.specialization),
    );
    if (twin) {
      twin.specialization = Specialization.WholeClass;
    } else {
      merged.push({ ...entry });
    }
  }
  return merged;
}

function checkSlotShape(entries: LessonEntry[]): CellParseResult | null {
  if (entries.length <= 1) return null;
  if (entries.length > 2) {
    return {
      success: false,
      reason: `ambiguous group count: ${entries.length} parallel entries`,
    };
  }
  const [first, second] = entries;
  if (
    !first ||
    !second ||
    !isSplitPair(first.specialization, second.specialization)
  ) {
    return {
      success: false,
      reason: 'two parallel entries must be group A and group B',
    };
  }
  return null;
}

function parseDashed(lines: string[]): CellParseResult {
  if (lines.length % 2 !== 0) {
    return {
      success: false,
      reason: `expected pairs of lines but found ${lines.length}`,
    };
  }

  const entries: LessonEntry[] = [];
  let className: string | null = null;
  for (let i = 0; i < lines.length; i += 2) {
    const result = parseDashedPair(lines[i] ?? '', lines[i + 1] ?? '');
    if (!result.success) return result;
    entries.push(result.entry);
    className ??= result.className;
  }

  const merged = mergeSplitGroups(entries);
  const shapeError = checkSlotShape(merged);
  if (shapeError) return shapeError;
  merged.sort((a, b) => a.specialization - b.specialization);
  return { success: true, entries: merged, className };
}

function parsePlain(lines: string[]): CellParseResult {
  if (lines.length > 2) {
    return {
      success: false,
      reason: `ambiguous group count: ${lines.length} stacked entries`,
    };
  }

  const specializations: Specialization[] =
    lines.length === 1
      ? [Specialization.WholeClass]
      : [Specialization.GroupA, Specialization.GroupB];

  const entries: LessonEntry[] = [];
  for (const [index, line] of lines.entries()) {
    const result = parsePlainLine(
      line,
      specializations[index] ?? Specialization.WholeClass,
    );
    if (!result.success) return result;
    entries.push(result.entry);
  }
  return { success: true, entries, className: null };
}

/**
 * Reads one timetable slot.
 *
 * Plain cells hold one `SUBJECT TEACHER ROOM` line for the whole class or two
 * lines for group A and group B. Cells containing `--` use the exported
 * notation `CLASS[/GROUP] -- SUBJECT` + `TEACHER -- ROOM`, one pair per entry.
 */
export function parseCell(text: string): CellParseResult {
  const lines = splitCellLines(text);
  if (lines.length === 0) {
    return { success: true, entries: [], className: null };
  }
  if (lines.some((line) => line.includes(DASH_SEPARATOR))) {
    return parseDashed(lines);
  }
  return parsePlain(lines);
}
