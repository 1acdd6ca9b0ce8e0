export type TimetableErrorKind =
  | 'UnreadableDocument'
  | 'NoTableFound'
  | 'HeaderResolutionFailed'
  | 'CellParseError';

export type CellLocation = {
  weekday: string;
  hour: string;
  text: string;
};

export type ExtractionFailure = {
  kind: TimetableErrorKind;
  message: string;
  cell?: CellLocation;
};

/**
 * Base class for the failures a caller can act on (a bad upload, an
 * unsupported layout). Anything else thrown during extraction is a bug.
 */
export abstract class TimetableError extends Error {
  abstract readonly kind: TimetableErrorKind;

  toFailure(): ExtractionFailure {
    return { kind: this.kind, message: this.message };
  }
}

export class UnreadableDocumentError extends TimetableError {
  readonly kind = 'UnreadableDocument';

  constructor(message = 'The uploaded file is not a readable PDF document.') {
    super(message);
    this.name = 'UnreadableDocumentError';
  }
}

export class NoTableFoundError extends TimetableError {
  readonly kind = 'NoTableFound';

  constructor(message = 'No table found in the PDF.') {
    super(message);
    this.name = 'NoTableFoundError';
  }
}

export class HeaderResolutionFailedError extends TimetableError {
  readonly kind = 'HeaderResolutionFailed';

  constructor(reason: string) {
    super(`Could not resolve timetable headers: ${reason}`);
    this.name = 'HeaderResolutionFailedError';
  }
}

export class CellParseError extends TimetableError {
  readonly kind = 'CellParseError';
  readonly cell: CellLocation;

  constructor(cell: CellLocation, reason: string) {
    super(
      `Could not parse cell at ${cell.weekday}, hour ${cell.hour}: ${reason}`,
    );
    this.name = 'CellParseError';
    this.cell = cell;
  }

  override toFailure(): ExtractionFailure {
    return { kind: this.kind, message: this.message, cell: this.cell };
  }
}
