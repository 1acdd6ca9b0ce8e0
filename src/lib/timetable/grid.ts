import { NoTableFoundError } from '@/lib/timetable/errors';

// What a table detector hands back: null marks a position covered by a
// merged cell.
export type RawGrid = ReadonlyArray<ReadonlyArray<string | null | undefined>>;

/** A merged cell: its text sits at (row, column), the top-left position. */
export type CellMerge = {
  row: number;
  column: number;
  rowSpan: number;
  columnSpan: number;
};

export type DetectedTable = {
  rows: RawGrid;
  // omitted by detectors that only know which positions are covered
  merges?: ReadonlyArray<CellMerge>;
};

export type CellPosition = {
  row: number;
  column: number;
};

/**
 * Rectangular rows × columns of cell text, validated once at ingestion.
 * Positions covered by a merged cell hold '' and record their owner in
 * `owners`; every other position has a null owner.
 */
export type Grid = {
  readonly rows: ReadonlyArray<ReadonlyArray<string>>;
  readonly covered: ReadonlyArray<ReadonlyArray<boolean>>;
  readonly owners: ReadonlyArray<ReadonlyArray<CellPosition | null>>;
  readonly rowCount: number;
  readonly columnCount: number;
};

export class InvalidGridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidGridError';
  }
}

function applyMerges(
  raw: RawGrid,
  owners: Array<Array<CellPosition | null>>,
  merges: ReadonlyArray<CellMerge>,
  columnCount: number,
) {
  for (const merge of merges) {
    const lastRow = merge.row + merge.rowSpan - 1;
    const lastColumn = merge.column + merge.columnSpan - 1;
    if (
      merge.row < 0 ||
      merge.column < 0 ||
      merge.rowSpan < 1 ||
      merge.columnSpan < 1 ||
      lastRow >= raw.length ||
      lastColumn >= columnCount
    ) {
      throw new InvalidGridError(
        `Merge at row ${merge.row}, column ${merge.column} does not fit the grid.`,
      );
    }
    for (let row = merge.row; row <= lastRow; row += 1) {
      for (let column = merge.column; column <= lastColumn; column += 1) {
        const coveredHere = (raw[row]?.[column] ?? null) === null;
        if (coveredHere && !owners[row]?.[column]) {
          owners[row]?.splice(column, 1, {
            row: merge.row,
            column: merge.column,
          });
        }
      }
    }
  }
}

/**
 * Guesses the owner of a covered position from its neighbours when the
 * detector reported no merges: the cell above when it continues down this
 * column, the cell on the left when it continues along this row. When both
 * fit, the one holding text wins, then the cell above.
 */
function inferOwner(
  raw: RawGrid,
  owners: ReadonlyArray<ReadonlyArray<CellPosition | null>>,
  row: number,
  column: number,
): CellPosition | null {
  const ownerAt = (r: number, c: number): CellPosition | null => {
    if (r < 0 || c < 0) return null;
    const coveredHere = (raw[r]?.[c] ?? null) === null;
    return coveredHere ? (owners[r]?.[c] ?? null) : { row: r, column: c };
  };
  const textAt = (position: CellPosition) =>
    (raw[position.row]?.[position.column] ?? '').trim();

  const above = ownerAt(row - 1, column);
  const left = ownerAt(row, column - 1);
  const fromAbove = above && above.column === column ? above : null;
  const fromLeft = left && left.row === row ? left : null;

  if (fromAbove && fromLeft) {
    if (textAt(fromLeft).length > 0 && textAt(fromAbove).length === 0) {
      return fromLeft;
    }
    return fromAbove;
  }
  if (fromAbove || fromLeft) return fromAbove ?? fromLeft;
  // inside a block merged both ways
  const sameOwner =
    above && left && above.row === left.row && above.column === left.column;
  if (sameOwner) return above;
  return null;
}

export function createGrid(
  raw: RawGrid,
  merges: ReadonlyArray<CellMerge> = [],
): Grid {
  const rowCount = raw.length;
  const columnCount = raw[0]?.length ?? 0;
  if (rowCount === 0 || columnCount === 0) {
    throw new NoTableFoundError('The detected table is empty.');
  }

  raw.forEach((row, index) => {
    if (row.length !== columnCount) {
      throw new InvalidGridError(
        `Row ${index} has ${row.length} cells, expected ${columnCount}.`,
      );
    }
  });

  const owners: Array<Array<CellPosition | null>> = raw.map((row) =>
    row.map(() => null),
  );
  applyMerges(raw, owners, merges, columnCount);

  raw.forEach((cells, row) => {
    cells.forEach((cell, column) => {
      if ((cell ?? null) !== null || owners[row]?.[column]) return;
      owners[row]?.splice(column, 1, inferOwner(raw, owners, row, column));
    });
  });

  return {
    rows: raw.map((row) => row.map((cell) => cell ?? '')),
    covered: raw.map((row) => row.map((cell) => (cell ?? null) === null)),
    owners,
    rowCount,
    columnCount,
  };
}

export function cellAt(grid: Grid, row: number, column: number): string {
  return grid.rows[row]?.[column] ?? '';
}

export function isCovered(grid: Grid, row: number, column: number): boolean {
  return grid.covered[row]?.[column] ?? false;
}

export function ownerOf(
  grid: Grid,
  row: number,
  column: number,
): CellPosition | null {
  return grid.owners[row]?.[column] ?? null;
}

export function transposeGrid(grid: Grid): Grid {
  const rows: string[][] = [];
  const covered: boolean[][] = [];
  const owners: Array<Array<CellPosition | null>> = [];
  for (let column = 0; column < grid.columnCount; column += 1) {
    const row: string[] = [];
    const coveredRow: boolean[] = [];
    const ownerRow: Array<CellPosition | null> = [];
    for (let r = 0; r < grid.rowCount; r += 1) {
      row.push(cellAt(grid, r, column));
      coveredRow.push(isCovered(grid, r, column));
      const owner = ownerOf(grid, r, column);
      ownerRow.push(owner ? { row: owner.column, column: owner.row } : null);
    }
    rows.push(row);
    covered.push(coveredRow);
    owners.push(ownerRow);
  }
  return {
    rows,
    covered,
    owners,
    rowCount: grid.columnCount,
    columnCount: grid.rowCount,
  };
}
