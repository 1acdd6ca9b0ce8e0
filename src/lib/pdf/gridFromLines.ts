import type { CellMerge } from '@/lib/timetable/grid';

export type EdgeAxis = 'horizontal' | 'vertical';

/**
 * An axis-aligned ruling line in top-down page coordinates. `position` is the
 * y of a horizontal edge or the x of a vertical one; `start`/`end` span the
 * other axis.
 */
export type Edge = {
  axis: EdgeAxis;
  position: number;
  start: number;
  end: number;
};

export type TextFragment = {
  text: string;
  x0: number;
  baseline: number;
  centerX: number;
  centerY: number;
};

const SNAP_TOLERANCE = 3;
const JOIN_TOLERANCE = 3;
const INTERSECTION_TOLERANCE = 3;
const MIN_EDGE_LENGTH = 3;
const LINE_TOLERANCE = 3;

function snapEdges(edges: readonly Edge[]): Edge[] {
  const snapped: Edge[] = [];
  for (const axis of ['horizontal', 'vertical'] as const) {
    const sorted = edges
      .filter((edge) => edge.axis === axis)
      .sort((a, b) => a.position - b.position);

    let cluster: Edge[] = [];
    const flush = () => {
      if (cluster.length === 0) return;
      const mean =
        cluster.reduce((sum, edge) => sum + edge.position, 0) / cluster.length;
      for (const edge of cluster) snapped.push({ ...edge, position: mean });
      cluster = [];
    };

    for (const edge of sorted) {
      const last = cluster[cluster.length - 1];
      if (last && edge.position - last.position > SNAP_TOLERANCE) flush();
      cluster.push(edge);
    }
    flush();
  }
  return snapped;
}

function joinEdges(edges: readonly Edge[]): Edge[] {
  const groups = new Map<string, Edge[]>();
  for (const edge of edges) {
    const key = `${edge.axis}:${edge.position}`;
    const group = groups.get(key);
    if (group) group.push(edge);
    else groups.set(key, [edge]);
  }

  const joined: Edge[] = [];
  for (const group of groups.values()) {
    const sorted = [...group].sort((a, b) => a.start - b.start);
    let current: Edge | null = null;
    for (const edge of sorted) {
      if (current && edge.start <= current.end + JOIN_TOLERANCE) {
        const merged: Edge = { ...current, end: Math.max(current.end, edge.end) };
        current = merged;
      } else {
        if (current) joined.push(current);
        current = { ...edge };
      }
    }
    if (current) joined.push(current);
  }
  return joined;
}

function crosses(a: Edge, b: Edge): boolean {
  if (a.axis === b.axis) return false;
  return (
    b.position >= a.start - INTERSECTION_TOLERANCE &&
    b.position <= a.end + INTERSECTION_TOLERANCE &&
    a.position >= b.start - INTERSECTION_TOLERANCE &&
    a.position <= b.end + INTERSECTION_TOLERANCE
  );
}

// Drops stray rules (underlines, frames) that do not take part in a grid.
function keepConnected(edges: readonly Edge[]): Edge[] {
  let current = [...edges];
  for (;;) {
    const next = current.filter(
      (edge) => current.filter((other) => crosses(edge, other)).length >= 2,
    );
    if (next.length === current.length) return next;
    current = next;
  }
}

function uniqueSorted(values: readonly number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

function locate(bounds: readonly number[], value: number): number | null {
  const first = bounds[0];
  const last = bounds[bounds.length - 1];
  if (first === undefined || last === undefined) return null;
  if (value < first || value > last) return null;
  for (let i = 0; i < bounds.length - 1; i += 1) {
    if (value <= (bounds[i + 1] ?? last)) return i;
  }
  return null;
}

function cellText(fragments: readonly TextFragment[]): string {
  const sorted = [...fragments].sort(
    (a, b) => a.baseline - b.baseline || a.x0 - b.x0,
  );
  const lines: TextFragment[][] = [];
  for (const fragment of sorted) {
    const line = lines[lines.length - 1];
    const anchor = line?.[0];
    if (line && anchor && fragment.baseline - anchor.baseline <= LINE_TOLERANCE) {
      line.push(fragment);
    } else {
      lines.push([fragment]);
    }
  }
  return lines
    .map((line) =>
      [...line]
        .sort((a, b) => a.x0 - b.x0)
        .map((fragment) => fragment.text)
        .join(' ')
        .replaceAll(/\s+/g, ' ')
        .trim(),
    )
    .filter((line) => line.length > 0)
    .join('\n');
}

/**
 * Turns ruling lines and positioned text into rows × columns of cell text.
 *
 * Neighbouring cells without a rule between them form one merged cell whose
 * text sits at its top-left position; the positions it covers are null and
 * the merge's bounding rectangle is listed in `merges`.
 * Returns null when the rules do not form at least one cell.
 */
export function buildGridFromLines(
  edges: readonly Edge[],
  fragments: readonly TextFragment[],
): { rows: Array<Array<string | null>>; merges: CellMerge[] } | null {
  const cleaned = keepConnected(
    joinEdges(snapEdges(edges)).filter(
      (edge) => edge.end - edge.start >= MIN_EDGE_LENGTH,
    ),
  );
  const horizontals = cleaned.filter((edge) => edge.axis === 'horizontal');
  const verticals = cleaned.filter((edge) => edge.axis === 'vertical');

  const ys = uniqueSorted(horizontals.map((edge) => edge.position));
  const xs = uniqueSorted(verticals.map((edge) => edge.position));
  if (ys.length < 2 || xs.length < 2) return null;

  const rowCount = ys.length - 1;
  const columnCount = xs.length - 1;

  const covered = (
    rules: readonly Edge[],
    position: number,
    from: number,
    to: number,
  ) =>
    rules.some(
      (rule) =>
        rule.position === position &&
        rule.start <= from + INTERSECTION_TOLERANCE &&
        rule.end >= to - INTERSECTION_TOLERANCE,
    );

  // union-find whose root is always the smallest (top-left) index
  const parent = Array.from({ length: rowCount * columnCount }, (_, i) => i);
  const find = (index: number): number => {
    let root = index;
    while (parent[root] !== root) root = parent[root] ?? root;
    parent[index] = root;
    return root;
  };
  const union = (a: number, b: number) => {
    const rootA = find(a);
    const rootB = find(b);
    if (rootA < rootB) parent[rootB] = rootA;
    else if (rootB < rootA) parent[rootA] = rootB;
  };

  for (let row = 0; row < rowCount; row += 1) {
    for (let column = 0; column < columnCount; column += 1) {
      const index = row * columnCount + column;
      const top = ys[row] ?? 0;
      const bottom = ys[row + 1] ?? top;
      const left = xs[column] ?? 0;
      const right = xs[column + 1] ?? left;
      if (
        column + 1 < columnCount &&
        !covered(verticals, right, top, bottom)
      ) {
        union(index, index + 1);
      }
      if (row + 1 < rowCount && !covered(horizontals, bottom, left, right)) {
        union(index, index + columnCount);
      }
    }
  }

  const buckets = new Map<number, TextFragment[]>();
  for (const fragment of fragments) {
    const column = locate(xs, fragment.centerX);
    const row = locate(ys, fragment.centerY);
    if (column === null || row === null) continue;
    const owner = find(row * columnCount + column);
    const bucket = buckets.get(owner);
    if (bucket) bucket.push(fragment);
    else buckets.set(owner, [fragment]);
  }

  const rows: Array<Array<string | null>> = [];
  const spans = new Map<number, { lastRow: number; lastColumn: number }>();
  for (let row = 0; row < rowCount; row += 1) {
    const cells: Array<string | null> = [];
    for (let column = 0; column < columnCount; column += 1) {
      const index = row * columnCount + column;
      const root = find(index);
      if (root === index) {
        cells.push(cellText(buckets.get(index) ?? []));
        continue;
      }
      cells.push(null);
      const span = spans.get(root);
      if (span) {
        span.lastRow = Math.max(span.lastRow, row);
        span.lastColumn = Math.max(span.lastColumn, column);
      } else {
        spans.set(root, { lastRow: row, lastColumn: column });
      }
    }
    rows.push(cells);
  }

  const merges: CellMerge[] = [...spans].map(([root, span]) => {
    const row = Math.floor(root / columnCount);
    const column = root % columnCount;
    return {
      row,
      column,
      rowSpan: span.lastRow - row + 1,
      columnSpan: Math.max(span.lastColumn, column) - column + 1,
    };
  });
  return { rows, merges };
}
