import { OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';

import type { TableStrategy } from '@/lib/pdf/detector';
import type { Edge } from '@/lib/pdf/gridFromLines';

export type Matrix = [number, number, number, number, number, number];

export const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

type Point = [number, number];

type PathSegment = {
  // rectangles are edges only under the 'lines' strategy
  source: 'line' | 'rect';
  from: Point;
  to: Point;
};

export type EdgeStrategies = {
  vertical: TableStrategy;
  horizontal: TableStrategy;
};

// Anything thinner than this is treated as perfectly straight.
const AXIS_TOLERANCE = 1;

const PAINT_OPS = new Set<number>([
  OPS.stroke,
  OPS.closeStroke,
  OPS.fill,
  OPS.eoFill,
  OPS.fillStroke,
  OPS.eoFillStroke,
  OPS.closeFillStroke,
  OPS.closeEOFillStroke,
]);

function isNumberList(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.every((item: unknown) => typeof item === 'number')
  );
}

export function toMatrix(value: unknown): Matrix | null {
  if (!isNumberList(value) || value.length < 6) return null;
  const [a = 1, b = 0, c = 0, d = 1, e = 0, f = 0] = value;
  return [a, b, c, d, e, f];
}

// m1 applied after m2, the order of a `cm` operator on the current matrix
export function multiply(m1: Matrix, m2: Matrix): Matrix {
  return [
    m1[0] * m2[0] + m1[2] * m2[1],
    m1[1] * m2[0] + m1[3] * m2[1],
    m1[0] * m2[2] + m1[2] * m2[3],
    m1[1] * m2[2] + m1[3] * m2[3],
    m1[0] * m2[4] + m1[2] * m2[5] + m1[4],
    m1[1] * m2[4] + m1[3] * m2[5] + m1[5],
  ];
}

export function applyMatrix(m: Matrix, x: number, y: number): Point {
  return [x * m[0] + y * m[2] + m[4], x * m[1] + y * m[3] + m[5]];
}

function readPath(args: unknown): PathSegment[] {
  if (!Array.isArray(args)) return [];
  const [ops, coords]: unknown[] = args;
  if (!isNumberList(ops) || !isNumberList(coords)) return [];

  const segments: PathSegment[] = [];
  let j = 0;
  let current: Point | null = null;
  let subpathStart: Point | null = null;
  const take = (count: number): number[] => {
    const values = coords.slice(j, j + count);
    j += count;
    return values;
  };

  for (const op of ops) {
    switch (op) {
      case OPS.moveTo: {
        const [x = 0, y = 0] = take(2);
        current = [x, y];
        subpathStart = current;
        break;
      }
      case OPS.lineTo: {
        const [x = 0, y = 0] = take(2);
        const next: Point = [x, y];
        if (current) segments.push({ source: 'line', from: current, to: next });
        current = next;
        break;
      }
      case OPS.curveTo: {
        const [, , , , x = 0, y = 0] = take(6);
        current = [x, y];
        break;
      }
      case OPS.curveTo2:
      case OPS.curveTo3: {
        const [, , x = 0, y = 0] = take(4);
        current = [x, y];
        break;
      }
      case OPS.closePath:
        if (current && subpathStart) {
          segments.push({ source: 'line', from: current, to: subpathStart });
        }
        current = subpathStart;
        break;
      case OPS.rectangle: {
        const [x = 0, y = 0, width = 0, height = 0] = take(4);
        const corners: Point[] = [
          [x, y],
          [x + width, y],
          [x + width, y + height],
          [x, y + height],
        ];
        corners.forEach((corner, index) => {
          const next = corners[(index + 1) % corners.length] ?? corner;
          segments.push({ source: 'rect', from: corner, to: next });
        });
        current = [x, y];
        subpathStart = current;
        break;
      }
      default:
        break;
    }
  }
  return segments;
}

function toEdge(
  segment: PathSegment,
  matrix: Matrix,
  strategies: EdgeStrategies,
): Edge | null {
  const [x1, y1] = applyMatrix(matrix, ...segment.from);
  const [x2, y2] = applyMatrix(matrix, ...segment.to);
  const dx = Math.abs(x1 - x2);
  const dy = Math.abs(y1 - y2);

  if (dx < AXIS_TOLERANCE && dy >= AXIS_TOLERANCE) {
    if (segment.source === 'rect' && strategies.vertical === 'lines_strict') {
      return null;
    }
    return {
      axis: 'vertical',
      position: (x1 + x2) / 2,
      start: Math.min(y1, y2),
      end: Math.max(y1, y2),
    };
  }
  if (dy < AXIS_TOLERANCE && dx >= AXIS_TOLERANCE) {
    if (segment.source === 'rect' && strategies.horizontal === 'lines_strict') {
      return null;
    }
    return {
      axis: 'horizontal',
      position: (y1 + y2) / 2,
      start: Math.min(x1, x2),
      end: Math.max(x1, x2),
    };
  }
  return null;
}

/**
 * Reads the ruling lines of a page from its operator list. Coordinates go
 * through the current transformation matrix and then `viewport`, so edges
 * come out in top-down page space. Paths that are never painted (clipping
 * paths) are dropped.
 */
export function collectEdges(
  fnArray: readonly number[],
  argsArray: readonly unknown[],
  viewport: Matrix,
  strategies: EdgeStrategies,
): Edge[] {
  const edges: Edge[] = [];
  const stack: Matrix[] = [];
  let ctm: Matrix = IDENTITY;
  let pending: Array<{ segment: PathSegment; matrix: Matrix }> = [];

  fnArray.forEach((fn, index) => {
    const args = argsArray[index];
    switch (fn) {
      case OPS.save:
        stack.push(ctm);
        break;
      case OPS.restore:
        ctm = stack.pop() ?? IDENTITY;
        break;
      case OPS.transform: {
        const m = toMatrix(args);
        if (m) ctm = multiply(ctm, m);
        break;
      }
      case OPS.paintFormXObjectBegin: {
        stack.push(ctm);
        const m = toMatrix(Array.isArray(args) ? args[0] : null);
        if (m) ctm = multiply(ctm, m);
        break;
      }
      case OPS.paintFormXObjectEnd:
        ctm = stack.pop() ?? IDENTITY;
        break;
      case OPS.constructPath: {
        const matrix = multiply(viewport, ctm);
        for (const segment of readPath(args)) {
          pending.push({ segment, matrix });
        }
        break;
      }
      case OPS.endPath:
        pending = [];
        break;
      default:
        if (PAINT_OPS.has(fn)) {
          for (const { segment, matrix } of pending) {
            const edge = toEdge(segment, matrix, strategies);
            if (edge) edges.push(edge);
          }
          pending = [];
        }
        break;
    }
  });

  return edges;
}
