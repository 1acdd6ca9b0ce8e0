import { OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { describe, expect, it } from 'vitest';

import {
  applyMatrix,
  collectEdges,
  IDENTITY,
  multiply,
  toMatrix,
  type EdgeStrategies,
  type Matrix,
} from '@/lib/pdf/operators';

const LINES: EdgeStrategies = { vertical: 'lines', horizontal: 'lines' };

// page 100 units high, y pointing down
const FLIP: Matrix = [1, 0, 0, -1, 0, 100];

function path(ops: number[], coords: number[]): unknown {
  return [ops, coords, null];
}

describe('matrices', () => {
  it('reads six numbers as a matrix', () => {
    expect(toMatrix([1, 0, 0, 1, 5, 6])).toEqual([1, 0, 0, 1, 5, 6]);
    expect(toMatrix([1, 0, 0])).toBeNull();
    expect(toMatrix('cm')).toBeNull();
  });

  it('applies the right-hand matrix first', () => {
    expect(multiply(IDENTITY, [2, 0, 0, 2, 5, 0])).toEqual([2, 0, 0, 2, 5, 0]);
    expect(multiply(FLIP, [2, 0, 0, 2, 5, 0])).toEqual([2, 0, 0, -2, 5, 100]);
    expect(applyMatrix(FLIP, 10, 30)).toEqual([10, 70]);
  });
});

describe('collectEdges', () => {
  it('turns a stroked rectangle into four edges', () => {
    expect(
      collectEdges(
        [OPS.constructPath, OPS.stroke],
        [path([OPS.rectangle], [10, 20, 30, 40]), null],
        IDENTITY,
        LINES,
      ),
    ).toEqual([
      { axis: 'horizontal', position: 20, start: 10, end: 40 },
      { axis: 'vertical', position: 40, start: 20, end: 60 },
      { axis: 'horizontal', position: 60, start: 10, end: 40 },
      { axis: 'vertical', position: 10, start: 20, end: 60 },
    ]);
  });

  it('reads a thin filled rectangle as a pair of rules', () => {
    expect(
      collectEdges(
        [OPS.constructPath, OPS.fill],
        [path([OPS.rectangle], [0, 0, 100, 0.5]), null],
        IDENTITY,
        LINES,
      ),
    ).toEqual([
      { axis: 'horizontal', position: 0, start: 0, end: 100 },
      { axis: 'horizontal', position: 0.5, start: 0, end: 100 },
    ]);
  });

  it('skips rectangle sides under the strict strategy', () => {
    expect(
      collectEdges(
        [OPS.constructPath, OPS.stroke],
        [path([OPS.rectangle], [10, 20, 30, 40]), null],
        IDENTITY,
        { vertical: 'lines_strict', horizontal: 'lines' },
      ),
    ).toEqual([
      { axis: 'horizontal', position: 20, start: 10, end: 40 },
      { axis: 'horizontal', position: 60, start: 10, end: 40 },
    ]);
  });

  it('drops paths that are never painted', () => {
    expect(
      collectEdges(
        [OPS.constructPath, OPS.endPath, OPS.stroke],
        [path([OPS.moveTo, OPS.lineTo], [0, 0, 50, 0]), null, null],
        IDENTITY,
        LINES,
      ),
    ).toEqual([]);
  });

  it('ignores diagonal and curved segments', () => {
    expect(
      collectEdges(
        [OPS.constructPath, OPS.stroke],
        [
          path(
            [OPS.moveTo, OPS.lineTo, OPS.curveTo, OPS.lineTo, OPS.closePath],
            [0, 0, 10, 10, 12, 12, 14, 14, 20, 10, 20, 30],
          ),
          null,
        ],
        IDENTITY,
        LINES,
      ),
    ).toEqual([{ axis: 'vertical', position: 20, start: 10, end: 30 }]);
  });

  it('follows the transformation matrix through save and restore', () => {
    expect(
      collectEdges(
        [
          OPS.save,
          OPS.transform,
          OPS.constructPath,
          OPS.stroke,
          OPS.restore,
          OPS.constructPath,
          OPS.stroke,
        ],
        [
          null,
          [2, 0, 0, 2, 5, 0],
          path([OPS.moveTo, OPS.lineTo], [0, 0, 10, 0]),
          null,
          null,
          path([OPS.moveTo, OPS.lineTo], [0, 10, 0, 30]),
          null,
        ],
        FLIP,
        LINES,
      ),
    ).toEqual([
      { axis: 'horizontal', position: 100, start: 5, end: 25 },
      { axis: 'vertical', position: 0, start: 70, end: 90 },
    ]);
  });

  it('applies the matrix of a form XObject', () => {
    expect(
      collectEdges(
        [
          OPS.paintFormXObjectBegin,
          OPS.constructPath,
          OPS.stroke,
          OPS.paintFormXObjectEnd,
          OPS.constructPath,
          OPS.stroke,
        ],
        [
          [[1, 0, 0, 1, 10, 10], null],
          path([OPS.moveTo, OPS.lineTo], [0, 0, 20, 0]),
          null,
          null,
          path([OPS.moveTo, OPS.lineTo], [0, 0, 20, 0]),
          null,
        ],
        IDENTITY,
        LINES,
      ),
    ).toEqual([
      { axis: 'horizontal', position: 10, start: 10, end: 30 },
      { axis: 'horizontal', position: 0, start: 0, end: 20 },
    ]);
  });
});
