import { createRequire } from 'node:module';
import { pathToFileURL } from 'node:url';

import {
  getDocument,
  GlobalWorkerOptions,
  VerbosityLevel,
} from 'pdfjs-dist/legacy/build/pdf.mjs';
import type {
  PDFDocumentLoadingTask,
  PDFDocumentProxy,
  PDFPageProxy,
  TextItem,
  TextMarkedContent,
} from 'pdfjs-dist/types/src/display/api';

import type { DetectTableOptions, TableDetector } from '@/lib/pdf/detector';
import {
  buildGridFromLines,
  type TextFragment,
} from '@/lib/pdf/gridFromLines';
import {
  applyMatrix,
  collectEdges,
  IDENTITY,
  toMatrix,
  type Matrix,
} from '@/lib/pdf/operators';
import {
  NoTableFoundError,
  UnreadableDocumentError,
} from '@/lib/timetable/errors';
import type { DetectedTable } from '@/lib/timetable/grid';

const moduleRequire = createRequire(import.meta.url);
GlobalWorkerOptions.workerSrc = pathToFileURL(
  moduleRequire.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs'),
).href;

const PDF_HEADER = '%PDF-';
// Readers accept a header anywhere in the first kilobyte.
const HEADER_SEARCH_BYTES = 1024;

export function hasPdfHeader(bytes: Uint8Array): boolean {
  return Buffer.from(bytes.subarray(0, HEADER_SEARCH_BYTES))
    .toString('latin1')
    .includes(PDF_HEADER);
}

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

function toFragment(item: TextItem, viewport: Matrix): TextFragment {
  const [, , , , e, f] = toMatrix(item.transform) ?? IDENTITY;
  const [startX, baseline] = applyMatrix(viewport, e, f);
  const [endX] = applyMatrix(viewport, e + item.width, f);
  const [centerX, centerY] = applyMatrix(
    viewport,
    e + item.width / 2,
    f + item.height / 2,
  );
  return {
    text: item.str,
    x0: Math.min(startX, endX),
    baseline,
    centerX,
    centerY,
  };
}

async function detectPageTable(
  page: PDFPageProxy,
  options: DetectTableOptions,
): Promise<DetectedTable | null> {
  const viewport =
    toMatrix(page.getViewport({ scale: 1 }).transform) ?? IDENTITY;
  const [operatorList, textContent] = await Promise.all([
    page.getOperatorList(),
    page.getTextContent(),
  ]);

  const edges = collectEdges(
    operatorList.fnArray,
    operatorList.argsArray,
    viewport,
    {
      vertical: options.verticalStrategy,
      horizontal: options.horizontalStrategy,
    },
  );
  const fragments = textContent.items
    .filter(isTextItem)
    .filter((item) => item.str.trim().length > 0)
    .map((item) => toFragment(item, viewport));

  return buildGridFromLines(edges, fragments);
}

async function openDocument(
  loadingTask: PDFDocumentLoadingTask,
): Promise<PDFDocumentProxy> {
  try {
    return await loadingTask.promise;
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new UnreadableDocumentError(
      `The uploaded file is not a readable PDF document (${detail}).`,
    );
  }
}

export const pdfjsTableDetector: TableDetector = {
  async detectTable(pdf, options) {
    if (!hasPdfHeader(pdf)) throw new UnreadableDocumentError();

    // pdf.js takes ownership of the buffer it is given
    const loadingTask = getDocument({
      data: new Uint8Array(pdf),
      isEvalSupported: false,
      disableFontFace: true,
      useSystemFonts: false,
      verbosity: VerbosityLevel.ERRORS,
    });

    try {
      const pdfDocument = await openDocument(loadingTask);
      const pageNumbers =
        options.pageNumber === undefined
          ? Array.from({ length: pdfDocument.numPages }, (_, i) => i + 1)
          : [options.pageNumber];

      for (const pageNumber of pageNumbers) {
        if (pageNumber < 1 || pageNumber > pdfDocument.numPages) {
          throw new NoTableFoundError(
            `The PDF has no page ${pageNumber} (it has ${pdfDocument.numPages}).`,
          );
        }
        const page = await pdfDocument.getPage(pageNumber);
        try {
          const table = await detectPageTable(page, options);
          if (table) return table;
        } finally {
          page.cleanup();
        }
      }
      return null;
    } finally {
      await loadingTask.destroy();
    }
  },
};
