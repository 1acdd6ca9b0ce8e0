import { NextResponse } from 'next/server';

import type { AppConfig } from '@/lib/env';
import type { TableDetector } from '@/lib/pdf/detector';
import { extractTimetable } from '@/lib/timetable/extract';
import {
  timetableResponseSchema,
  type TimetableResponse,
} from '@/lib/timetable/types';

export const UPLOAD_FIELD = 'file';
const PDF_CONTENT_TYPE = 'application/pdf';
// room for the multipart boundaries and part headers around the file
const FORM_ENVELOPE_BYTES = 16 * 1024;

export type UploadHandlerDeps = {
  detector: TableDetector;
  getConfig: () => AppConfig;
};

function tooLarge(maxUploadBytes: number): Response {
  return NextResponse.json(
    { error: `The file is larger than ${maxUploadBytes} bytes.` },
    { status: 413 },
  );
}

function declaredLength(request: Request): number | null {
  const header = request.headers.get('content-length');
  if (header === null || !/^\d+$/.test(header.trim())) return null;
  return Number(header.trim());
}

function isFile(value: FormDataEntryValue | null): value is File {
  return typeof value === 'object' && value instanceof File;
}

export function createUploadHandler(deps: UploadHandlerDeps) {
  return async function POST(request: Request): Promise<Response> {
    try {
      const config = deps.getConfig();

      // refuse oversized bodies before buffering them
      const length = declaredLength(request);
      if (
        length !== null &&
        length > config.maxUploadBytes + FORM_ENVELOPE_BYTES
      ) {
        return tooLarge(config.maxUploadBytes);
      }

      const form = await request.formData().catch(() => null);
      const file = form?.get(UPLOAD_FIELD) ?? null;
      if (!isFile(file)) {
        return NextResponse.json(
          { error: `No file was uploaded. Use field name '${UPLOAD_FIELD}'.` },
          { status: 400 },
        );
      }
      if (file.type !== PDF_CONTENT_TYPE) {
        return NextResponse.json(
          { error: 'Only PDF files are allowed.' },
          { status: 400 },
        );
      }
      if (file.size > config.maxUploadBytes) {
        return tooLarge(config.maxUploadBytes);
      }

      const pdf = new Uint8Array(await file.arrayBuffer());
      const result = await extractTimetable(pdf, {
        detector: deps.detector,
        weekdays: config.weekdays,
        pageNumber: config.pageNumber,
      });

      if (!result.success) {
        console.warn(
          `[upload] ${result.error.kind} for ${file.name || 'upload'}: ${result.error.message}`,
        );
        return NextResponse.json(
          {
            error: result.error.message,
            kind: result.error.kind,
            ...(result.error.cell ? { cell: result.error.cell } : {}),
          },
          { status: 400 },
        );
      }

      const response: TimetableResponse = {
        class: result.data.className,
        timetable: result.data.timetable,
      };
      const parsed = timetableResponseSchema.safeParse(response);
      if (!parsed.success) {
        console.error('[upload] response validation failed', parsed.error);
        return NextResponse.json(
          { error: 'Internal response validation failed.' },
          { status: 500 },
        );
      }

      if (config.debug) {
        console.log(
          `[upload] extracted ${file.name || 'upload'} (${result.data.orientation}, class ${result.data.className ?? 'unknown'})`,
        );
      }
      return NextResponse.json(parsed.data);
    } catch (err) {
      console.error('[upload] unexpected failure', err);
      return NextResponse.json(
        { error: 'Unexpected error processing the PDF file.' },
        { status: 500 },
      );
    }
  };
}
