import { afterEach, describe, expect, it, vi } from 'vitest';

import type { AppConfig } from '@/lib/env';
import type { TableDetector } from '@/lib/pdf/detector';
import { createUploadHandler } from '@/lib/http/upload';
import type { DetectedTable } from '@/lib/timetable/grid';
import { WEEKDAY_VOCABULARIES } from '@/lib/timetable/weekdays';

const PDF_TEXT = '%PDF-1.7';

const baseConfig: AppConfig = {
  allowedOrigins: ['http://localhost:3000'],
  weekdays: WEEKDAY_VOCABULARIES.de,
  pageNumber: undefined,
  maxUploadBytes: 1024,
  debug: false,
};

const mondayTable: DetectedTable = {
  rows: [
    ['', 'Montag', 'Dienstag', 'Mittwoch', 'Donnerstag', 'Freitag'],
    ['1', 'MATH MM E201', '', '', '', ''],
  ],
};

function setup(
  detect: TableDetector['detectTable'],
  config: Partial<AppConfig> = {},
) {
  const detectTable = vi.fn(detect);
  const POST = createUploadHandler({
    detector: { detectTable },
    getConfig: () => ({ ...baseConfig, ...config }),
  });
  return { POST, detectTable };
}

function uploadRequest(file?: File): Request {
  const form = new FormData();
  if (file) form.append('file', file);
  return new Request('http://localhost/upload', { method: 'POST', body: form });
}

function pdfFile(type = 'application/pdf'): File {
  return new File([PDF_TEXT], 'plan.pdf', { type });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('POST /upload', () => {
  it('returns the class and timetable', async () => {
    const { POST, detectTable } = setup(async () => mondayTable, {
      pageNumber: 2,
    });
    const response = await POST(uploadRequest(pdfFile()));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      class: null,
      timetable: {
        Montag: {
          '1': [
            { subject: 'MATH', teacher: 'MM', room: 'E201', specialization: 1 },
          ],
        },
        Dienstag: { '1': [] },
        Mittwoch: { '1': [] },
        Donnerstag: { '1': [] },
        Freitag: { '1': [] },
      },
    });
    expect(detectTable).toHaveBeenCalledWith(
      new TextEncoder().encode(PDF_TEXT),
      { verticalStrategy: 'lines', horizontalStrategy: 'lines', pageNumber: 2 },
    );
  });

  it('requires a file in the "file" field', async () => {
    const { POST, detectTable } = setup(async () => mondayTable);
    const response = await POST(uploadRequest());

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "No file was uploaded. Use field name 'file'.",
    });
    expect(detectTable).not.toHaveBeenCalled();
  });

  it('rejects a body that is not a form', async () => {
    const { POST } = setup(async () => mondayTable);
    const response = await POST(
      new Request('http://localhost/upload', {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{}',
      }),
    );
    expect(response.status).toBe(400);
  });

  it('only accepts PDF uploads', async () => {
    const { POST, detectTable } = setup(async () => mondayTable);
    const response = await POST(uploadRequest(pdfFile('text/plain')));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Only PDF files are allowed.',
    });
    expect(detectTable).not.toHaveBeenCalled();
  });

  it('rejects files over the size limit', async () => {
    const { POST } = setup(async () => mondayTable, { maxUploadBytes: 4 });
    const response = await POST(uploadRequest(pdfFile()));

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({
      error: 'The file is larger than 4 bytes.',
    });
  });

  it('refuses a body declared larger than the limit before reading it', async () => {
    const { POST, detectTable } = setup(async () => mondayTable);
    const form = new FormData();
    form.append('file', pdfFile());
    const response = await POST(
      new Request('http://localhost/upload', {
        method: 'POST',
        headers: { 'content-length': String(50 * 1024 * 1024) },
        body: form,
      }),
    );

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({
      error: 'The file is larger than 1024 bytes.',
    });
    expect(detectTable).not.toHaveBeenCalled();
  });

  it('answers with a JSON error when the configuration cannot be loaded', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const POST = createUploadHandler({
      detector: { detectTable: async () => mondayTable },
      getConfig: () => {
        throw new Error(
          'Missing/invalid environment variables: TIMETABLE_PAGE',
        );
      },
    });
    const response = await POST(uploadRequest(pdfFile()));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: 'Unexpected error processing the PDF file.',
    });
    expect(errorSpy).toHaveBeenCalledOnce();
  });

  it('reports the cell that cannot be parsed', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { POST } = setup(async () => ({
      rows: [
        ['', 'Montag'],
        ['1', 'MATH MM'],
      ],
    }));
    const response = await POST(uploadRequest(pdfFile()));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error:
        'Could not parse cell at Montag, hour 1: expected "SUBJECT TEACHER ROOM" but found 2 token(s) in "MATH MM"',
      kind: 'CellParseError',
      cell: { weekday: 'Montag', hour: '1', text: 'MATH MM' },
    });
  });

  it('reports a PDF without a table', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { POST } = setup(async () => null);
    const response = await POST(uploadRequest(pdfFile()));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'No table found in the PDF.',
      kind: 'NoTableFound',
    });
  });

  it('hides unexpected failures behind a generic error', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { POST } = setup(async () => {
      throw new Error('worker exited');
    });
    const response = await POST(uploadRequest(pdfFile()));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: 'Unexpected error processing the PDF file.',
    });
    expect(errorSpy).toHaveBeenCalledOnce();
  });
});
