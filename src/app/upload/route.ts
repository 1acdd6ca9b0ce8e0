import { getConfig } from '@/lib/env';
import { createUploadHandler } from '@/lib/http/upload';
import { pdfjsTableDetector } from '@/lib/pdf/pdfjs';

export const runtime = 'nodejs';

export const POST = createUploadHandler({
  detector: pdfjsTableDetector,
  getConfig,
});
