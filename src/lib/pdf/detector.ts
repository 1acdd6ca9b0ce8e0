import type { DetectedTable } from '@/lib/timetable/grid';

// 'lines' reads stroked lines and rectangle edges, 'lines_strict' only lines.
export type TableStrategy = 'lines' | 'lines_strict';

export type DetectTableOptions = {
  verticalStrategy: TableStrategy;
  horizontalStrategy: TableStrategy;
  // 1-based; without it the first page holding a table wins
  pageNumber?: number;
};

export interface TableDetector {
  detectTable(
    pdf: Uint8Array,
    options: DetectTableOptions,
  ): Promise<DetectedTable | null>;
}
