// src/types/transcript.types.ts

/**
 * How the stripper reads a single line of a formatted transcript.
 * - blank: empty or whitespace only (page headers, double spacing, form feeds)
 * - numbered: line number + separator + content
 * - footer: digits only (page footers and padding slots)
 * - text: anything else, kept as-is
 */
export type LineKind = 'blank' | 'numbered' | 'footer' | 'text';

export interface ClassifiedLine {
  kind: LineKind;
  /** Text kept by the stripper; undefined for discarded lines */
  content?: string;
}

export interface PaginationResult {
  text: string;
  pageCount: number;
}

export interface ProcessedFile {
  inputPath: string;
  outputPath: string;
  status: 'success';
}

export interface FailedFile {
  file: string;
  error: string;
}

export interface BatchStripResult {
  processed: ProcessedFile[];
  failed: FailedFile[];
  skipped: string[];
}

export interface BatchSummary {
  processed: number;
  failed: number;
  skipped: boolean;
}
