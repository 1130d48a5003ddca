/**
 * Path resolution utilities for exports and PDF downloads.
 */

import { join } from 'node:path';
import { pdfFileStem } from './paper-key.js';
import type { PaperRecord } from './types.js';

type FileRecord = Pick<PaperRecord, 'doi' | 'title' | 'publishYear'>;

/** Default PDF directory derived from the query: "pdfs_" + first 20 chars, spaces as underscores. */
export function getDefaultPdfDir(query: string): string {
  return `pdfs_${query.replace(/ /g, '_').slice(0, 20)}`;
}

/** Get the PDF path for a record. */
export function getPdfPath(pdfDir: string, record: FileRecord): string {
  return join(pdfDir, `${pdfFileStem(record)}.pdf`);
}

/** Get the sidecar metadata path for a record's PDF. */
export function getPdfInfoPath(pdfDir: string, record: FileRecord): string {
  return join(pdfDir, `${pdfFileStem(record)}.json`);
}

/** Get the PDF report path next to an export file: "out.json" → "out_pdf_report.json". */
export function getPdfReportPath(outputPath: string): string {
  return outputPath.endsWith('.json')
    ? `${outputPath.slice(0, -'.json'.length)}_pdf_report.json`
    : `${outputPath}_pdf_report.json`;
}

/** Temporary path used while a checkpoint is being written. */
export function getTempPath(path: string): string {
  return `${path}.tmp`;
}
