/**
 * Export schema for search results and checkpoints.
 *
 * Checkpoints and the final export share this schema; a checkpoint is the
 * export of the partial result.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { CheckpointError } from "./errors.js";
import { getTempPath } from "./paths.js";
import { summarizeAttempts } from "./report.js";
import { formatSearchPeriod, yearsBackOf } from "./time-window.js";
import type { AccessMode, PaperRecord, SearchResult } from "./types.js";

export const API_SOURCE = "semantic_scholar";

const exportedPaperSchema = z.object({
  publish_year: z.string().nullable(),
  title: z.string(),
  journal: z.string().nullable(),
  doi: z.string().nullable(),
  authors: z.array(z.string()),
  abstract: z.string().nullable(),
  url: z.string().nullable(),
});

export const searchExportSchema = z.object({
  search_query: z.string(),
  years_back: z.number().int().nullable(),
  search_period: z.string().nullable(),
  api_source: z.string(),
  total_results: z.number().int().nonnegative(),
  search_date: z.string().datetime({ offset: true }),
  papers: z.array(exportedPaperSchema),
  pdf_downloads: z.object({
    enabled: z.boolean(),
    mode: z.string(),
    directory: z.string(),
    statistics: z.object({
      total_attempts: z.number().int().nonnegative(),
      successful_downloads: z.number().int().nonnegative(),
      open_access_found: z.number().int().nonnegative(),
      university_access_used: z.number().int().nonnegative(),
      failed_downloads: z.number().int().nonnegative(),
    }),
  }),
});

export type ExportedPaper = z.infer<typeof exportedPaperSchema>;
export type SearchExport = z.infer<typeof searchExportSchema>;

/** Run-level values that are not part of SearchResult. */
export interface ExportContext {
  /** Run start; fixed so repeated checkpoints of the same state are identical */
  searchDate: Date;
  pdf: {
    enabled: boolean;
    mode: AccessMode;
    directory: string;
  };
  apiSource?: string;
}

export function toExportedPaper(record: PaperRecord): ExportedPaper {
  return {
    publish_year: record.publishYear,
    title: record.title,
    journal: record.journal,
    doi: record.doi,
    authors: [...record.authors],
    abstract: record.abstract,
    url: record.url,
  };
}

/** Build the export document for a (possibly partial) result. */
export function buildExport(result: SearchResult, context: ExportContext): SearchExport {
  const stats = summarizeAttempts(result.attempts);
  const window = result.request.timeWindow;

  return {
    search_query: result.request.rawQuery,
    years_back: yearsBackOf(window),
    search_period: formatSearchPeriod(window, context.searchDate),
    api_source: context.apiSource ?? API_SOURCE,
    total_results: result.papers.length,
    search_date: context.searchDate.toISOString(),
    papers: result.papers.map(toExportedPaper),
    pdf_downloads: {
      enabled: context.pdf.enabled,
      mode: context.pdf.mode,
      directory: context.pdf.directory,
      statistics: {
        total_attempts: stats.attempts,
        successful_downloads: stats.successes,
        open_access_found: stats.byOpenAccess,
        university_access_used: stats.byUniversityAccess,
        failed_downloads: stats.failures,
      },
    },
  };
}

/** Serialize with 2-space indentation and a trailing newline. */
export function serializeExport(doc: SearchExport): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

/** Validate a parsed export document. */
export function parseSearchExport(data: unknown): SearchExport {
  return searchExportSchema.parse(data);
}

/** Load and validate an export or checkpoint file. */
export async function loadSearchExport(path: string): Promise<SearchExport> {
  const raw = await readFile(path, "utf-8");
  return parseSearchExport(JSON.parse(raw));
}

/**
 * Write JSON through a temporary file and rename it over the target,
 * so readers only ever see a complete document.
 *
 * @throws CheckpointError on any I/O failure
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  const tempPath = getTempPath(path);
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, JSON.stringify(data, null, 2) + "\n", "utf-8");
    await rename(tempPath, path);
  } catch (err) {
    throw new CheckpointError(path, err);
  }
}
