/**
 * End-to-end harvest run: resolve the time window, enhance the query,
 * collect records with checkpointing, optionally acquire PDFs, and export.
 */

import { IncrementalCheckpointer } from "./checkpoint.js";
import type { HarvestConfig } from "./config.js";
import { PdfAcquisitionChain, type AcquisitionProgress } from "./download/chain.js";
import type { SourceSettings } from "./download/sources.js";
import { type ChatCompleter, createChatCompleter, enhanceQuery } from "./enhance.js";
import { ConfigError } from "./errors.js";
import { type ExportContext, type SearchExport, buildExport, writeJsonAtomic } from "./export.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { getDefaultPdfDir, getPdfReportPath } from "./paths.js";
import { summarizeAttempts, summarizeFailures } from "./report.js";
import { type PaperSearchSource, SemanticScholarFetcher } from "./search/fetcher.js";
import { SearchOrchestrator, type SearchProgress } from "./search/orchestrator.js";
import { Throttle } from "./throttle.js";
import { resolveTimeWindow } from "./time-window.js";
import type { AccessMode, PdfAttempt, PdfStats, SearchRequest, SearchResult } from "./types.js";

export const DEFAULT_MAX_RESULTS = 20;

export interface HarvestOptions {
  query: string;
  yearsBack?: number | undefined;
  yearRange?: string | undefined;
  monthRange?: string | undefined;
  /** Default: 20 */
  maxResults?: number | undefined;
  /** Export path; also receives checkpoints */
  outputPath?: string | undefined;
  downloadPdfs?: boolean | undefined;
  /** Default: open_access */
  pdfMode?: AccessMode | undefined;
  /** Default: derived from the query */
  pdfDir?: string | undefined;
  /** Default: true */
  enhance?: boolean | undefined;
}

export interface HarvestDependencies {
  config: HarvestConfig;
  logger?: Logger;
  /** Search back end (default: Semantic Scholar) */
  source?: PaperSearchSource;
  /** Acquisition chain (default: all built-in sources) */
  chain?: PdfAcquisitionChain;
  /** Chat client for enhancement (default: built from config) */
  completer?: ChatCompleter;
  /** Shared request spacing (default: 1 s) */
  throttle?: Throttle;
  now?: () => Date;
  onSearchProgress?: (progress: SearchProgress) => void;
  onPdfProgress?: (progress: AcquisitionProgress) => void;
}

export interface HarvestOutcome {
  result: SearchResult;
  export: SearchExport;
  stats: PdfStats;
  failureReasons: Array<{ reason: string; count: number }>;
  pdfDir: string;
  pdfReportPath?: string;
}

/** Detailed per-record PDF report written next to the export. */
export interface PdfReport {
  download_summary: SearchExport["pdf_downloads"]["statistics"];
  download_directory: string;
  detailed_results: Array<{
    title: string;
    doi: string | null;
    status: "downloaded" | "already_exists" | "failed";
    filepath: string | null;
    source: string | null;
    attempted_sources: string[];
    failure_reasons: string[];
  }>;
  timestamp: string;
}

function validateMaxResults(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Invalid max results "${value}": must be a positive integer`);
  }
  return value;
}

export function buildPdfReport(doc: SearchExport, attempts: readonly PdfAttempt[], timestamp: Date): PdfReport {
  return {
    download_summary: doc.pdf_downloads.statistics,
    download_directory: doc.pdf_downloads.directory,
    detailed_results: attempts.map((attempt) => {
      const success = attempt.outcome.kind === "success" ? attempt.outcome : null;
      return {
        title: attempt.record.title,
        doi: attempt.record.doi,
        status: success ? (success.reused ? "already_exists" : "downloaded") : "failed",
        filepath: success ? success.path : null,
        source: attempt.sourceThatSucceeded,
        attempted_sources: [...attempt.sourcesTried],
        failure_reasons:
          attempt.outcome.kind === "failure"
            ? [attempt.outcome.reason, ...attempt.failures.map((f) => `${f.source}: ${f.error}`)]
            : [],
      };
    }),
    timestamp: timestamp.toISOString(),
  };
}

function sourceSettings(config: HarvestConfig): SourceSettings {
  const settings: SourceSettings = { timeoutMs: config.requestTimeoutMs };
  if (config.unpaywallEmail) settings.unpaywallEmail = config.unpaywallEmail;
  if (config.coreApiKey) settings.coreApiKey = config.coreApiKey;
  if (config.ncbiApiKey) settings.ncbiApiKey = config.ncbiApiKey;
  if (config.ncbiEmail) settings.ncbiEmail = config.ncbiEmail;
  return settings;
}

async function resolveQuery(
  query: string,
  options: HarvestOptions,
  deps: HarvestDependencies,
  logger: Logger
): Promise<string> {
  if (options.enhance === false) return query;

  const completer =
    deps.completer ??
    createChatCompleter({
      baseUrl: deps.config.llm.baseUrl,
      model: deps.config.llm.model,
      apiKey: deps.config.llm.apiKey,
    });
  const enhanced = await enhanceQuery(query, completer);
  if (enhanced.ok) {
    logger.info({ enhancedQuery: enhanced.value }, "Enhanced query");
    return enhanced.value;
  }
  logger.warn({ error: enhanced.error.message }, "Query enhancement failed, using original query");
  return query;
}

/**
 * Run a full harvest.
 *
 * @throws ConfigError for conflicting or malformed options, before any request
 * @throws CheckpointError when a checkpoint or the export cannot be written
 */
export async function runHarvest(options: HarvestOptions, deps: HarvestDependencies): Promise<HarvestOutcome> {
  const logger = deps.logger ?? silentLogger();
  const now = deps.now ?? (() => new Date());

  const rawQuery = options.query.trim();
  if (!rawQuery) throw new ConfigError("Query must not be empty");
  const timeWindow = resolveTimeWindow(options);
  const maxResults = validateMaxResults(options.maxResults ?? DEFAULT_MAX_RESULTS);
  const pdfMode: AccessMode = options.pdfMode ?? "open_access";
  const pdfDir = options.pdfDir ?? getDefaultPdfDir(rawQuery);
  const downloadPdfs = options.downloadPdfs ?? false;

  const throttle = deps.throttle ?? new Throttle();
  const enhancedQuery = await resolveQuery(rawQuery, options, deps, logger);

  const request: SearchRequest = Object.freeze({ rawQuery, enhancedQuery, timeWindow, maxResults });
  const context: ExportContext = {
    searchDate: now(),
    pdf: { enabled: downloadPdfs, mode: pdfMode, directory: pdfDir },
  };

  const source =
    deps.source ??
    new SemanticScholarFetcher({
      ...(deps.config.semanticScholarApiKey ? { apiKey: deps.config.semanticScholarApiKey } : {}),
      throttle,
      timeoutMs: deps.config.requestTimeoutMs,
      now,
      logger,
    });

  const orchestrator = new SearchOrchestrator({
    source,
    logger,
    now,
    ...(options.outputPath ? { checkpointer: new IncrementalCheckpointer(options.outputPath, context, logger) } : {}),
    ...(deps.onSearchProgress ? { onProgress: deps.onSearchProgress } : {}),
  });

  const result = await orchestrator.run(request);

  if (downloadPdfs && result.papers.length > 0) {
    logger.info({ mode: pdfMode, directory: pdfDir }, `Downloading PDFs using ${pdfMode} mode`);
    const chain =
      deps.chain ?? new PdfAcquisitionChain({ settings: sourceSettings(deps.config), throttle, logger });
    result.attempts = await chain.acquireAll(result.papers, pdfMode, pdfDir, deps.onPdfProgress);
  }

  const doc = buildExport(result, context);
  const stats = summarizeAttempts(result.attempts);
  const outcome: HarvestOutcome = {
    result,
    export: doc,
    stats,
    failureReasons: summarizeFailures(result.attempts),
    pdfDir,
  };

  if (options.outputPath) {
    await writeJsonAtomic(options.outputPath, doc);
    logger.info({ path: options.outputPath }, "Results saved");

    if (downloadPdfs && result.attempts.length > 0) {
      const reportPath = getPdfReportPath(options.outputPath);
      await writeJsonAtomic(reportPath, buildPdfReport(doc, result.attempts, now()));
      outcome.pdfReportPath = reportPath;
    }
  }

  return outcome;
}
