/**
 * # scholar-harvest
 *
 * Time-windowed literature search on Semantic Scholar with checkpointed
 * export and optional PDF acquisition.
 *
 * ## Workflow
 *
 * 1. **Search**: Page through the search API for a query within a time window,
 *    normalizing and deduplicating records and checkpointing every 5 papers.
 * 2. **Acquire**: Fetch the PDF of each record through a chain of open-access
 *    sources, optionally followed by university-access sources.
 * 3. **Export**: Write the results and download statistics as JSON.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { loadConfig, runHarvest } from "scholar-harvest";
 *
 * const outcome = await runHarvest(
 *   {
 *     query: "west nile virus prediction",
 *     monthRange: "2025-01-2025-06",
 *     maxResults: 50,
 *     outputPath: "results.json",
 *     downloadPdfs: true,
 *     pdfMode: "open_access",
 *   },
 *   { config: loadConfig() },
 * );
 *
 * console.log(outcome.export.total_results, outcome.stats.successes);
 * ```
 *
 * ## Configuration
 *
 * - **SEMANTIC_SCHOLAR_API_KEY** (optional): Higher search rate limits.
 * - **UNPAYWALL_EMAIL** (required for Unpaywall sources): Your email for the Unpaywall API.
 * - **CORE_API_KEY** (optional): Repository lookups via https://core.ac.uk/.
 * - **NCBI_API_KEY** / **NCBI_EMAIL** (optional): For NCBI E-utilities and ID Converter.
 * - **LLM_BASE_URL** / **LLM_MODEL** / **LLM_API_KEY**: OpenAI-compatible endpoint for query enhancement.
 *
 * ## Modules
 *
 * - **Search**: {@link SearchOrchestrator}, {@link SemanticScholarFetcher}, {@link normalizeRecord}, {@link resolveTimeWindow}
 * - **Acquisition**: {@link PdfAcquisitionChain}, {@link DEFAULT_SOURCES}, {@link downloadPdf}
 * - **Discovery**: {@link checkUnpaywall}, {@link checkCore}, {@link findPmcid}, {@link searchArxivByTitle}, {@link resolveDoiToPmcid}
 * - **Export**: {@link buildExport}, {@link writeJsonAtomic}, {@link IncrementalCheckpointer}, {@link summarizeAttempts}
 *
 * @packageDocumentation
 */

// Types
export type {
  AccessMode,
  AccessTier,
  ExternalIds,
  PaperRecord,
  PdfAttempt,
  PdfFileInfo,
  PdfOutcome,
  PdfStats,
  SearchRequest,
  SearchResult,
  SourceName,
  TimeWindow,
} from "./types.js";

// Errors
export {
  CheckpointError,
  ConfigError,
  EnhancementError,
  FetchError,
  HarvestError,
  type HarvestErrorCode,
  InvalidFormatError,
  InvalidRangeError,
  RateLimitExceededError,
} from "./errors.js";

// Configuration and logging
export { type HarvestConfig, loadConfig } from "./config.js";
export { createLogger, type Logger, silentLogger } from "./logger.js";
export { type Clock, DEFAULT_MIN_INTERVAL_MS, ManualClock, Throttle, systemClock } from "./throttle.js";

// Time windows
export {
  DEFAULT_YEARS_BACK,
  formatSearchPeriod,
  parseMonthRange,
  parseYearRange,
  resolveTimeWindow,
  splitByYear,
  type TimeOptions,
  windowBounds,
} from "./time-window.js";

// Identity and paths
export { identityHash, identityKey, normalizeDoi, normalizeTitle, pdfFileStem, slugifyTitle } from "./paper-key.js";
export { getDefaultPdfDir, getPdfInfoPath, getPdfPath, getPdfReportPath } from "./paths.js";

// Search
export {
  MAX_PAGE_SIZE,
  type PaperSearchSource,
  type SearchPage,
  SemanticScholarFetcher,
  type SemanticScholarOptions,
} from "./search/fetcher.js";
export { type NormalizeResult, normalizeRecord } from "./search/normalizer.js";
export { SearchOrchestrator, type SearchProgress, createSearchResult } from "./search/orchestrator.js";

// Query enhancement
export { type ChatCompleter, createChatCompleter, enhanceQuery, validateEnhancement } from "./enhance.js";

// Discovery
export { getArxivPdfUrl, searchArxivByTitle } from "./discovery/arxiv.js";
export { checkCore } from "./discovery/core.js";
export { extractPdfLinks, fetchLandingPage } from "./discovery/landing-page.js";
export { resolveDoiToPmcid } from "./discovery/ncbi-id-converter.js";
export { findPmcid, getPmcPdfUrl } from "./discovery/pmc.js";
export { checkUnpaywall, type UnpaywallLinks } from "./discovery/unpaywall.js";

// Acquisition
export { type AcquisitionProgress, PdfAcquisitionChain, hasResolvableIdentifier } from "./download/chain.js";
export { type DownloadOptions, type DownloadResult, downloadPdf } from "./download/downloader.js";
export { DEFAULT_SOURCES, type PdfSource, type SourceContext, type SourceOutcome } from "./download/sources.js";

// Export and reporting
export { CHECKPOINT_INTERVAL, type Checkpointer, IncrementalCheckpointer } from "./checkpoint.js";
export {
  type ExportContext,
  type SearchExport,
  buildExport,
  loadSearchExport,
  parseSearchExport,
  serializeExport,
  writeJsonAtomic,
} from "./export.js";
export { summarizeAttempts, summarizeFailures } from "./report.js";

// Pipeline
export { type HarvestOptions, type HarvestOutcome, runHarvest } from "./pipeline.js";
