/**
 * Search orchestrator.
 * Pages through the search source, normalizes and deduplicates records,
 * and checkpoints the result every few collected records.
 */

import { CHECKPOINT_INTERVAL, type Checkpointer } from "../checkpoint.js";
import { FetchError, RateLimitExceededError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { identityKey } from "../paper-key.js";
import { splitByYear, windowYears } from "../time-window.js";
import type { SearchRequest, SearchResult, TimeWindow } from "../types.js";
import { API_RESULT_WINDOW, MAX_PAGE_SIZE, type PaperSearchSource } from "./fetcher.js";
import { normalizeRecord } from "./normalizer.js";

export interface SearchProgress {
  /** Raw records processed so far; never decreases */
  processed: number;
  /** Best known number of records to process */
  total: number;
  /** Records kept so far */
  collected: number;
}

export interface OrchestratorOptions {
  source: PaperSearchSource;
  checkpointer?: Checkpointer;
  logger?: Logger;
  onProgress?: (progress: SearchProgress) => void;
  /** Reference date for years-back windows */
  now?: () => Date;
}

/** Why paging of a window stopped. */
type PagingEnd = "limit" | "exhausted" | "rate-limited";

/** Create an empty result for a request. */
export function createSearchResult(request: SearchRequest): SearchResult {
  return { request, papers: [], attempts: [], skipped: 0 };
}

export class SearchOrchestrator {
  private readonly source: PaperSearchSource;
  private readonly checkpointer: Checkpointer | undefined;
  private readonly logger: Logger;
  private readonly onProgress: ((progress: SearchProgress) => void) | undefined;
  private readonly now: () => Date;

  constructor(options: OrchestratorOptions) {
    this.source = options.source;
    this.checkpointer = options.checkpointer;
    this.logger = (options.logger ?? silentLogger()).child({ component: "orchestrator" });
    this.onProgress = options.onProgress;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Collect up to request.maxResults deduplicated records.
   * Page failures skip the page; a persistent rate limit ends paging early.
   */
  async run(request: SearchRequest): Promise<SearchResult> {
    const result = createSearchResult(request);
    if (request.maxResults <= 0) return result;

    const state: RunState = { seen: new Set(), processed: 0, total: request.maxResults };

    for (const window of this.planWindows(request)) {
      const end = await this.pageWindow(window, result, state);
      if (end === "limit" || end === "rate-limited") break;
    }

    this.logger.info(
      { collected: result.papers.length, skipped: result.skipped, source: this.source.name },
      `Found ${result.papers.length} papers`
    );
    return result;
  }

  /**
   * A window is split per year only when maxResults cannot be reached
   * within the API's result window.
   */
  private planWindows(request: SearchRequest): TimeWindow[] {
    if (request.maxResults <= API_RESULT_WINDOW) return [request.timeWindow];
    const years = windowYears(request.timeWindow, this.now());
    if (years.start === years.end) return [request.timeWindow];
    return splitByYear(request.timeWindow, this.now());
  }

  private async pageWindow(window: TimeWindow, result: SearchResult, state: RunState): Promise<PagingEnd> {
    const { enhancedQuery, maxResults } = result.request;
    const pageSize = Math.min(maxResults, MAX_PAGE_SIZE);
    let totalAvailable: number | null = null;

    for (let offset = 0; ; offset += pageSize) {
      if (result.papers.length >= maxResults) return "limit";
      if (offset >= (totalAvailable ?? maxResults)) return "exhausted";
      if (offset + pageSize > API_RESULT_WINDOW) return "exhausted";

      let records: unknown[];
      try {
        const page = await this.source.fetchPage(enhancedQuery, window, offset, pageSize);
        records = page.records;
        totalAvailable = page.totalAvailable;
      } catch (err) {
        if (err instanceof RateLimitExceededError) {
          this.logger.warn({ offset, retries: err.retries }, "Rate limit exceeded, keeping gathered results");
          return "rate-limited";
        }
        if (err instanceof FetchError) {
          this.logger.warn({ offset, status: err.status, error: err.message }, "Skipping page");
          continue;
        }
        throw err;
      }

      if (records.length === 0) return "exhausted";

      state.total = Math.max(state.total, state.processed + records.length);
      this.logger.info(
        { offset, received: records.length, totalAvailable },
        `Fetched page at offset ${offset}`
      );

      await this.collect(records, result, state);
    }
  }

  private async collect(records: unknown[], result: SearchResult, state: RunState): Promise<void> {
    const { maxResults } = result.request;

    for (const raw of records) {
      state.processed++;

      if (result.papers.length < maxResults) {
        const normalized = normalizeRecord(raw);
        if (normalized.kind === "skip") {
          result.skipped++;
          this.logger.debug({ reason: normalized.reason }, "Skipped record");
        } else {
          const key = identityKey(normalized.record);
          if (state.seen.has(key)) {
            this.logger.debug({ key }, "Duplicate record");
          } else {
            state.seen.add(key);
            result.papers.push(normalized.record);
            if (this.checkpointer && result.papers.length % CHECKPOINT_INTERVAL === 0) {
              await this.checkpointer.save(result);
            }
          }
        }
      }

      this.onProgress?.({
        processed: state.processed,
        total: state.total,
        collected: result.papers.length,
      });
    }
  }
}

interface RunState {
  seen: Set<string>;
  processed: number;
  total: number;
}
