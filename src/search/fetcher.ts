/**
 * Semantic Scholar paper search client.
 * Fetches one page of raw search hits per call under the API's rate limits.
 *
 * API: https://api.semanticscholar.org/graph/v1/paper/search?query=...&offset=...&limit=...
 * Limits: at most 100 results per request, offset + limit <= 1000,
 * about one request per second for unauthenticated clients.
 */

import { z } from "zod";
import { FetchError, RateLimitExceededError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { type Clock, Throttle, systemClock } from "../throttle.js";
import { windowBounds, windowYears } from "../time-window.js";
import type { TimeWindow } from "../types.js";

const SEMANTIC_SCHOLAR_BASE = "https://api.semanticscholar.org/graph/v1";

/** Maximum results the API returns per request */
export const MAX_PAGE_SIZE = 100;

/** The API refuses offset + limit beyond this */
export const API_RESULT_WINDOW = 1000;

export const SEARCH_FIELDS = [
  "title",
  "year",
  "authors",
  "venue",
  "journal",
  "abstract",
  "url",
  "externalIds",
  "publicationDate",
].join(",");

/** One page of raw search hits. */
export interface SearchPage {
  records: unknown[];
  totalAvailable: number;
}

/**
 * A paginated search back end. A second back end is another implementation
 * of this interface.
 */
export interface PaperSearchSource {
  readonly name: string;
  fetchPage(query: string, window: TimeWindow, offset: number, pageSize: number): Promise<SearchPage>;
}

export interface SemanticScholarOptions {
  apiKey?: string;
  /** Shared spacing between outbound calls */
  throttle?: Throttle;
  /** Clock used for backoff sleeps */
  clock?: Clock;
  /** Per-request timeout in ms (default: 30000) */
  timeoutMs?: number;
  /** Retries after a 429 before giving up (default: 3) */
  maxRateLimitRetries?: number;
  /** First backoff delay after a 429 in ms, doubled per retry (default: 2000) */
  rateLimitBaseDelayMs?: number;
  /** Reference date for years-back windows */
  now?: () => Date;
  baseUrl?: string;
  logger?: Logger;
}

const searchResponseSchema = z.object({
  total: z.number().int().nonnegative().optional(),
  offset: z.number().optional(),
  next: z.number().optional(),
  data: z.array(z.unknown()).optional(),
});

/** HTTP status codes retried once as transient */
function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 408;
}

type AttemptOutcome =
  | { kind: "success"; page: SearchPage }
  | { kind: "rate-limited"; retryAfterMs: number | null }
  | { kind: "transient"; error: string; status: number | null }
  | { kind: "failed"; error: string; status: number | null };

function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

/** Build the window filter parameter for a search request. */
export function windowParams(window: TimeWindow, now: Date = new Date()): Record<string, string> {
  if (window.kind === "month-range") {
    const bounds = windowBounds(window, now);
    return { publicationDateOrYear: `${bounds.start}:${bounds.end}` };
  }
  const years = windowYears(window, now);
  return { year: `${years.start}-${years.end}` };
}

export class SemanticScholarFetcher implements PaperSearchSource {
  readonly name = "semantic_scholar";

  private readonly throttle: Throttle;
  private readonly clock: Clock;
  private readonly timeoutMs: number;
  private readonly maxRateLimitRetries: number;
  private readonly rateLimitBaseDelayMs: number;
  private readonly now: () => Date;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(private readonly options: SemanticScholarOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.throttle = options.throttle ?? new Throttle(undefined, this.clock);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? 3;
    this.rateLimitBaseDelayMs = options.rateLimitBaseDelayMs ?? 2000;
    this.now = options.now ?? (() => new Date());
    this.baseUrl = options.baseUrl ?? SEMANTIC_SCHOLAR_BASE;
    this.logger = (options.logger ?? silentLogger()).child({ component: "fetcher" });
  }

  /** Build the search URL for one page. */
  buildUrl(query: string, window: TimeWindow, offset: number, pageSize: number): string {
    const params = new URLSearchParams({
      query,
      offset: String(offset),
      limit: String(Math.min(pageSize, MAX_PAGE_SIZE)),
      fields: SEARCH_FIELDS,
      ...windowParams(window, this.now()),
    });
    return `${this.baseUrl}/paper/search?${params.toString()}`;
  }

  /**
   * Fetch one page of raw records.
   *
   * @throws RateLimitExceededError when 429 persists after all retries
   * @throws FetchError when the page cannot be fetched (network errors and 5xx are retried once)
   */
  async fetchPage(query: string, window: TimeWindow, offset: number, pageSize: number): Promise<SearchPage> {
    const url = this.buildUrl(query, window, offset, pageSize);
    let rateLimitRetries = 0;
    let transientRetries = 0;

    for (;;) {
      const outcome = await this.attempt(url);

      switch (outcome.kind) {
        case "success":
          return outcome.page;

        case "rate-limited": {
          if (rateLimitRetries >= this.maxRateLimitRetries) {
            throw new RateLimitExceededError(offset, rateLimitRetries);
          }
          rateLimitRetries++;
          const backoff = this.rateLimitBaseDelayMs * 2 ** (rateLimitRetries - 1);
          const delay = Math.max(backoff, outcome.retryAfterMs ?? 0);
          this.logger.warn({ offset, retry: rateLimitRetries, delayMs: delay }, "Rate limited, backing off");
          await this.clock.sleep(delay);
          break;
        }

        case "transient":
          if (transientRetries >= 1) {
            throw new FetchError(`Search request failed: ${outcome.error}`, offset, outcome.status);
          }
          transientRetries++;
          this.logger.warn({ offset, error: outcome.error }, "Search request failed, retrying once");
          break;

        case "failed":
          throw new FetchError(`Search request failed: ${outcome.error}`, offset, outcome.status);
      }
    }
  }

  private async attempt(url: string): Promise<AttemptOutcome> {
    await this.throttle.wait();

    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.options.apiKey) headers["x-api-key"] = this.options.apiKey;

    let response: Response;
    try {
      response = await fetch(url, { headers, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      return { kind: "transient", error: errorMessage(err), status: null };
    }

    if (!response.ok) {
      if (response.status === 429) {
        return { kind: "rate-limited", retryAfterMs: parseRetryAfter(response.headers.get("retry-after")) };
      }
      const error = `HTTP ${response.status} ${response.statusText}`;
      return isTransientStatus(response.status)
        ? { kind: "transient", error, status: response.status }
        : { kind: "failed", error, status: response.status };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      return { kind: "failed", error: `Invalid JSON: ${errorMessage(err)}`, status: response.status };
    }

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { kind: "failed", error: "Unexpected response shape", status: response.status };
    }

    const records = parsed.data.data ?? [];
    return {
      kind: "success",
      page: { records, totalAvailable: parsed.data.total ?? records.length },
    };
  }
}
