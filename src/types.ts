/**
 * Harvest type definitions.
 * Defines the search request, paper records, PDF attempts, and the run result.
 */

/**
 * Canonical time window of a search. Exactly one variant is active per request.
 */
export type TimeWindow =
  | { kind: "years-back"; years: number }
  | { kind: "year-range"; startYear: number; endYear: number }
  | {
      kind: "month-range";
      startYear: number;
      startMonth: number;
      endYear: number;
      endMonth: number;
    };

/**
 * A search as resolved at run start. Never mutated after construction.
 */
export interface SearchRequest {
  readonly rawQuery: string;
  /** Query sent to the search API; equals rawQuery when enhancement failed */
  readonly enhancedQuery: string;
  readonly timeWindow: TimeWindow;
  readonly maxResults: number;
}

/**
 * Identifiers beyond the DOI, used only to locate fulltext.
 */
export interface ExternalIds {
  arxiv?: string;
  pmid?: string;
  /** Always carries the "PMC" prefix */
  pmcid?: string;
}

/**
 * A normalized bibliographic record.
 */
export interface PaperRecord {
  publishYear: string | null;
  title: string;
  journal: string | null;
  doi: string | null;
  authors: string[];
  abstract: string | null;
  url: string | null;
  externalIds: ExternalIds;
}

/** PDF acquisition mode chosen by the user. */
export type AccessMode = "open_access" | "university_access";

/** Which access tier supplied a PDF. */
export type AccessTier = "open_access" | "university_access";

/** Content sources of the acquisition chain, plus "local" for files already on disk. */
export type SourceName =
  | "arxiv"
  | "pmc"
  | "unpaywall"
  | "oa-journal"
  | "publisher"
  | "repository"
  | "doi"
  | "local";

export type PdfOutcome =
  | { kind: "success"; path: string; reused: boolean }
  | { kind: "failure"; reason: string };

/**
 * Result of acquiring the PDF for one record.
 */
export interface PdfAttempt {
  record: PaperRecord;
  mode: AccessMode;
  /** Sources contacted, in order */
  sourcesTried: SourceName[];
  outcome: PdfOutcome;
  sourceThatSucceeded: SourceName | null;
  tier: AccessTier | null;
  /** Per-source failure messages, in order */
  failures: Array<{ source: SourceName; error: string }>;
}

export interface PdfStats {
  attempts: number;
  successes: number;
  byOpenAccess: number;
  byUniversityAccess: number;
  failures: number;
}

/**
 * The run's single mutable state, owned by the orchestrator until export.
 */
export interface SearchResult {
  request: SearchRequest;
  papers: PaperRecord[];
  attempts: PdfAttempt[];
  /** Raw records dropped by normalization */
  skipped: number;
}

/**
 * Sidecar metadata written next to each downloaded PDF.
 */
export interface PdfFileInfo {
  identityKey: string;
  /** Fixed filename of the PDF within the target directory */
  filename: string;
  source: SourceName;
  tier: AccessTier;
  url: string;
  /** File size in bytes */
  size: number;
  /** ISO 8601 timestamp when the file was retrieved */
  retrievedAt: string;
}
