/**
 * PDF acquisition chain.
 * Tries the fulltext sources allowed by the access mode, in order, until one
 * yields a PDF. Records are processed one at a time.
 */

import { mkdir } from "node:fs/promises";
import { basename } from "node:path";
import { type UnpaywallLinks, checkUnpaywall } from "../discovery/unpaywall.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { errorMessage } from "../errors.js";
import { identityHash, identityKey } from "../paper-key.js";
import { getPdfInfoPath, getPdfPath } from "../paths.js";
import { Throttle } from "../throttle.js";
import type { AccessMode, PaperRecord, PdfAttempt, PdfFileInfo, SourceName } from "../types.js";
import { type DownloadResult, downloadPdf } from "./downloader.js";
import { findPdfByIdentity, loadFileInfo, saveFileInfo, sidecarPathFor } from "./file-info.js";
import { DEFAULT_SOURCES, type PdfSource, type SourceContext, type SourceSettings } from "./sources.js";

export interface ChainOptions {
  settings: SourceSettings;
  /** Sources in chain order (default: all built-in sources) */
  sources?: readonly PdfSource[];
  /** Spacing between downloads, shared with the search client */
  throttle?: Throttle;
  /** Attempts per download URL (default: 2) */
  downloadRetries?: number;
  /** Delay between download attempts in ms (default: 1000) */
  downloadRetryDelay?: number;
  logger?: Logger;
}

export interface AcquisitionProgress {
  completed: number;
  total: number;
  title: string;
  attempt: PdfAttempt;
}

/** Whether a record carries any identifier a source can resolve. */
export function hasResolvableIdentifier(record: PaperRecord): boolean {
  const ids = record.externalIds;
  return Boolean(record.doi || ids.arxiv || ids.pmcid || ids.pmid);
}

export class PdfAcquisitionChain {
  private readonly settings: SourceSettings;
  private readonly sources: readonly PdfSource[];
  private readonly throttle: Throttle;
  private readonly downloadRetries: number;
  private readonly downloadRetryDelay: number;
  private readonly logger: Logger;
  private readonly unpaywallCache = new Map<string, Promise<UnpaywallLinks | null>>();

  constructor(options: ChainOptions) {
    this.settings = options.settings;
    this.sources = options.sources ?? DEFAULT_SOURCES;
    this.throttle = options.throttle ?? new Throttle();
    this.downloadRetries = options.downloadRetries ?? 2;
    this.downloadRetryDelay = options.downloadRetryDelay ?? 1000;
    this.logger = (options.logger ?? silentLogger()).child({ component: "pdf-chain" });
  }

  /**
   * Sources tried for a mode, in order.
   * Open access uses the open-access tier only; university access appends the rest.
   */
  sourcesFor(mode: AccessMode): PdfSource[] {
    const openAccess = this.sources.filter((s) => s.tier === "open_access");
    if (mode === "open_access") return openAccess;
    return [...openAccess, ...this.sources.filter((s) => s.tier === "university_access")];
  }

  /** Acquire the PDF of one record into targetDir. Never throws for source failures. */
  async acquire(record: PaperRecord, mode: AccessMode, targetDir: string): Promise<PdfAttempt> {
    const attempt: PdfAttempt = {
      record,
      mode,
      sourcesTried: [],
      outcome: { kind: "failure", reason: "No source attempted" },
      sourceThatSucceeded: null,
      tier: null,
      failures: [],
    };
    const key = identityKey(record);

    if (!hasResolvableIdentifier(record)) {
      attempt.outcome = { kind: "failure", reason: "No resolvable identifier" };
      this.logger.info({ key }, "No DOI or external identifier, skipping PDF");
      return attempt;
    }

    const pdfPath = getPdfPath(targetDir, record);
    const infoPath = getPdfInfoPath(targetDir, record);

    const existing = await findPdfByIdentity(targetDir, identityHash(record));
    if (existing) {
      const info = await loadFileInfo(sidecarPathFor(existing));
      attempt.outcome = { kind: "success", path: existing, reused: true };
      attempt.sourceThatSucceeded = info?.source ?? "local";
      attempt.tier = info?.tier ?? "open_access";
      this.logger.info({ key, path: existing }, "PDF already downloaded");
      return attempt;
    }

    try {
      await mkdir(targetDir, { recursive: true });
    } catch (err) {
      attempt.outcome = { kind: "failure", reason: `Cannot create PDF directory: ${errorMessage(err)}` };
      this.logger.warn({ key, directory: targetDir, error: errorMessage(err) }, "Cannot create PDF directory");
      return attempt;
    }
    const context = this.createContext(pdfPath);

    for (const source of this.sourcesFor(mode)) {
      const outcome = await source.tryFetch(record, context);

      if (outcome.kind === "skipped") {
        this.logger.debug({ key, source: source.name, reason: outcome.reason }, "Source not applicable");
        continue;
      }

      attempt.sourcesTried.push(source.name);

      if (outcome.kind === "failed") {
        attempt.failures.push({ source: source.name, error: outcome.error });
        this.logger.info({ key, source: source.name, error: outcome.error }, "PDF source failed");
        continue;
      }

      attempt.outcome = { kind: "success", path: pdfPath, reused: false };
      attempt.sourceThatSucceeded = source.name;
      attempt.tier = source.tier;
      try {
        await saveFileInfo(infoPath, {
          identityKey: key,
          filename: basename(pdfPath),
          source: source.name,
          tier: source.tier,
          url: outcome.url,
          size: outcome.size,
          retrievedAt: new Date().toISOString(),
        } satisfies PdfFileInfo);
      } catch (err) {
        // The PDF is on disk; only its provenance is lost.
        this.logger.warn({ key, path: infoPath, error: errorMessage(err) }, "Cannot write PDF sidecar");
      }
      this.logger.info({ key, source: source.name, url: outcome.url }, "Downloaded PDF");
      return attempt;
    }

    attempt.outcome = {
      kind: "failure",
      reason: attempt.sourcesTried.length > 0 ? "All sources failed" : "No applicable source",
    };
    return attempt;
  }

  /**
   * Acquire PDFs for records in order. Records sharing an identity key are
   * acquired once.
   */
  async acquireAll(
    records: readonly PaperRecord[],
    mode: AccessMode,
    targetDir: string,
    onProgress?: (progress: AcquisitionProgress) => void
  ): Promise<PdfAttempt[]> {
    const seen = new Set<string>();
    const unique = records.filter((record) => {
      const key = identityKey(record);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });

    const attempts: PdfAttempt[] = [];
    for (const record of unique) {
      const attempt = await this.acquire(record, mode, targetDir);
      attempts.push(attempt);
      onProgress?.({ completed: attempts.length, total: unique.length, title: record.title, attempt });
    }
    return attempts;
  }

  private createContext(pdfPath: string): SourceContext {
    const triedUrls = new Set<string>();

    return {
      settings: this.settings,
      download: async (url, headers): Promise<DownloadResult> => {
        if (triedUrls.has(url)) {
          return { success: false, error: `Already tried ${url}` };
        }
        triedUrls.add(url);
        await this.throttle.wait();
        const options = {
          retries: this.downloadRetries,
          retryDelay: this.downloadRetryDelay,
          timeoutMs: this.settings.timeoutMs,
          ...(headers ? { headers } : {}),
        };
        return downloadPdf(url, pdfPath, options);
      },
      unpaywall: (doi) => this.lookupUnpaywall(doi),
    };
  }

  private lookupUnpaywall(doi: string): Promise<UnpaywallLinks | null> {
    const email = this.settings.unpaywallEmail;
    if (!email) return Promise.resolve(null);

    const cacheKey = doi.toLowerCase();
    let pending = this.unpaywallCache.get(cacheKey);
    if (!pending) {
      pending = checkUnpaywall(doi, email, { timeoutMs: this.settings.timeoutMs });
      this.unpaywallCache.set(cacheKey, pending);
    }
    return pending;
  }
}
