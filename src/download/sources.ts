/**
 * Fulltext sources of the PDF acquisition chain.
 *
 * Every source shares one interface: given a record, find candidate URLs
 * and download the first that yields a PDF. A source whose precondition is
 * not met (no DOI, no API key) is skipped without any request.
 */

import { type ArxivSearchOptions, getArxivPdfUrl, searchArxivByTitle } from "../discovery/arxiv.js";
import { checkCore } from "../discovery/core.js";
import {
  OA_JOURNAL_PDF_SELECTORS,
  PUBLISHER_PDF_SELECTORS,
  extractPdfLinks,
  fetchLandingPage,
} from "../discovery/landing-page.js";
import { type PmcIdentifiers, type PmcOptions, findPmcid, getPmcPdfUrl } from "../discovery/pmc.js";
import type { UnpaywallLinks } from "../discovery/unpaywall.js";
import { errorMessage } from "../errors.js";
import type { AccessTier, PaperRecord, SourceName } from "../types.js";
import type { DownloadResult } from "./downloader.js";

export type SourceOutcome =
  | { kind: "success"; url: string; size: number }
  | { kind: "skipped"; reason: string }
  | { kind: "failed"; error: string };

/** Credentials and limits available to sources. */
export interface SourceSettings {
  unpaywallEmail?: string;
  coreApiKey?: string;
  ncbiApiKey?: string;
  ncbiEmail?: string;
  /** Timeout of each lookup and download in ms */
  timeoutMs: number;
}

/** Per-record services handed to each source by the chain. */
export interface SourceContext {
  settings: SourceSettings;
  /**
   * Download a URL to the record's PDF path.
   * A URL already tried for this record is not requested again.
   */
  download(url: string, headers?: Record<string, string>): Promise<DownloadResult>;
  /** Unpaywall links for a DOI, looked up at most once per run */
  unpaywall(doi: string): Promise<UnpaywallLinks | null>;
}

export interface PdfSource {
  readonly name: SourceName;
  readonly tier: AccessTier;
  tryFetch(record: PaperRecord, context: SourceContext): Promise<SourceOutcome>;
}

/** Download candidate URLs in order until one succeeds. */
export async function downloadFirst(
  urls: readonly string[],
  context: SourceContext,
  headers?: Record<string, string>
): Promise<SourceOutcome> {
  if (urls.length === 0) return { kind: "failed", error: "No candidate URL" };

  const errors: string[] = [];
  for (const url of urls) {
    const result = await context.download(url, headers);
    if (result.success) return { kind: "success", url, size: result.size ?? 0 };
    errors.push(result.error ?? "Unknown error");
  }
  return { kind: "failed", error: errors.join("; ") };
}

/** Scan landing pages for PDF links and download the first that works. */
async function downloadFromLandingPages(
  pages: readonly string[],
  selectors: readonly string[],
  context: SourceContext
): Promise<SourceOutcome> {
  if (pages.length === 0) return { kind: "failed", error: "No landing page" };

  const errors: string[] = [];
  for (const pageUrl of pages) {
    let links: string[];
    try {
      const page = await fetchLandingPage(pageUrl, { timeoutMs: context.settings.timeoutMs });
      links = extractPdfLinks(page.html, page.url, selectors);
    } catch (err) {
      errors.push(`${pageUrl}: ${errorMessage(err)}`);
      continue;
    }
    if (links.length === 0) {
      errors.push(`${pageUrl}: no PDF link on page`);
      continue;
    }
    const outcome = await downloadFirst(links, context);
    if (outcome.kind === "success") return outcome;
    if (outcome.kind === "failed") errors.push(outcome.error);
  }
  return { kind: "failed", error: errors.join("; ") };
}

/** Run a lookup, turning thrown errors into a failed outcome. */
async function guarded(run: () => Promise<SourceOutcome>): Promise<SourceOutcome> {
  try {
    return await run();
  } catch (err) {
    return { kind: "failed", error: errorMessage(err) };
  }
}

export const arxivSource: PdfSource = {
  name: "arxiv",
  tier: "open_access",
  tryFetch: (record, context) =>
    guarded(async () => {
      const searchOptions: ArxivSearchOptions = { timeoutMs: context.settings.timeoutMs };
      const arxivId = record.externalIds.arxiv ?? (await searchArxivByTitle(record.title, searchOptions));
      if (!arxivId) return { kind: "failed", error: "Not found on arXiv" };
      return downloadFirst([getArxivPdfUrl(arxivId)], context);
    }),
};

export const pmcSource: PdfSource = {
  name: "pmc",
  tier: "open_access",
  tryFetch: (record, context) =>
    guarded(async () => {
      const ids: PmcIdentifiers = { title: record.title };
      if (record.doi) ids.doi = record.doi;
      if (record.externalIds.pmid) ids.pmid = record.externalIds.pmid;
      if (record.externalIds.pmcid) ids.pmcid = record.externalIds.pmcid;

      const options: PmcOptions = { timeoutMs: context.settings.timeoutMs };
      if (context.settings.ncbiApiKey) options.apiKey = context.settings.ncbiApiKey;
      if (context.settings.ncbiEmail) options.email = context.settings.ncbiEmail;

      const pmcid = await findPmcid(ids, options);
      if (!pmcid) return { kind: "failed", error: "Not found in PubMed Central" };
      return downloadFirst([getPmcPdfUrl(pmcid)], context);
    }),
};

export const unpaywallSource: PdfSource = {
  name: "unpaywall",
  tier: "open_access",
  tryFetch: async (record, context) => {
    if (!record.doi) return { kind: "skipped", reason: "No DOI" };
    if (!context.settings.unpaywallEmail) return { kind: "skipped", reason: "UNPAYWALL_EMAIL not configured" };
    const doi = record.doi;
    return guarded(async () => {
      const links = await context.unpaywall(doi);
      if (!links || links.pdfUrls.length === 0) return { kind: "failed", error: "No open access PDF in Unpaywall" };
      return downloadFirst(links.pdfUrls, context);
    });
  },
};

export const oaJournalSource: PdfSource = {
  name: "oa-journal",
  tier: "open_access",
  tryFetch: async (record, context) => {
    if (!record.doi) return { kind: "skipped", reason: "No DOI" };
    if (!context.settings.unpaywallEmail) return { kind: "skipped", reason: "UNPAYWALL_EMAIL not configured" };
    const doi = record.doi;
    return guarded(async () => {
      const links = await context.unpaywall(doi);
      if (!links || links.publisherPages.length === 0) {
        return { kind: "failed", error: "No open access journal page" };
      }
      return downloadFromLandingPages(links.publisherPages, OA_JOURNAL_PDF_SELECTORS, context);
    });
  },
};

export const publisherSource: PdfSource = {
  name: "publisher",
  tier: "university_access",
  tryFetch: async (record, context) => {
    if (!record.doi) return { kind: "skipped", reason: "No DOI" };
    const landing = `https://doi.org/${record.doi}`;
    return guarded(() => downloadFromLandingPages([landing], PUBLISHER_PDF_SELECTORS, context));
  },
};

export const repositorySource: PdfSource = {
  name: "repository",
  tier: "university_access",
  tryFetch: async (record, context) => {
    if (!record.doi) return { kind: "skipped", reason: "No DOI" };
    const { coreApiKey, unpaywallEmail } = context.settings;
    if (!coreApiKey && !unpaywallEmail) {
      return { kind: "skipped", reason: "Neither CORE_API_KEY nor UNPAYWALL_EMAIL configured" };
    }
    const doi = record.doi;
    return guarded(async () => {
      const urls: string[] = [];
      if (coreApiKey) {
        urls.push(...((await checkCore(doi, coreApiKey, { timeoutMs: context.settings.timeoutMs })) ?? []));
      }
      if (unpaywallEmail) {
        const links = await context.unpaywall(doi);
        for (const url of links?.repositoryUrls ?? []) {
          if (!urls.includes(url)) urls.push(url);
        }
      }
      if (urls.length === 0) return { kind: "failed", error: "No repository copy found" };
      return downloadFirst(urls, context);
    });
  },
};

export const doiSource: PdfSource = {
  name: "doi",
  tier: "university_access",
  tryFetch: async (record, context) => {
    if (!record.doi) return { kind: "skipped", reason: "No DOI" };
    return downloadFirst([`https://doi.org/${record.doi}`], context, { Accept: "application/pdf" });
  },
};

/** All sources, in chain order. */
export const DEFAULT_SOURCES: readonly PdfSource[] = [
  arxivSource,
  pmcSource,
  unpaywallSource,
  oaJournalSource,
  publisherSource,
  repositorySource,
  doiSource,
];
