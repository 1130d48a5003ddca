/**
 * Tests for the fulltext sources of the acquisition chain.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import type { UnpaywallLinks } from "../discovery/unpaywall.js";
import type { PaperRecord } from "../types.js";
import type { DownloadResult } from "./downloader.js";
import {
  DEFAULT_SOURCES,
  type SourceContext,
  type SourceSettings,
  arxivSource,
  doiSource,
  downloadFirst,
  oaJournalSource,
  pmcSource,
  publisherSource,
  repositorySource,
  unpaywallSource,
} from "./sources.js";

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

const baseRecord: PaperRecord = {
  publishYear: "2022",
  title: "Mosquito abundance forecasting",
  journal: null,
  doi: "10.1234/mosq",
  authors: [],
  abstract: null,
  url: null,
  externalIds: {},
};

interface FakeContextOptions {
  settings?: Partial<SourceSettings>;
  links?: UnpaywallLinks | null;
  results?: Record<string, DownloadResult>;
}

function fakeContext(options: FakeContextOptions = {}) {
  const download = vi.fn(
    async (url: string, _headers?: Record<string, string>): Promise<DownloadResult> =>
      options.results?.[url] ?? { success: false, error: "HTTP 404 Not Found" }
  );
  const unpaywall = vi.fn(async (_doi: string) => options.links ?? null);
  const context: SourceContext = {
    settings: { timeoutMs: 1000, ...options.settings },
    download,
    unpaywall,
  };
  return { context, download, unpaywall };
}

const links: UnpaywallLinks = {
  pdfUrls: ["https://pub.example.com/a.pdf", "https://repo.example.org/a.pdf"],
  publisherPages: ["https://pub.example.com/a"],
  repositoryUrls: ["https://repo.example.org/a.pdf"],
};

describe("downloadFirst", () => {
  it("fails without candidates", async () => {
    const { context } = fakeContext();
    expect(await downloadFirst([], context)).toEqual({ kind: "failed", error: "No candidate URL" });
  });

  it("returns the first URL that downloads", async () => {
    const { context, download } = fakeContext({
      results: { "https://b.example/b.pdf": { success: true, size: 2048 } },
    });

    const outcome = await downloadFirst(["https://a.example/a.pdf", "https://b.example/b.pdf"], context);

    expect(outcome).toEqual({ kind: "success", url: "https://b.example/b.pdf", size: 2048 });
    expect(download).toHaveBeenCalledTimes(2);
  });
});

describe("DEFAULT_SOURCES", () => {
  it("lists open access sources before university access sources", () => {
    expect(DEFAULT_SOURCES.map((s) => [s.name, s.tier])).toEqual([
      ["arxiv", "open_access"],
      ["pmc", "open_access"],
      ["unpaywall", "open_access"],
      ["oa-journal", "open_access"],
      ["publisher", "university_access"],
      ["repository", "university_access"],
      ["doi", "university_access"],
    ]);
  });
});

describe("arxivSource", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("downloads from a known arXiv ID without searching", async () => {
    const { context, download } = fakeContext({
      results: { "https://arxiv.org/pdf/2401.00001.pdf": { success: true, size: 10 } },
    });

    const outcome = await arxivSource.tryFetch({ ...baseRecord, externalIds: { arxiv: "2401.00001" } }, context);

    expect(outcome).toEqual({ kind: "success", url: "https://arxiv.org/pdf/2401.00001.pdf", size: 10 });
    expect(download).toHaveBeenCalledTimes(1);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("fails when title search finds nothing", async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, text: () => Promise.resolve("<feed></feed>") });
    const { context } = fakeContext();

    expect(await arxivSource.tryFetch(baseRecord, context)).toEqual({ kind: "failed", error: "Not found on arXiv" });
  });

  it("turns lookup errors into a failed outcome", async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 503, statusText: "Service Unavailable" });
    const { context } = fakeContext();

    expect(await arxivSource.tryFetch(baseRecord, context)).toEqual({
      kind: "failed",
      error: "arXiv API error: HTTP 503 Service Unavailable",
    });
  });
});

describe("pmcSource", () => {
  it("downloads the PMC PDF of a known PMCID", async () => {
    const url = "https://www.ncbi.nlm.nih.gov/pmc/articles/PMC5/pdf/";
    const { context, download } = fakeContext({ results: { [url]: { success: true, size: 3 } } });

    const outcome = await pmcSource.tryFetch({ ...baseRecord, externalIds: { pmcid: "PMC5" } }, context);

    expect(outcome).toEqual({ kind: "success", url, size: 3 });
    expect(download).toHaveBeenCalledWith(url, undefined);
  });
});

describe("unpaywallSource", () => {
  it("is skipped without a DOI or email", async () => {
    const { context, unpaywall } = fakeContext({ settings: { unpaywallEmail: "test@example.com" } });
    expect(await unpaywallSource.tryFetch({ ...baseRecord, doi: null }, context)).toEqual({
      kind: "skipped",
      reason: "No DOI",
    });

    const noEmail = fakeContext();
    expect((await unpaywallSource.tryFetch(baseRecord, noEmail.context)).kind).toBe("skipped");
    expect(unpaywall).not.toHaveBeenCalled();
  });

  it("collects the errors of every candidate", async () => {
    const { context } = fakeContext({
      settings: { unpaywallEmail: "test@example.com" },
      links,
      results: {
        "https://pub.example.com/a.pdf": { success: false, error: "HTTP 403 Forbidden" },
        "https://repo.example.org/a.pdf": { success: false, error: "Response is not a PDF file" },
      },
    });

    expect(await unpaywallSource.tryFetch(baseRecord, context)).toEqual({
      kind: "failed",
      error: "HTTP 403 Forbidden; Response is not a PDF file",
    });
  });

  it("fails when Unpaywall has no PDF", async () => {
    const { context } = fakeContext({ settings: { unpaywallEmail: "test@example.com" }, links: null });

    expect(await unpaywallSource.tryFetch(baseRecord, context)).toEqual({
      kind: "failed",
      error: "No open access PDF in Unpaywall",
    });
  });
});

describe("oaJournalSource", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("downloads the PDF linked from the journal page", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      url: "https://pub.example.com/a",
      headers: { get: () => "text/html" },
      text: () =>
        Promise.resolve('<html><head><meta name="citation_pdf_url" content="/a/fulltext.pdf"></head></html>'),
    });
    const pdfUrl = "https://pub.example.com/a/fulltext.pdf";
    const { context, download } = fakeContext({
      settings: { unpaywallEmail: "test@example.com" },
      links,
      results: { [pdfUrl]: { success: true, size: 99 } },
    });

    const outcome = await oaJournalSource.tryFetch(baseRecord, context);

    expect(outcome).toEqual({ kind: "success", url: pdfUrl, size: 99 });
    expect(download).toHaveBeenCalledWith(pdfUrl, undefined);
  });
});

describe("publisherSource", () => {
  it("is skipped without a DOI", async () => {
    const { context } = fakeContext();
    expect(await publisherSource.tryFetch({ ...baseRecord, doi: null }, context)).toEqual({
      kind: "skipped",
      reason: "No DOI",
    });
  });
});

describe("repositorySource", () => {
  it("is skipped without CORE key or Unpaywall email", async () => {
    const { context } = fakeContext();
    expect((await repositorySource.tryFetch(baseRecord, context)).kind).toBe("skipped");
  });

  it("downloads repository copies listed by Unpaywall", async () => {
    const { context } = fakeContext({
      settings: { unpaywallEmail: "test@example.com" },
      links,
      results: { "https://repo.example.org/a.pdf": { success: true, size: 5 } },
    });

    expect(await repositorySource.tryFetch(baseRecord, context)).toEqual({
      kind: "success",
      url: "https://repo.example.org/a.pdf",
      size: 5,
    });
  });
});

describe("doiSource", () => {
  it("requests the DOI resolver with a PDF Accept header", async () => {
    const { context, download } = fakeContext();

    const outcome = await doiSource.tryFetch(baseRecord, context);

    expect(outcome).toEqual({ kind: "failed", error: "HTTP 404 Not Found" });
    expect(download).toHaveBeenCalledWith("https://doi.org/10.1234/mosq", { Accept: "application/pdf" });
  });
});
