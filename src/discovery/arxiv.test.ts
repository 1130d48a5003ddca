/**
 * Tests for arXiv fulltext discovery.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { extractArxivId, getArxivPdfUrl, parseArxivFeed, searchArxivByTitle } from "./arxiv.js";

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="html">ArXiv Query</title>
  <entry>
    <id>http://arxiv.org/abs/2401.12345v2</id>
    <title>Forecasting  Mosquito
      Abundance with Neural Networks</title>
  </entry>
  <entry>
    <id>http://arxiv.org/abs/hep-ph/9901234v1</id>
    <title>Unrelated Particle Physics</title>
  </entry>
</feed>`;

function textResponse(body: string, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Service Unavailable",
    text: () => Promise.resolve(body),
  };
}

describe("getArxivPdfUrl", () => {
  it("builds the PDF URL for new-style IDs", () => {
    expect(getArxivPdfUrl("2401.12345")).toBe("https://arxiv.org/pdf/2401.12345.pdf");
  });

  it("builds the PDF URL for old-style IDs with version", () => {
    expect(getArxivPdfUrl("hep-ph/9901234v1")).toBe("https://arxiv.org/pdf/hep-ph/9901234v1.pdf");
  });

  it("strips arXiv: prefix if present", () => {
    expect(getArxivPdfUrl("arXiv:2401.12345")).toBe("https://arxiv.org/pdf/2401.12345.pdf");
  });
});

describe("extractArxivId", () => {
  it("extracts the ID from an abs URL", () => {
    expect(extractArxivId("http://arxiv.org/abs/2401.12345v2")).toBe("2401.12345v2");
  });

  it("returns null for other URLs", () => {
    expect(extractArxivId("https://example.com/paper")).toBeNull();
  });
});

describe("parseArxivFeed", () => {
  it("returns entries with collapsed titles", () => {
    expect(parseArxivFeed(FEED)).toEqual([
      { arxivId: "2401.12345v2", title: "Forecasting Mosquito Abundance with Neural Networks" },
      { arxivId: "hep-ph/9901234v1", title: "Unrelated Particle Physics" },
    ]);
  });

  it("returns no entries for an empty feed", () => {
    expect(parseArxivFeed('<feed xmlns="http://www.w3.org/2005/Atom"></feed>')).toEqual([]);
  });
});

describe("searchArxivByTitle", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("returns the ID of a matching entry", async () => {
    mockFetch.mockResolvedValueOnce(textResponse(FEED));

    const id = await searchArxivByTitle("Forecasting mosquito abundance with neural networks");

    expect(id).toBe("2401.12345v2");
    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      "https://export.arxiv.org/api/query?search_query=ti%3A%22Forecasting+mosquito+abundance+with+neural+networks%22&start=0&max_results=5"
    );
  });

  it("returns null when no entry is similar enough", async () => {
    mockFetch.mockResolvedValueOnce(textResponse(FEED));

    expect(await searchArxivByTitle("Soil microbiome diversity")).toBeNull();
  });

  it("returns null for an empty title without a request", async () => {
    expect(await searchArxivByTitle("  ")).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("throws on HTTP errors", async () => {
    mockFetch.mockResolvedValueOnce(textResponse("", 503));

    await expect(searchArxivByTitle("Anything")).rejects.toThrow("arXiv API error: HTTP 503 Service Unavailable");
  });
});
