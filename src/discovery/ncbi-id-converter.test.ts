/**
 * Tests for NCBI ID Converter API client.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { resolveDoiToPmcid } from "./ncbi-id-converter.js";

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function jsonResponse(body: unknown, status = 200, statusText = "OK") {
  return { ok: status >= 200 && status < 300, status, statusText, json: () => Promise.resolve(body) };
}

describe("resolveDoiToPmcid", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("resolves a DOI to PMCID and PMID", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ status: "ok", records: [{ doi: "10.1234/example", pmcid: "PMC1234567", pmid: "12345678" }] })
    );

    expect(await resolveDoiToPmcid("10.1234/example")).toEqual({
      doi: "10.1234/example",
      pmcid: "PMC1234567",
      pmid: "12345678",
    });
  });

  it("returns null when DOI has no PMC record", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ status: "ok", records: [{ doi: "10.1234/none", errmsg: "invalid article id" }] })
    );

    expect(await resolveDoiToPmcid("10.1234/none")).toBeNull();
  });

  it("returns null when empty DOI is provided", async () => {
    expect(await resolveDoiToPmcid("")).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("returns null on 404", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}, 404, "Not Found"));

    expect(await resolveDoiToPmcid("10.1234/example")).toBeNull();
  });

  it("throws on server error", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}, 500, "Internal Server Error"));

    await expect(resolveDoiToPmcid("10.1234/example")).rejects.toThrow(
      "NCBI ID Converter API error: HTTP 500 Internal Server Error"
    );
  });

  it("returns null when response has no records", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ status: "ok", records: [] }));

    expect(await resolveDoiToPmcid("10.1234/example")).toBeNull();
  });

  it("passes tool and email options to the API", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ status: "ok", records: [] }));

    await resolveDoiToPmcid("10.1234/example", { email: "me@example.com" });

    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      "https://www.ncbi.nlm.nih.gov/pmc/utils/idconv/v1.0/?ids=10.1234%2Fexample&format=json&tool=scholar-harvest&email=me%40example.com"
    );
  });
});
