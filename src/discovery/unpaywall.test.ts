/**
 * Tests for Unpaywall OA discovery client.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { checkUnpaywall, collectLinks } from "./unpaywall.js";

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

const publisherLocation = {
  url_for_pdf: "https://pub.example.com/a.pdf",
  url_for_landing_page: "https://pub.example.com/a",
  host_type: "publisher",
};

const OA_RESPONSE = {
  doi: "10.1234/example",
  is_oa: true,
  best_oa_location: publisherLocation,
  oa_locations: [
    publisherLocation,
    {
      url_for_pdf: null,
      url_for_landing_page: "https://repo.example.org/handle/1",
      host_type: "repository",
    },
    {
      url_for_pdf: "https://repo2.example.org/a.pdf",
      url_for_landing_page: "https://repo2.example.org/a",
      host_type: "repository",
    },
  ],
};

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Error",
    json: () => Promise.resolve(body),
  };
}

describe("collectLinks", () => {
  it("groups locations by how they are used", () => {
    expect(collectLinks(OA_RESPONSE)).toEqual({
      pdfUrls: ["https://pub.example.com/a.pdf", "https://repo2.example.org/a.pdf"],
      publisherPages: ["https://pub.example.com/a"],
      repositoryUrls: ["https://repo.example.org/handle/1", "https://repo2.example.org/a.pdf"],
    });
  });
});

describe("checkUnpaywall", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("returns links for an OA article", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(OA_RESPONSE));

    const links = await checkUnpaywall("10.1234/example", "test@example.com");

    expect(links?.pdfUrls).toEqual(["https://pub.example.com/a.pdf", "https://repo2.example.org/a.pdf"]);
    // Verify URL construction (email is URL-encoded)
    expect(mockFetch.mock.calls[0]?.[0]).toBe("https://api.unpaywall.org/v2/10.1234/example?email=test%40example.com");
  });

  it("returns null for closed access article", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ is_oa: false, best_oa_location: null, oa_locations: [] }));

    expect(await checkUnpaywall("10.1234/closed", "test@example.com")).toBeNull();
  });

  it("returns null when an OA article has no usable location", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ is_oa: true, best_oa_location: null, oa_locations: [] }));

    expect(await checkUnpaywall("10.1234/empty", "test@example.com")).toBeNull();
  });

  it("returns null on 404 (DOI not found)", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}, 404));

    expect(await checkUnpaywall("10.1234/missing", "test@example.com")).toBeNull();
  });

  it("throws on rate limit (429)", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}, 429));

    await expect(checkUnpaywall("10.1234/example", "test@example.com")).rejects.toThrow(
      "Unpaywall rate limit exceeded"
    );
  });

  it("throws on network error", async () => {
    mockFetch.mockRejectedValueOnce(new Error("Network error"));

    await expect(checkUnpaywall("10.1234/example", "test@example.com")).rejects.toThrow("Network error");
  });

  it("returns null when DOI is not provided", async () => {
    expect(await checkUnpaywall("", "test@example.com")).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("throws when email is not provided", async () => {
    await expect(checkUnpaywall("10.1234/example", "")).rejects.toThrow("email is required");
  });
});
