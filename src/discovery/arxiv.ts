/**
 * arXiv fulltext discovery.
 * Resolves an arXiv ID from the record or by title search, and builds the PDF URL.
 *
 * PDF: https://arxiv.org/pdf/{id}.pdf
 * Search: https://export.arxiv.org/api/query?search_query=ti:"{title}" (Atom feed)
 */

import { XMLParser } from "fast-xml-parser";
import { titleSimilarity } from "../paper-key.js";

const ARXIV_API_URL = "https://export.arxiv.org/api/query";

/** Minimum word overlap for a title search hit to count as the same paper */
export const TITLE_MATCH_THRESHOLD = 0.6;

const ABS_ID_PATTERN = /arxiv\.org\/abs\/(.+?)\/?$/i;

const parser = new XMLParser({
  ignoreAttributes: true,
  isArray: (name) => name === "entry",
});

export interface ArxivSearchOptions {
  timeoutMs?: number;
  maxResults?: number;
}

interface AtomFeed {
  feed?: {
    entry?: Array<{ id?: unknown; title?: unknown }>;
  };
}

/** Strip common prefixes from arXiv IDs */
export function normalizeArxivId(id: string): string {
  return id.trim().replace(/^arXiv:/i, "");
}

/** PDF URL for an arXiv ID, e.g. "2401.12345" or "hep-ph/9901234v1". */
export function getArxivPdfUrl(arxivId: string): string {
  return `https://arxiv.org/pdf/${normalizeArxivId(arxivId)}.pdf`;
}

/** Extract the arXiv ID from an Atom entry id such as "http://arxiv.org/abs/2401.12345v1". */
export function extractArxivId(entryId: string): string | null {
  const match = ABS_ID_PATTERN.exec(entryId.trim());
  return match?.[1] ?? null;
}

/**
 * Parse an arXiv Atom feed into entries of id and whitespace-collapsed title.
 */
export function parseArxivFeed(xml: string): Array<{ arxivId: string; title: string }> {
  const parsed = parser.parse(xml) as AtomFeed;
  const entries = parsed.feed?.entry ?? [];

  const results: Array<{ arxivId: string; title: string }> = [];
  for (const entry of entries) {
    if (typeof entry.id !== "string" || entry.title === undefined) continue;
    const arxivId = extractArxivId(entry.id);
    if (!arxivId) continue;
    results.push({ arxivId, title: String(entry.title).replace(/\s+/g, " ").trim() });
  }
  return results;
}

/**
 * Search arXiv by title and return the ID of the first sufficiently similar hit.
 *
 * @returns arXiv ID, or null when no hit matches
 * @throws On HTTP or network errors
 */
export async function searchArxivByTitle(
  title: string,
  options?: ArxivSearchOptions
): Promise<string | null> {
  if (!title.trim()) return null;

  const phrase = title.replace(/["]/g, " ").replace(/\s+/g, " ").trim();
  const params = new URLSearchParams({
    search_query: `ti:"${phrase}"`,
    start: "0",
    max_results: String(options?.maxResults ?? 5),
  });

  const response = await fetch(`${ARXIV_API_URL}?${params.toString()}`, {
    signal: AbortSignal.timeout(options?.timeoutMs ?? 10_000),
  });
  if (!response.ok) {
    throw new Error(`arXiv API error: HTTP ${response.status} ${response.statusText}`);
  }

  const entries = parseArxivFeed(await response.text());
  const match = entries.find((entry) => titleSimilarity(title, entry.title) > TITLE_MATCH_THRESHOLD);
  return match?.arxivId ?? null;
}
