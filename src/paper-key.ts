/**
 * Identity keys and deterministic filenames for paper records.
 */

import anyAscii from "any-ascii";
import { createHash } from "node:crypto";
import type { PaperRecord } from "./types.js";

/** Maximum length of the title part of a filename */
const MAX_SLUG_LENGTH = 80;

/**
 * Normalize a title for comparison.
 * Transliterates to ASCII, lower-cases, drops punctuation and collapses whitespace.
 * "Deep  Learning: A Review" → "deep learning a review".
 */
export function normalizeTitle(title: string): string {
  return anyAscii(title)
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Lower-case a DOI and strip any resolver prefix. */
export function normalizeDoi(doi: string): string {
  return doi
    .trim()
    .replace(/^https?:\/\/(dx\.)?doi\.org\//i, "")
    .replace(/^doi:/i, "")
    .toLowerCase();
}

/**
 * Identity of a record for deduplication: the DOI if present, else the normalized title.
 */
export function identityKey(record: Pick<PaperRecord, "doi" | "title">): string {
  if (record.doi) return `doi:${normalizeDoi(record.doi)}`;
  return `title:${normalizeTitle(record.title)}`;
}

/**
 * Create a filesystem-safe slug from a title.
 * CJK and other scripts are transliterated; empty results become "untitled".
 */
export function slugifyTitle(title: string, maxLength: number = MAX_SLUG_LENGTH): string {
  const slug = anyAscii(title)
    .replace(/[^\w\s-]/g, "")
    .replace(/[-\s]+/g, "_")
    .slice(0, maxLength)
    .replace(/^_+|_+$/g, "");
  return slug || "untitled";
}

/** First 8 hex digits of sha1(identity key); the only part of a filename that identifies the record. */
export function identityHash(record: Pick<PaperRecord, "doi" | "title">): string {
  return createHash("sha1").update(identityKey(record)).digest("hex").slice(0, 8);
}

/**
 * Deterministic, collision-free file stem for a record:
 * {year|unknown}_{title-slug}_{first 8 hex of sha1(identity key)}.
 */
export function pdfFileStem(record: Pick<PaperRecord, "doi" | "title" | "publishYear">): string {
  const hash = identityHash(record);
  const year = record.publishYear?.trim() || "unknown";
  return `${year}_${slugifyTitle(record.title)}_${hash}`;
}

/**
 * Word-overlap similarity used to match search hits by title.
 * Returns the share of the shorter title's words found in the other title.
 */
export function titleSimilarity(a: string, b: string): number {
  const wordsA = new Set(normalizeTitle(a).split(" ").filter(Boolean));
  const wordsB = new Set(normalizeTitle(b).split(" ").filter(Boolean));
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let shared = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) shared++;
  }
  return shared / Math.min(wordsA.size, wordsB.size);
}
