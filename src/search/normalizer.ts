/**
 * Maps raw Semantic Scholar hits to PaperRecord.
 * A hit without a title is skipped; every other missing field becomes null or empty.
 */

import { z } from "zod";
import type { ExternalIds, PaperRecord } from "../types.js";

export type NormalizeResult =
  | { kind: "record"; record: PaperRecord }
  | { kind: "skip"; reason: string };

const nullableString = z.string().nullish().catch(null);

const rawPaperSchema = z.object({
  title: nullableString,
  year: z.union([z.number(), z.string()]).nullish().catch(null),
  publicationDate: nullableString,
  venue: nullableString,
  journal: z.object({ name: nullableString }).passthrough().nullish().catch(null),
  authors: z
    .array(z.object({ name: nullableString }).passthrough().nullable().catch(null))
    .nullish()
    .catch(null),
  abstract: nullableString,
  url: nullableString,
  externalIds: z
    .record(z.union([z.string(), z.number()]).nullable())
    .nullish()
    .catch(null),
});

type RawPaper = z.infer<typeof rawPaperSchema>;

/** Collapse runs of whitespace; blank strings become null. */
function clean(value: string | null | undefined): string | null {
  if (value == null) return null;
  const collapsed = value.replace(/\s+/g, " ").trim();
  return collapsed === "" ? null : collapsed;
}

function extractYear(raw: RawPaper): string | null {
  if (typeof raw.year === "number" && Number.isFinite(raw.year)) return String(raw.year);
  if (typeof raw.year === "string") {
    const year = clean(raw.year);
    if (year) return year;
  }
  const dateMatch = raw.publicationDate ? /^(\d{4})/.exec(raw.publicationDate) : null;
  return dateMatch?.[1] ?? null;
}

function idString(ids: Record<string, string | number | null>, key: string): string | null {
  const value = ids[key];
  if (value == null) return null;
  return clean(String(value));
}

function extractExternalIds(raw: RawPaper): ExternalIds {
  const result: ExternalIds = {};
  if (!raw.externalIds) return result;

  const arxiv = idString(raw.externalIds, "ArXiv");
  if (arxiv) result.arxiv = arxiv;
  const pmid = idString(raw.externalIds, "PubMed");
  if (pmid) result.pmid = pmid;
  const pmcid = idString(raw.externalIds, "PubMedCentral");
  if (pmcid) result.pmcid = /^PMC/i.test(pmcid) ? pmcid.toUpperCase() : `PMC${pmcid}`;
  return result;
}

/** Normalize one raw search hit. */
export function normalizeRecord(payload: unknown): NormalizeResult {
  const parsed = rawPaperSchema.safeParse(payload);
  if (!parsed.success) {
    return { kind: "skip", reason: "not an object" };
  }
  const raw = parsed.data;

  const title = clean(raw.title);
  if (!title) {
    return { kind: "skip", reason: "missing title" };
  }

  const authors = (raw.authors ?? [])
    .map((author) => clean(author?.name))
    .filter((name): name is string => name !== null);

  const record: PaperRecord = {
    publishYear: extractYear(raw),
    title,
    journal: clean(raw.journal?.name) ?? clean(raw.venue),
    doi: raw.externalIds ? idString(raw.externalIds, "DOI") : null,
    authors,
    abstract: clean(raw.abstract),
    url: clean(raw.url),
    externalIds: extractExternalIds(raw),
  };

  return { kind: "record", record };
}
