import { describe, expect, it } from "vitest";
import { normalizeRecord } from "./normalizer.js";

describe("normalizeRecord", () => {
  it("maps a complete hit", () => {
    const result = normalizeRecord({
      paperId: "abc",
      title: "  Mosquito   surveillance\nmodels ",
      year: 2021,
      venue: "Some Venue",
      journal: { name: "Journal of Vector Ecology", volume: "12" },
      authors: [{ authorId: "1", name: "Ada Lovelace" }, { name: "  " }, { name: "Alan Turing" }],
      abstract: "An abstract.",
      url: "https://www.semanticscholar.org/paper/abc",
      externalIds: { DOI: "10.1234/ABC", ArXiv: "2101.00001", PubMed: "12345", PubMedCentral: "987" },
    });

    expect(result).toEqual({
      kind: "record",
      record: {
        publishYear: "2021",
        title: "Mosquito surveillance models",
        journal: "Journal of Vector Ecology",
        doi: "10.1234/ABC",
        authors: ["Ada Lovelace", "Alan Turing"],
        abstract: "An abstract.",
        url: "https://www.semanticscholar.org/paper/abc",
        externalIds: { arxiv: "2101.00001", pmid: "12345", pmcid: "PMC987" },
      },
    });
  });

  it("fills missing fields with null or empty values", () => {
    expect(normalizeRecord({ title: "Only a title" })).toEqual({
      kind: "record",
      record: {
        publishYear: null,
        title: "Only a title",
        journal: null,
        doi: null,
        authors: [],
        abstract: null,
        url: null,
        externalIds: {},
      },
    });
  });

  it("falls back to the venue and the publication date", () => {
    const result = normalizeRecord({
      title: "T",
      year: null,
      publicationDate: "2024-03-01",
      journal: null,
      venue: "Conference X",
    });

    expect(result.kind === "record" && result.record.publishYear).toBe("2024");
    expect(result.kind === "record" && result.record.journal).toBe("Conference X");
  });

  it("tolerates wrongly typed fields", () => {
    const result = normalizeRecord({ title: "T", authors: "nobody", externalIds: 5, abstract: 7 });

    expect(result.kind).toBe("record");
    expect(result.kind === "record" && result.record.authors).toEqual([]);
    expect(result.kind === "record" && result.record.abstract).toBeNull();
  });

  it("keeps an existing PMC prefix", () => {
    const result = normalizeRecord({ title: "T", externalIds: { PubMedCentral: "pmc55" } });
    expect(result.kind === "record" && result.record.externalIds).toEqual({ pmcid: "PMC55" });
  });

  it("skips hits without a title", () => {
    expect(normalizeRecord({ title: "   " })).toEqual({ kind: "skip", reason: "missing title" });
    expect(normalizeRecord({ year: 2020 })).toEqual({ kind: "skip", reason: "missing title" });
  });

  it("skips non-objects", () => {
    expect(normalizeRecord(null)).toEqual({ kind: "skip", reason: "not an object" });
    expect(normalizeRecord("paper")).toEqual({ kind: "skip", reason: "not an object" });
  });
});
