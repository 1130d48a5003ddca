import { randomUUID } from "node:crypto";
import { readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { IncrementalCheckpointer } from "./checkpoint.js";
import { loadSearchExport } from "./export.js";
import type { SearchResult } from "./types.js";

function partialResult(count: number): SearchResult {
  return {
    request: {
      rawQuery: "dengue",
      enhancedQuery: "dengue epidemic modeling",
      timeWindow: { kind: "year-range", startYear: 2020, endYear: 2024 },
      maxResults: 50,
    },
    papers: Array.from({ length: count }, (_, i) => ({
      publishYear: "2022",
      title: `Dengue paper ${i}`,
      journal: null,
      doi: `10.2000/${i}`,
      authors: [],
      abstract: null,
      url: null,
      externalIds: {},
    })),
    attempts: [],
    skipped: 0,
  };
}

describe("IncrementalCheckpointer", () => {
  const dir = join(tmpdir(), `checkpoint-${randomUUID()}`);
  const path = join(dir, "results.json");
  const checkpointer = new IncrementalCheckpointer(path, {
    searchDate: new Date("2025-01-02T03:04:05.000Z"),
    pdf: { enabled: true, mode: "open_access", directory: "pdfs_dengue" },
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the export of the partial result", async () => {
    await checkpointer.save(partialResult(5));

    const saved = await loadSearchExport(path);
    expect(saved.search_query).toBe("dengue");
    expect(saved.search_period).toBe("2020-2024");
    expect(saved.total_results).toBe(5);
    expect(saved.papers.map((p) => p.doi)).toEqual(["10.2000/0", "10.2000/1", "10.2000/2", "10.2000/3", "10.2000/4"]);
    expect(saved.pdf_downloads.enabled).toBe(true);
  });

  it("replaces the previous checkpoint", async () => {
    await checkpointer.save(partialResult(5));
    await checkpointer.save(partialResult(10));

    expect((await loadSearchExport(path)).total_results).toBe(10);
  });

  it("is idempotent for the same state", async () => {
    await checkpointer.save(partialResult(5));
    const first = await readFile(path, "utf-8");
    await checkpointer.save(partialResult(5));

    expect(await readFile(path, "utf-8")).toBe(first);
  });
});
