/**
 * Tests for LLM query enhancement.
 */

import { describe, expect, it, vi } from "vitest";
import { type ChatCompleter, buildEnhancementPrompt, enhanceQuery, validateEnhancement } from "./enhance.js";
import { EnhancementError } from "./errors.js";

function completerReturning(reply: string): ChatCompleter {
  return { complete: vi.fn().mockResolvedValue(reply) };
}

describe("buildEnhancementPrompt", () => {
  it("embeds the original query", () => {
    expect(buildEnhancementPrompt("malaria")).toContain('Original query: "malaria"');
  });
});

describe("validateEnhancement", () => {
  it("accepts a longer single-line query and strips quotes", () => {
    expect(validateEnhancement("malaria", '  "malaria transmission modeling"  ')).toEqual({
      ok: true,
      value: "malaria transmission modeling",
    });
  });

  it("rejects reasoning output", () => {
    const result = validateEnhancement("malaria", "<think>hmm</think> malaria modeling");
    expect(result.ok).toBe(false);
  });

  it("rejects replies over 100 characters", () => {
    expect(validateEnhancement("q", "x".repeat(101)).ok).toBe(false);
    expect(validateEnhancement("q", "x".repeat(100)).ok).toBe(true);
  });

  it("rejects markup and multi-paragraph replies", () => {
    expect(validateEnhancement("q", "a <b> query").ok).toBe(false);
    expect(validateEnhancement("q", "first line\n\nsecond").ok).toBe(false);
  });

  it("rejects replies shorter than the original", () => {
    expect(validateEnhancement("west nile virus", "wnv").ok).toBe(false);
    expect(validateEnhancement("west nile virus", '""').ok).toBe(false);
  });
});

describe("enhanceQuery", () => {
  it("returns the validated reply", async () => {
    const completer = completerReturning("dengue epidemic modeling surveillance");

    const result = await enhanceQuery("dengue", completer);

    expect(result).toEqual({ ok: true, value: "dengue epidemic modeling surveillance" });
    expect(completer.complete).toHaveBeenCalledWith(buildEnhancementPrompt("dengue"));
  });

  it("turns request failures into an error result", async () => {
    const completer: ChatCompleter = { complete: vi.fn().mockRejectedValue(new Error("connect ECONNREFUSED")) };

    const result = await enhanceQuery("dengue", completer);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(EnhancementError);
      expect(result.error.message).toBe("Enhancement request failed: connect ECONNREFUSED");
    }
  });
});
