/**
 * LLM query enhancement.
 *
 * Rewrites a free-text query into academic search terms through an
 * OpenAI-compatible chat endpoint (a local Ollama server by default).
 * Any failure yields an EnhancementError result; callers then search
 * with the raw query.
 */

import OpenAI from "openai";
import { EnhancementError, errorMessage } from "./errors.js";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/** Minimal surface of a chat client used for enhancement. */
export interface ChatCompleter {
  complete(prompt: string): Promise<string>;
}

export interface EnhanceOptions {
  baseUrl: string;
  model: string;
  apiKey: string;
  timeoutMs?: number;
}

/** Longest enhanced query accepted */
const MAX_ENHANCED_LENGTH = 100;

export function buildEnhancementPrompt(query: string): string {
  return `Create a precise academic search query for scientific databases.

Original query: "${query}"

Generate a focused search query by:
1. Keep main scientific concepts from the original
2. Add 2-3 specific technical terms from peer-reviewed literature
3. Include research methodology keywords (modeling, analysis, epidemiology, surveillance)
4. Use academic terminology found in paper titles/abstracts
5. Avoid broad common words that match irrelevant content

Examples:
"west nile virus prediction" → "west nile virus epidemic modeling forecasting surveillance"
"cancer treatment efficacy" → "cancer therapy treatment outcomes clinical efficacy"
"climate modeling" → "climate modeling atmospheric simulation weather prediction"

Return only the enhanced search query (under 80 characters):`;
}

/**
 * Validate a model reply against the raw query.
 * Rejects reasoning output, markup, blank-line separated text, overlong
 * replies, and replies shorter than the original query.
 */
export function validateEnhancement(query: string, reply: string): Result<string, EnhancementError> {
  const enhanced = reply.trim().replace(/^["']+|["']+$/g, "").trim();

  if (enhanced.includes("<think>") || enhanced.includes("</think>")) {
    return { ok: false, error: new EnhancementError("Model returned its reasoning instead of a query") };
  }
  if (enhanced.length > MAX_ENHANCED_LENGTH || /[<>]/.test(enhanced) || enhanced.includes("\n\n")) {
    return { ok: false, error: new EnhancementError("Model reply too long or malformed") };
  }
  if (enhanced === "" || enhanced.length < query.length) {
    return { ok: false, error: new EnhancementError("Model reply shorter than the original query") };
  }
  return { ok: true, value: enhanced };
}

/** Chat client backed by the OpenAI SDK. */
export function createChatCompleter(options: EnhanceOptions): ChatCompleter {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs ?? 60_000,
    maxRetries: 0,
  });

  return {
    async complete(prompt: string): Promise<string> {
      const completion = await client.chat.completions.create({
        model: options.model,
        messages: [{ role: "user", content: prompt }],
        temperature: 0.1,
      });
      return completion.choices[0]?.message.content ?? "";
    },
  };
}

/** Enhance a query; never throws. */
export async function enhanceQuery(
  query: string,
  completer: ChatCompleter
): Promise<Result<string, EnhancementError>> {
  let reply: string;
  try {
    reply = await completer.complete(buildEnhancementPrompt(query));
  } catch (err) {
    return { ok: false, error: new EnhancementError(`Enhancement request failed: ${errorMessage(err)}`, err) };
  }
  return validateEnhancement(query, reply);
}
