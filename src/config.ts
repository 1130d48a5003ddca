/**
 * Environment configuration.
 *
 * Credentials and endpoints come from environment variables; the
 * per-run options (query, time window, PDF mode) come from the caller.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === "" ? undefined : v))
  .optional();

const envSchema = z.object({
  SEMANTIC_SCHOLAR_API_KEY: optionalString,
  UNPAYWALL_EMAIL: optionalString.pipe(z.string().email().optional()),
  CORE_API_KEY: optionalString,
  NCBI_API_KEY: optionalString,
  NCBI_EMAIL: optionalString,
  LLM_BASE_URL: z.string().url().default("http://localhost:11434/v1"),
  LLM_MODEL: z.string().min(1).default("qwen3:latest"),
  LLM_API_KEY: z.string().min(1).default("ollama"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export interface HarvestConfig {
  semanticScholarApiKey?: string;
  unpaywallEmail?: string;
  coreApiKey?: string;
  ncbiApiKey?: string;
  ncbiEmail?: string;
  llm: {
    baseUrl: string;
    model: string;
    apiKey: string;
  };
  requestTimeoutMs: number;
  logLevel: string;
}

/** Load and validate configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarvestConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }

  const data = parsed.data;
  const config: HarvestConfig = {
    llm: {
      baseUrl: data.LLM_BASE_URL,
      model: data.LLM_MODEL,
      apiKey: data.LLM_API_KEY,
    },
    requestTimeoutMs: data.REQUEST_TIMEOUT_MS,
    logLevel: data.LOG_LEVEL,
  };

  if (data.SEMANTIC_SCHOLAR_API_KEY !== undefined) config.semanticScholarApiKey = data.SEMANTIC_SCHOLAR_API_KEY;
  if (data.UNPAYWALL_EMAIL !== undefined) config.unpaywallEmail = data.UNPAYWALL_EMAIL;
  if (data.CORE_API_KEY !== undefined) config.coreApiKey = data.CORE_API_KEY;
  if (data.NCBI_API_KEY !== undefined) config.ncbiApiKey = data.NCBI_API_KEY;
  if (data.NCBI_EMAIL !== undefined) config.ncbiEmail = data.NCBI_EMAIL;

  return config;
}
