/**
 * PDF downloader with retry and error handling.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export interface DownloadOptions {
  /** Number of attempts (default: 2) */
  retries?: number;
  /** Base delay between retries in ms (default: 1000) */
  retryDelay?: number;
  /** Timeout of each attempt in ms (default: 30000) */
  timeoutMs?: number;
  /** Extra request headers */
  headers?: Record<string, string>;
}

export interface DownloadResult {
  success: boolean;
  size?: number;
  error?: string;
}

/** HTTP status codes that should not be retried */
const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404, 405, 410]);

/** Content types accepted as valid PDF responses */
const VALID_CONTENT_TYPES = ["application/pdf", "application/octet-stream", "binary/octet-stream"];

/** Every PDF file starts with this signature */
const PDF_SIGNATURE = "%PDF";

/** Bodies below this size are truncated downloads or stub pages */
export const MIN_PDF_SIZE = 1024;

export const USER_AGENT = "scholar-harvest/0.1.0 (academic literature harvester)";

function isValidPdfContentType(contentType: string | null): boolean {
  if (!contentType) return false;
  const base = (contentType.split(";")[0] ?? "").trim().toLowerCase();
  return VALID_CONTENT_TYPES.includes(base);
}

/** Check the leading bytes for the PDF signature. */
export function hasPdfSignature(bytes: Uint8Array): boolean {
  if (bytes.byteLength < PDF_SIGNATURE.length) return false;
  return Buffer.from(bytes.subarray(0, PDF_SIGNATURE.length)).toString("latin1") === PDF_SIGNATURE;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type AttemptResult =
  | { kind: "success"; result: DownloadResult }
  | { kind: "fail"; result: DownloadResult }
  | { kind: "retry"; error: string };

async function attemptDownload(
  url: string,
  destPath: string,
  timeoutMs: number,
  headers: Record<string, string>
): Promise<AttemptResult> {
  const response = await fetch(url, {
    headers: { "User-Agent": USER_AGENT, Accept: "application/pdf", ...headers },
    redirect: "follow",
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    const error = `HTTP ${response.status} ${response.statusText}`;
    if (NON_RETRYABLE_STATUSES.has(response.status)) {
      return { kind: "fail", result: { success: false, error } };
    }
    return { kind: "retry", error };
  }

  const contentType = response.headers.get("content-type");
  if (!isValidPdfContentType(contentType)) {
    return {
      kind: "fail",
      result: {
        success: false,
        error: `Unexpected Content-Type: ${contentType ?? "none"}`,
      },
    };
  }

  const bytes = new Uint8Array(await response.arrayBuffer());
  if (!hasPdfSignature(bytes)) {
    return { kind: "fail", result: { success: false, error: "Response is not a PDF file" } };
  }
  if (bytes.byteLength < MIN_PDF_SIZE) {
    return { kind: "fail", result: { success: false, error: `PDF too small (${bytes.byteLength} bytes)` } };
  }

  await mkdir(dirname(destPath), { recursive: true });
  await writeFile(destPath, bytes);

  return { kind: "success", result: { success: true, size: bytes.byteLength } };
}

/**
 * Download a PDF from a URL to a local file path.
 * Retries on network errors, timeouts and 429/5xx responses with linear backoff.
 * Does not retry on 403/404 or other client errors.
 */
export async function downloadPdf(
  url: string,
  destPath: string,
  options?: DownloadOptions
): Promise<DownloadResult> {
  const retries = options?.retries ?? 2;
  const retryDelay = options?.retryDelay ?? 1000;
  const timeoutMs = options?.timeoutMs ?? 30_000;
  const headers = options?.headers ?? {};

  let lastError: string | undefined;

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      const outcome = await attemptDownload(url, destPath, timeoutMs, headers);
      if (outcome.kind === "success" || outcome.kind === "fail") {
        return outcome.result;
      }
      lastError = outcome.error;
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);
    }

    if (attempt < retries) {
      await sleep(retryDelay * attempt);
    }
  }

  return { success: false, error: lastError ?? "Download failed" };
}
