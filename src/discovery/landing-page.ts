/**
 * Landing page scraping.
 * Fetches an article's HTML landing page and extracts candidate PDF links.
 */

import { parse as parseHtml } from "node-html-parser";
import { USER_AGENT } from "../download/downloader.js";

/** Selectors tried on open-access journal pages */
export const OA_JOURNAL_PDF_SELECTORS = ['a[href$=".pdf"]', 'a[href*=".pdf"]'];

/** Selectors for common publisher PDF download links */
export const PUBLISHER_PDF_SELECTORS = [
  'a[href*=".pdf"]',
  'a[href*="pdf"]',
  "a.pdf-download",
  "a.download-pdf",
  ".pdf-link a",
  '[data-testid="pdf-link"]',
];

export interface LandingPage {
  /** Final URL after redirects; relative links resolve against it */
  url: string;
  html: string;
}

export interface LandingPageOptions {
  timeoutMs?: number;
}

function resolveLink(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#") || /^(javascript|mailto):/i.test(trimmed)) return null;
  try {
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Extract candidate PDF links from a landing page.
 * The `citation_pdf_url` meta tag comes first, then links matched by the selectors in order.
 */
export function extractPdfLinks(html: string, baseUrl: string, selectors: readonly string[]): string[] {
  const root = parseHtml(html);
  const links: string[] = [];
  const add = (href: string | undefined): void => {
    if (!href) return;
    const url = resolveLink(href, baseUrl);
    if (url && !links.includes(url)) links.push(url);
  };

  for (const meta of root.querySelectorAll('meta[name="citation_pdf_url"]')) {
    add(meta.getAttribute("content"));
  }
  for (const selector of selectors) {
    for (const el of root.querySelectorAll(selector)) {
      add(el.getAttribute("href"));
    }
  }
  return links;
}

/**
 * Fetch a landing page.
 *
 * @throws On HTTP errors, non-HTML responses, or network errors
 */
export async function fetchLandingPage(url: string, options?: LandingPageOptions): Promise<LandingPage> {
  const response = await fetch(url, {
    headers: { "User-Agent": USER_AGENT, Accept: "text/html,application/xhtml+xml" },
    redirect: "follow",
    signal: AbortSignal.timeout(options?.timeoutMs ?? 30_000),
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText}`);
  }
  const contentType = response.headers.get("content-type") ?? "";
  if (!/html/i.test(contentType)) {
    throw new Error(`Unexpected Content-Type: ${contentType || "none"} (expected HTML)`);
  }

  return { url: response.url || url, html: await response.text() };
}
