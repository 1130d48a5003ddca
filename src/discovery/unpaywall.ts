/**
 * Unpaywall OA discovery client.
 * Looks up Open Access copies of an article by DOI.
 *
 * API: https://api.unpaywall.org/v2/{doi}?email={email}
 * Rate limit: 100,000 requests/day (no per-second limit documented)
 */

const UNPAYWALL_BASE_URL = "https://api.unpaywall.org/v2";

/** Unpaywall API response location shape */
interface UnpaywallLocation {
  url_for_pdf?: string | null;
  url_for_landing_page?: string | null;
  host_type?: string | null;
}

interface UnpaywallApiResponse {
  is_oa?: boolean;
  best_oa_location?: UnpaywallLocation | null;
  oa_locations?: UnpaywallLocation[];
}

/** OA links for one DOI, grouped by how the fulltext sources use them. */
export interface UnpaywallLinks {
  /** Direct PDF links, best location first */
  pdfUrls: string[];
  /** Landing pages hosted by the publisher (OA journals) */
  publisherPages: string[];
  /** Links hosted by repositories (PDF where known, else landing page) */
  repositoryUrls: string[];
}

export interface UnpaywallOptions {
  timeoutMs?: number;
}

function pushUnique(list: string[], url: string | null | undefined): void {
  if (url && !list.includes(url)) list.push(url);
}

/** Group Unpaywall locations into the link lists used by fulltext sources. */
export function collectLinks(data: UnpaywallApiResponse): UnpaywallLinks {
  const links: UnpaywallLinks = { pdfUrls: [], publisherPages: [], repositoryUrls: [] };
  const locations = [
    ...(data.best_oa_location ? [data.best_oa_location] : []),
    ...(data.oa_locations ?? []),
  ];

  for (const loc of locations) {
    pushUnique(links.pdfUrls, loc.url_for_pdf);
    if (loc.host_type === "publisher") {
      pushUnique(links.publisherPages, loc.url_for_landing_page);
    } else if (loc.host_type === "repository") {
      pushUnique(links.repositoryUrls, loc.url_for_pdf ?? loc.url_for_landing_page);
    }
  }
  return links;
}

/**
 * Check Unpaywall for Open Access copies of an article.
 *
 * @param doi - The article's DOI
 * @param email - Email address required by Unpaywall API (free, no registration)
 * @returns Grouped OA links, or null if closed/not found
 * @throws On rate limit (429), other HTTP errors or network errors
 */
export async function checkUnpaywall(
  doi: string,
  email: string,
  options?: UnpaywallOptions
): Promise<UnpaywallLinks | null> {
  if (!doi) return null;
  if (!email) {
    throw new Error("Unpaywall email is required for API access");
  }

  const url = `${UNPAYWALL_BASE_URL}/${doi}?email=${encodeURIComponent(email)}`;
  const response = await fetch(url, { signal: AbortSignal.timeout(options?.timeoutMs ?? 10_000) });

  if (!response.ok) {
    if (response.status === 404) return null;
    if (response.status === 429) {
      throw new Error("Unpaywall rate limit exceeded");
    }
    throw new Error(`Unpaywall API error: HTTP ${response.status} ${response.statusText}`);
  }

  const data = (await response.json()) as UnpaywallApiResponse;
  if (!data.is_oa) return null;

  const links = collectLinks(data);
  const empty =
    links.pdfUrls.length === 0 && links.publisherPages.length === 0 && links.repositoryUrls.length === 0;
  return empty ? null : links;
}
