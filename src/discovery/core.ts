/**
 * CORE API repository discovery client.
 * Finds institutional-repository copies of an article via the CORE API.
 *
 * API: https://api.core.ac.uk/v3/search/works?q=doi:"{doi}"
 * Auth: Bearer token (API key, free registration)
 * Rate limit: 10 req/sec
 */

const CORE_API_BASE = "https://api.core.ac.uk/v3";

/** CORE API search result shape */
interface CoreResult {
  downloadUrl?: string | null;
  sourceFulltextUrls?: string[];
}

export interface CoreOptions {
  timeoutMs?: number;
}

/**
 * Check CORE for repository copies of an article.
 *
 * @param doi - The article's DOI
 * @param apiKey - CORE API key (required; returns null if empty)
 * @returns Candidate URLs, CORE's own download link first; null if not found or no key
 * @throws On rate limit (429) or network errors
 */
export async function checkCore(
  doi: string,
  apiKey: string | undefined,
  options?: CoreOptions
): Promise<string[] | null> {
  if (!doi) return null;
  if (!apiKey) return null;

  const url = `${CORE_API_BASE}/search/works?q=doi:"${doi}"&limit=1`;

  const response = await fetch(url, {
    headers: {
      Authorization: `Bearer ${apiKey}`,
    },
    signal: AbortSignal.timeout(options?.timeoutMs ?? 10_000),
  });

  if (!response.ok) {
    if (response.status === 429) {
      throw new Error("CORE API rate limit exceeded");
    }
    throw new Error(`CORE API error: HTTP ${response.status} ${response.statusText}`);
  }

  const data = (await response.json()) as {
    totalHits?: number;
    results?: CoreResult[];
  };

  const firstResult = data.totalHits ? data.results?.[0] : undefined;
  if (!firstResult) return null;

  const urls: string[] = [];
  if (firstResult.downloadUrl) urls.push(firstResult.downloadUrl);
  for (const repoUrl of firstResult.sourceFulltextUrls ?? []) {
    if (repoUrl && !urls.includes(repoUrl)) urls.push(repoUrl);
  }

  return urls.length > 0 ? urls : null;
}
