/**
 * PMC fulltext discovery.
 * Resolves a PMCID for a record and builds the PubMed Central PDF URL.
 *
 * PDF: https://www.ncbi.nlm.nih.gov/pmc/articles/PMC{id}/pdf/
 * PMID→PMCID: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/elink.fcgi?dbfrom=pubmed&db=pmc&id={pmid}&retmode=json
 * Title search: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi?db=pmc&term={title}[Title]&retmode=json
 */

import { resolveDoiToPmcid } from './ncbi-id-converter.js';

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

export interface PmcIdentifiers {
  doi?: string;
  pmid?: string;
  pmcid?: string;
  title?: string;
}

export interface PmcOptions {
  apiKey?: string;
  email?: string;
  timeoutMs?: number;
}

/** Ensure PMCID has the "PMC" prefix */
export function ensurePmcPrefix(pmcid: string): string {
  return /^PMC/i.test(pmcid) ? pmcid.toUpperCase() : `PMC${pmcid}`;
}

/** PDF URL for a PMCID. */
export function getPmcPdfUrl(pmcid: string): string {
  return `https://www.ncbi.nlm.nih.gov/pmc/articles/${ensurePmcPrefix(pmcid)}/pdf/`;
}

function eutilsUrl(endpoint: string, params: Record<string, string>, options?: PmcOptions): string {
  const search = new URLSearchParams({ ...params, retmode: 'json' });
  if (options?.apiKey) search.set('api_key', options.apiKey);
  return `${EUTILS_BASE}/${endpoint}?${search.toString()}`;
}

async function getJson(url: string, label: string, options?: PmcOptions): Promise<unknown> {
  const response = await fetch(url, { signal: AbortSignal.timeout(options?.timeoutMs ?? 10_000) });
  if (!response.ok) {
    throw new Error(`PMC ${label} API error: HTTP ${response.status}`);
  }
  return response.json();
}

/**
 * Look up PMCID from PMID via E-utilities elink API.
 * @returns PMCID string or null if not in PMC
 */
export async function lookupPmcid(pmid: string, options?: PmcOptions): Promise<string | null> {
  const url = eutilsUrl('elink.fcgi', { dbfrom: 'pubmed', db: 'pmc', id: pmid }, options);
  const data = (await getJson(url, 'elink', options)) as {
    linksets?: Array<{
      linksetdbs?: Array<{
        dbto: string;
        links?: string[];
      }>;
    }>;
  };

  const pmcLink = data.linksets?.[0]?.linksetdbs?.find((db) => db.dbto === 'pmc');
  const pmcNumericId = pmcLink?.links?.[0];
  return pmcNumericId ? `PMC${pmcNumericId}` : null;
}

/**
 * Search PMC by exact title. Only an unambiguous single hit is accepted.
 * @returns PMCID string or null
 */
export async function searchPmcByTitle(title: string, options?: PmcOptions): Promise<string | null> {
  const phrase = title.replace(/[[\]"]/g, ' ').replace(/\s+/g, ' ').trim();
  if (!phrase) return null;

  const url = eutilsUrl('esearch.fcgi', { db: 'pmc', term: `${phrase}[Title]`, retmax: '2' }, options);
  const data = (await getJson(url, 'esearch', options)) as {
    esearchresult?: { idlist?: string[] };
  };

  const ids = data.esearchresult?.idlist ?? [];
  const only = ids.length === 1 ? ids[0] : undefined;
  return only ? `PMC${only}` : null;
}

/**
 * Find the PMCID of a record.
 * Tries, in order: a known PMCID, DOI via the NCBI ID Converter, PMID via elink, then title search.
 */
export async function findPmcid(ids: PmcIdentifiers, options?: PmcOptions): Promise<string | null> {
  if (ids.pmcid) return ensurePmcPrefix(ids.pmcid);

  if (ids.doi) {
    const converterOptions: { email?: string; timeoutMs?: number } = {};
    if (options?.email) converterOptions.email = options.email;
    if (options?.timeoutMs !== undefined) converterOptions.timeoutMs = options.timeoutMs;
    const converted = await resolveDoiToPmcid(ids.doi, converterOptions);
    if (converted?.pmcid) return ensurePmcPrefix(converted.pmcid);
    if (!ids.pmid && converted?.pmid) {
      const pmcid = await lookupPmcid(converted.pmid, options);
      if (pmcid) return pmcid;
    }
  }

  if (ids.pmid) {
    const pmcid = await lookupPmcid(ids.pmid, options);
    if (pmcid) return pmcid;
  }

  if (ids.title) return searchPmcByTitle(ids.title, options);
  return null;
}
