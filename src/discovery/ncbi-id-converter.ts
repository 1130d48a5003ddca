/**
 * NCBI ID Converter API client.
 * Resolves DOI → PMCID/PMID using the NCBI ID Converter API.
 *
 * API: https://www.ncbi.nlm.nih.gov/pmc/utils/idconv/v1.0/?ids={doi}&format=json
 */

const IDCONV_BASE_URL = "https://www.ncbi.nlm.nih.gov/pmc/utils/idconv/v1.0/";

/** Tool name reported to NCBI */
const TOOL_NAME = "scholar-harvest";

export interface IdConversionResult {
  pmcid?: string;
  pmid?: string;
  doi?: string;
}

export interface IdConverterOptions {
  email?: string;
  timeoutMs?: number;
}

interface IdConvRecord {
  pmcid?: string;
  pmid?: string;
  doi?: string;
  errmsg?: string;
}

interface IdConvResponse {
  status: string;
  records?: IdConvRecord[];
}

function buildUrl(doi: string, options?: IdConverterOptions): string {
  const params = new URLSearchParams({
    ids: doi,
    format: "json",
    tool: TOOL_NAME,
  });
  if (options?.email) params.set("email", options.email);
  return `${IDCONV_BASE_URL}?${params.toString()}`;
}

function parseRecord(record: IdConvRecord): IdConversionResult | null {
  if (record.errmsg) return null;
  const result: IdConversionResult = {};
  if (record.pmcid) result.pmcid = record.pmcid;
  if (record.pmid) result.pmid = record.pmid;
  if (record.doi) result.doi = record.doi;
  return Object.keys(result).length > 0 ? result : null;
}

/**
 * Resolve a single DOI to PMCID/PMID via the NCBI ID Converter API.
 *
 * @returns Conversion result with pmcid/pmid, or null if not found
 * @throws On HTTP errors other than 404, or network errors
 */
export async function resolveDoiToPmcid(
  doi: string,
  options?: IdConverterOptions
): Promise<IdConversionResult | null> {
  if (!doi) return null;

  const response = await fetch(buildUrl(doi, options), {
    signal: AbortSignal.timeout(options?.timeoutMs ?? 10_000),
  });

  if (!response.ok) {
    if (response.status === 404) return null;
    throw new Error(`NCBI ID Converter API error: HTTP ${response.status} ${response.statusText}`);
  }

  const data = (await response.json()) as IdConvResponse;
  const record = data.records?.[0];
  return record ? parseRecord(record) : null;
}
