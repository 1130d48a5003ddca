/**
 * Sidecar metadata for downloaded PDFs.
 */

import { readdir, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { PdfFileInfo } from '../types.js';

const fileInfoSchema = z.object({
  identityKey: z.string(),
  filename: z.string(),
  source: z.enum(['arxiv', 'pmc', 'unpaywall', 'oa-journal', 'publisher', 'repository', 'doi', 'local']),
  tier: z.enum(['open_access', 'university_access']),
  url: z.string(),
  size: z.number().int().nonnegative(),
  retrievedAt: z.string(),
});

/** Load and validate a sidecar file. Returns null when missing or invalid. */
export async function loadFileInfo(path: string): Promise<PdfFileInfo | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch {
    return null;
  }
  try {
    const parsed = fileInfoSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Save a sidecar file with 2-space indentation. */
export async function saveFileInfo(path: string, info: PdfFileInfo): Promise<void> {
  const json = JSON.stringify(info, null, 2);
  await writeFile(path, json + '\n', 'utf-8');
}

/** Whether a non-empty file exists at the path. */
export async function fileExists(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isFile() && info.size > 0;
  } catch {
    return false;
  }
}

/**
 * Find a PDF already saved in dir for an identity hash, whatever year or title
 * it was named with. Returns null when the directory or the file is missing.
 */
export async function findPdfByIdentity(dir: string, hash: string): Promise<string | null> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch {
    return null;
  }
  const suffix = `_${hash}.pdf`;
  for (const name of names.filter((n) => n.endsWith(suffix)).sort()) {
    const path = join(dir, name);
    if (await fileExists(path)) return path;
  }
  return null;
}

/** Sidecar path that belongs to a PDF path. */
export function sidecarPathFor(pdfPath: string): string {
  return pdfPath.replace(/\.pdf$/, '.json');
}
