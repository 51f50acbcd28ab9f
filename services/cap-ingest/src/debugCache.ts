import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

// services/cap-ingest/.cache, ignored by git
export const DEBUG_PAGE_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', '.cache');

/** Team ids are slugs already; anything else is flattened so it cannot leave the cache dir. */
export function debugPagePath(filename: string): string {
  return join(DEBUG_PAGE_DIR, filename.replace(/[^a-z0-9._-]/gi, '_'));
}

/**
 * Keeps the HTML of a team page that failed extraction. Writing is best effort:
 * the extraction error is what the caller reports.
 */
export async function saveDebugResponse(filename: string, html: string): Promise<string | null> {
  const target = debugPagePath(filename);
  try {
    await mkdir(DEBUG_PAGE_DIR, { recursive: true });
    await writeFile(target, html, 'utf8');
  } catch (error) {
    console.warn(`[extract] Could not save failed page to ${target}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
  console.log(`[extract] Saved failed page to ${target}`);
  return target;
}
