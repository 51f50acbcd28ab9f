import type { CheerioAPI } from 'cheerio';
import { ROSTER_CATEGORIES } from './categories.js';
import { saveDebugResponse } from './debugCache.js';
import { extractCategoryTable } from './extractTable.js';
import type { LoadDocument } from './scrape.js';
import type { FieldExtractionIssue, PlayerCapRecord, RosterCategory, TeamCapDataset } from './types.js';
import { extractTeamTotal, verifyTotal } from './verifyTotals.js';

export interface TeamPageOptions {
  baseUrl: string;
  season: string;
  loadDocument: LoadDocument;
  categories?: readonly RosterCategory[];
  debugSaveHtml?: boolean;
}

export function teamCapUrl(baseUrl: string, team: string): string {
  return `${baseUrl}${encodeURIComponent(team)}/cap/`;
}

/**
 * Builds the verified dataset for one team from its parsed cap page. Pure over
 * the document: the same page always yields the same record sequence.
 */
export function extractTeamCapDataset(
  $: CheerioAPI,
  team: string,
  season: string,
  categories: readonly RosterCategory[] = ROSTER_CATEGORIES,
): TeamCapDataset {
  const records: PlayerCapRecord[] = [];
  const issues: FieldExtractionIssue[] = [];

  for (const category of categories) {
    const batch = extractCategoryTable($, category, team, season);
    if (!batch.records.length) {
      continue;
    }
    records.push(...batch.records);
    issues.push(...batch.issues);
  }

  const context = `${team} (page total)`;
  const totalCapHit = verifyTotal(records, extractTeamTotal($, season, context), context);

  return {
    team,
    records,
    total_cap_hit: totalCapHit,
    issues,
  };
}

export async function fetchTeamCapDataset(
  team: string,
  options: TeamPageOptions,
): Promise<TeamCapDataset> {
  const $ = await options.loadDocument(teamCapUrl(options.baseUrl, team));
  let dataset: TeamCapDataset;
  try {
    dataset = extractTeamCapDataset($, team, options.season, options.categories);
  } catch (error) {
    if (options.debugSaveHtml) {
      await saveDebugResponse(`${team}.html`, $.html());
    }
    throw error;
  }
  console.log(`[extract] ${team}: Total cap checks out`, {
    records: dataset.records.length,
    total_cap_hit: dataset.total_cap_hit,
    field_issues: dataset.issues.length,
  });
  return dataset;
}
