import type { CheerioAPI } from 'cheerio';
import { DirectoryError } from './errors.js';
import type { LoadDocument } from './scrape.js';
import { toTeamId } from './utils/normalizer.js';

export const NFL_TEAM_COUNT = 32;

// A count other than 32 means the navigation markup changed, not that the
// league did.
export function extractTeamIds($: CheerioAPI): string[] {
  const subnav = $('li.cat-nfl.active').first().find('div.subnav-posts').first();
  const teams = subnav
    .find('a')
    .toArray()
    .map((link) => toTeamId($(link).text()));

  if (teams.length !== NFL_TEAM_COUNT) {
    throw new DirectoryError(teams.length, NFL_TEAM_COUNT);
  }
  return teams;
}

export async function fetchTeamDirectory(options: {
  baseUrl: string;
  loadDocument: LoadDocument;
}): Promise<string[]> {
  const $ = await options.loadDocument(options.baseUrl);
  const teams = extractTeamIds($);
  console.log(`[directory] Found ${teams.length} teams`);
  return teams;
}
