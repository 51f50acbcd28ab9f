import { classifyTeamError, type TeamFailureKind } from './errors.js';
import type { LoadDocument } from './scrape.js';
import type { SheetMirror } from './sheets.js';
import type { CapStore } from './supa.js';
import { fetchTeamDirectory } from './teamDirectory.js';
import { fetchTeamCapDataset } from './teamPage.js';
import type { RosterCategory } from './types.js';

const LOG_PREFIX = '[sync]';

export interface SyncDependencies {
  loadDocument: LoadDocument;
  store?: CapStore | null;
  mirror?: SheetMirror | null;
}

export interface SyncOptions {
  baseUrl: string;
  season: string;
  /** Skip directory discovery and sync only these team ids. */
  teams?: string[];
  dryRun?: boolean;
  debugSaveHtml?: boolean;
  categories?: readonly RosterCategory[];
}

export interface TeamFailure {
  team: string;
  kind: TeamFailureKind;
  message: string;
}

export interface TeamSuccess {
  team: string;
  records: number;
  total_cap_hit: number;
  field_issues: number;
}

export interface SyncSummary {
  teams: number;
  succeeded: TeamSuccess[];
  failed: TeamFailure[];
  records: number;
  mirrored: number | null;
  mirrorError: string | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Scrapes every team, writes each verified dataset to the store and mirrors
 * the stored table to the spreadsheet. A team that fails keeps its previous
 * rows; directory failures propagate and abort the run before any write.
 */
export async function syncCapData(deps: SyncDependencies, options: SyncOptions): Promise<SyncSummary> {
  const { loadDocument } = deps;
  const store = options.dryRun ? null : deps.store ?? null;
  const mirror = options.dryRun ? null : deps.mirror ?? null;

  const teams = options.teams?.length
    ? options.teams
    : await fetchTeamDirectory({ baseUrl: options.baseUrl, loadDocument });

  const summary: SyncSummary = {
    teams: teams.length,
    succeeded: [],
    failed: [],
    records: 0,
    mirrored: null,
    mirrorError: null,
  };

  for (const team of teams) {
    try {
      const dataset = await fetchTeamCapDataset(team, {
        baseUrl: options.baseUrl,
        season: options.season,
        loadDocument,
        categories: options.categories,
        debugSaveHtml: options.debugSaveHtml,
      });
      if (store) {
        await store.replaceTeamRecords(team, dataset.records);
      }
      summary.succeeded.push({
        team,
        records: dataset.records.length,
        total_cap_hit: dataset.total_cap_hit,
        field_issues: dataset.issues.length,
      });
      summary.records += dataset.records.length;
    } catch (error) {
      const failure: TeamFailure = { team, kind: classifyTeamError(error), message: errorMessage(error) };
      summary.failed.push(failure);
      console.error(`${LOG_PREFIX} ${team}: skipped (${failure.kind})`, failure.message);
    }
  }

  if (store && mirror) {
    try {
      const rows = await store.listAllRecords();
      summary.mirrored = await mirror.replaceRows(rows);
    } catch (error) {
      summary.mirrorError = errorMessage(error);
      console.error(`${LOG_PREFIX} Spreadsheet mirror failed`, summary.mirrorError);
    }
  }

  console.log(`${LOG_PREFIX} Summary`, {
    teams: summary.teams,
    succeeded: summary.succeeded.length,
    failed: summary.failed.map((failure) => failure.team),
    records: summary.records,
    mirrored: summary.mirrored,
  });
  return summary;
}
