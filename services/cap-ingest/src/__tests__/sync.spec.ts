import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DirectoryError, FetchError } from '../errors.js';
import { loadHtml } from '../html.js';
import type { LoadDocument } from '../scrape.js';
import type { SheetMirror } from '../sheets.js';
import type { CapStore } from '../supa.js';
import { syncCapData } from '../sync.js';
import type { PlayerCapRecord } from '../types.js';
import { navPage, sampleTeamPage, teamNames } from './fixtures.js';

const BASE_URL = 'https://caps.test/nfl/';

class MemoryStore implements CapStore {
  readonly rows = new Map<string, PlayerCapRecord[]>();
  readonly writes: string[] = [];

  async replaceTeamRecords(team: string, records: readonly PlayerCapRecord[]): Promise<number> {
    this.writes.push(team);
    this.rows.set(team, [...records]);
    return records.length;
  }

  async listAllRecords(): Promise<PlayerCapRecord[]> {
    return [...this.rows.keys()].sort().flatMap((team) => this.rows.get(team) ?? []);
  }
}

class MemoryMirror implements SheetMirror {
  readonly uploads: PlayerCapRecord[][] = [];

  async replaceRows(records: readonly PlayerCapRecord[]): Promise<number> {
    this.uploads.push([...records]);
    return records.length;
  }
}

function pages(byUrl: Record<string, string>): LoadDocument {
  return async (url) => {
    const html = byUrl[url];
    if (html === undefined) {
      throw new FetchError(url, 404);
    }
    return loadHtml(html);
  };
}

const staleRecord: PlayerCapRecord = {
  player_name: 'Old Timer',
  position: 'K',
  cap_hit: 1,
  roster_status: 'active',
  team: 'miami-dolphins',
};

describe('syncCapData', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('stores verified teams and keeps stored rows of a team that fails verification', async () => {
    const store = new MemoryStore();
    store.rows.set('miami-dolphins', [staleRecord]);
    const mirror = new MemoryMirror();

    const summary = await syncCapData(
      {
        loadDocument: pages({
          [`${BASE_URL}buffalo-bills/cap/`]: sampleTeamPage(),
          [`${BASE_URL}miami-dolphins/cap/`]: sampleTeamPage('$7,000,000'),
        }),
        store,
        mirror,
      },
      { baseUrl: BASE_URL, season: '2023', teams: ['buffalo-bills', 'miami-dolphins'] },
    );

    expect(summary.succeeded).toEqual([
      { team: 'buffalo-bills', records: 2, total_cap_hit: 6000000, field_issues: 0 },
    ]);
    expect(summary.failed).toEqual([
      {
        team: 'miami-dolphins',
        kind: 'verification',
        message: 'Expected cap_hit sum for miami-dolphins (page total) to be 7000000, but got 6000000',
      },
    ]);
    expect(store.writes).toEqual(['buffalo-bills']);
    expect(store.rows.get('miami-dolphins')).toEqual([staleRecord]);
    expect(summary.records).toBe(2);
    expect(summary.mirrored).toBe(3);
    expect(mirror.uploads[0].map((record) => record.team)).toEqual([
      'buffalo-bills',
      'buffalo-bills',
      'miami-dolphins',
    ]);
  });

  it('skips a team whose page cannot be fetched and continues', async () => {
    const store = new MemoryStore();
    const summary = await syncCapData(
      {
        loadDocument: pages({ [`${BASE_URL}buffalo-bills/cap/`]: sampleTeamPage() }),
        store,
      },
      { baseUrl: BASE_URL, season: '2023', teams: ['new-york-jets', 'buffalo-bills'] },
    );

    expect(summary.failed).toEqual([
      {
        team: 'new-york-jets',
        kind: 'fetch',
        message: `Request to ${BASE_URL}new-york-jets/cap/ failed (status 404)`,
      },
    ]);
    expect(summary.succeeded.map((team) => team.team)).toEqual(['buffalo-bills']);
    expect(summary.mirrored).toBeNull();
  });

  it('discovers teams from the directory when none are given', async () => {
    const names = teamNames(32);
    const byUrl: Record<string, string> = { [BASE_URL]: navPage(names) };
    byUrl[`${BASE_URL}new-england-patriots/cap/`] = sampleTeamPage();

    const summary = await syncCapData(
      { loadDocument: pages(byUrl) },
      { baseUrl: BASE_URL, season: '2023' },
    );

    expect(summary.teams).toBe(32);
    expect(summary.succeeded.map((team) => team.team)).toEqual(['new-england-patriots']);
    expect(summary.failed).toHaveLength(31);
    expect(summary.failed.every((failure) => failure.kind === 'fetch')).toBe(true);
  });

  it('aborts before any write when the directory is wrong', async () => {
    const store = new MemoryStore();
    const run = syncCapData(
      { loadDocument: pages({ [BASE_URL]: navPage(teamNames(31)) }), store },
      { baseUrl: BASE_URL, season: '2023' },
    );

    await expect(run).rejects.toBeInstanceOf(DirectoryError);
    expect(store.writes).toEqual([]);
  });

  it('aborts when the directory page cannot be fetched', async () => {
    const run = syncCapData({ loadDocument: pages({}) }, { baseUrl: BASE_URL, season: '2023' });
    await expect(run).rejects.toBeInstanceOf(FetchError);
  });

  it('writes nothing on a dry run', async () => {
    const store = new MemoryStore();
    const mirror = new MemoryMirror();
    const summary = await syncCapData(
      {
        loadDocument: pages({ [`${BASE_URL}buffalo-bills/cap/`]: sampleTeamPage() }),
        store,
        mirror,
      },
      { baseUrl: BASE_URL, season: '2023', teams: ['buffalo-bills'], dryRun: true },
    );

    expect(summary.succeeded).toHaveLength(1);
    expect(store.writes).toEqual([]);
    expect(mirror.uploads).toEqual([]);
    expect(summary.mirrored).toBeNull();
  });

  it('reports a mirror failure without undoing stored teams', async () => {
    const store = new MemoryStore();
    const mirror: SheetMirror = {
      replaceRows: async () => {
        throw new Error('quota exceeded');
      },
    };
    const summary = await syncCapData(
      {
        loadDocument: pages({ [`${BASE_URL}buffalo-bills/cap/`]: sampleTeamPage() }),
        store,
        mirror,
      },
      { baseUrl: BASE_URL, season: '2023', teams: ['buffalo-bills'] },
    );

    expect(summary.mirrorError).toBe('quota exceeded');
    expect(store.rows.get('buffalo-bills')).toHaveLength(2);
  });
});
