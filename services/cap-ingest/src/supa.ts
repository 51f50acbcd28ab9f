import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ROSTER_CATEGORIES } from './categories.js';
import type { StoreConfig } from './env.js';
import { StoreError } from './errors.js';
import type { PlayerCapRecord, RosterStatus } from './types.js';

const INSERT_BATCH_SIZE = 500;
const PAGE_SIZE = 1000;
const COLUMNS = 'player_name, position, cap_hit, roster_status, team';

export interface CapStore {
  replaceTeamRecords(team: string, records: readonly PlayerCapRecord[]): Promise<number>;
  listAllRecords(): Promise<PlayerCapRecord[]>;
}

export interface SupabaseCapStore extends CapStore {
  client: SupabaseClient;
}

function* batches<T>(items: readonly T[], size: number): Generator<T[]> {
  for (let start = 0; start < items.length; start += size) {
    yield items.slice(start, start + size);
  }
}

const ROSTER_STATUSES = new Set<string>(ROSTER_CATEGORIES.map((category) => category.status));

function isRosterStatus(value: unknown): value is RosterStatus {
  return typeof value === 'string' && ROSTER_STATUSES.has(value);
}

function nullableString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function nullableNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  // bigint columns can come back as strings
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number(value);
  return null;
}

function rowId(row: unknown): number | null {
  if (typeof row === 'object' && row !== null && 'id' in row) {
    return nullableNumber(row.id);
  }
  return null;
}

export function toCapRecord(row: unknown): PlayerCapRecord | null {
  if (!row || typeof row !== 'object') {
    return null;
  }
  const { player_name, position, cap_hit, roster_status, team } = row as Record<string, unknown>;
  if (!isRosterStatus(roster_status) || typeof team !== 'string') {
    return null;
  }
  return {
    player_name: nullableString(player_name),
    position: nullableString(position),
    cap_hit: nullableNumber(cap_hit),
    roster_status,
    team,
  };
}

export function createCapStore(config: StoreConfig): SupabaseCapStore {
  const client = createClient(config.url, config.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });

  async function latestTeamRowId(team: string): Promise<number | null> {
    const { data, error } = await client
      .from(config.table)
      .select('id')
      .eq('team', team)
      .order('id', { ascending: false })
      .limit(1);
    if (error) {
      throw new StoreError(`select ${config.table} team=${team}`, error.message);
    }
    const rows: unknown[] = data ?? [];
    return rowId(rows[0]);
  }

  /**
   * New rows go in before the team's previous rows are removed, so a failed
   * insert leaves the previous rows in place (next to whatever batches did land;
   * the next successful run removes those too).
   */
  async function replaceTeamRecords(team: string, records: readonly PlayerCapRecord[]): Promise<number> {
    const previousId = await latestTeamRowId(team);

    let inserted = 0;
    for (const batch of batches(records, INSERT_BATCH_SIZE)) {
      const { error, count } = await client
        .from(config.table)
        .insert(batch, { count: 'exact' });
      if (error) {
        throw new StoreError(`insert ${config.table} team=${team}`, error.message);
      }
      inserted += count ?? batch.length;
    }

    if (previousId !== null) {
      const { error } = await client.from(config.table).delete().eq('team', team).lte('id', previousId);
      if (error) {
        throw new StoreError(`delete ${config.table} team=${team}`, error.message);
      }
    }

    console.log(`[store] Replaced ${team} with ${inserted} rows in ${config.table}`);
    return inserted;
  }

  async function listAllRecords(): Promise<PlayerCapRecord[]> {
    const records: PlayerCapRecord[] = [];
    let skipped = 0;

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await client
        .from(config.table)
        .select(COLUMNS)
        .order('team', { ascending: true })
        .order('id', { ascending: true })
        .range(from, from + PAGE_SIZE - 1);
      if (error) {
        throw new StoreError(`select ${config.table}`, error.message);
      }

      const rows: unknown[] = data ?? [];
      for (const row of rows) {
        const record = toCapRecord(row);
        if (record) {
          records.push(record);
        } else {
          skipped += 1;
        }
      }
      if (rows.length < PAGE_SIZE) break;
    }

    if (skipped > 0) {
      console.warn(`[store] Skipped ${skipped} rows of ${config.table} with unknown roster_status or team`);
    }
    return records;
  }

  return {
    client,
    replaceTeamRecords,
    listAllRecords,
  };
}
