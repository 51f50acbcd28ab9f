import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { cleanText, parseCurrency } from './html.js';
import type { CapField, FieldExtractionIssue, PlayerCapRecord, RecordContext } from './types.js';

const LOG_PREFIX = '[extract]';

export interface RowExtraction {
  record: PlayerCapRecord;
  issues: FieldExtractionIssue[];
}

type FieldResult<T> = { ok: true; value: T } | { ok: false; reason: string };

function readPlayerName($: CheerioAPI, row: Element): FieldResult<string> {
  const link = $(row).find('td.player').first().find('a').first();
  if (!link.length) {
    return { ok: false, reason: 'no td.player link' };
  }
  const name = cleanText(link.text());
  return name ? { ok: true, value: name } : { ok: false, reason: 'empty player link' };
}

function readPosition($: CheerioAPI, row: Element): FieldResult<string> {
  const cell = $(row).find('td.center').first();
  if (!cell.length) {
    return { ok: false, reason: 'no td.center cell' };
  }
  const position = cleanText(cell.text());
  return position ? { ok: true, value: position } : { ok: false, reason: 'empty position cell' };
}

function readCapHit($: CheerioAPI, row: Element): FieldResult<number> {
  const cell = $(row).find('td[class^="right result"]').first();
  const span = cell.find('span[title^="Cap Hit"]').first();
  if (!span.length) {
    return { ok: false, reason: 'no Cap Hit span' };
  }
  const text = cleanText(span.text());
  const capHit = parseCurrency(text);
  return capHit !== null
    ? { ok: true, value: capHit }
    : { ok: false, reason: `unparseable cap hit "${text}"` };
}

/**
 * Reads one roster row. Every field is attempted on its own, so a broken cell
 * only nulls that field and the record is still emitted.
 */
export function extractRow($: CheerioAPI, row: Element, context: RecordContext): RowExtraction {
  const issues: FieldExtractionIssue[] = [];
  const name = readPlayerName($, row);
  const playerName = name.ok ? name.value : null;

  const settle = <T>(field: CapField, result: FieldResult<T>): T | null => {
    if (result.ok) {
      return result.value;
    }
    const issue: FieldExtractionIssue = {
      field,
      team: context.team,
      roster_status: context.roster_status,
      player_name: playerName,
      reason: result.reason,
    };
    issues.push(issue);
    console.warn(
      `${LOG_PREFIX} Row can't be extracted for ${field} of ${playerName ?? 'unknown player'} (${context.roster_status}) on ${context.team}: ${result.reason}`,
    );
    return null;
  };

  const record: PlayerCapRecord = {
    player_name: settle('player_name', name),
    position: settle('position', readPosition($, row)),
    cap_hit: settle('cap_hit', readCapHit($, row)),
    roster_status: context.roster_status,
    team: context.team,
  };

  return { record, issues };
}
