import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { CAP_TOTALS_TABLE_CLASS, capTotalsHeading } from './categories.js';
import { PageStructureError, VerificationError } from './errors.js';
import { cleanText, findHeading, findNextTable, parseCurrency } from './html.js';
import type { PlayerCapRecord } from './types.js';

const FOOTER_TOTAL_CELL_CLASS = 'right result xs-visible';

/** Null cap hits are left out, so a row that failed to parse shows up as a shortfall. */
export function sumCapHits(records: readonly PlayerCapRecord[]): number {
  return records.reduce((sum, record) => sum + (record.cap_hit ?? 0), 0);
}

export function verifyTotal(
  records: readonly PlayerCapRecord[],
  expected: number,
  context: string,
): number {
  const actual = sumCapHits(records);
  if (actual !== expected) {
    throw new VerificationError(context, expected, actual);
  }
  return actual;
}

/**
 * The category subtotal printed in a roster table's footer. An empty category
 * prints a placeholder such as `-` there, which counts as 0.
 */
export function extractTableTotal($: CheerioAPI, table: Element, context: string): number {
  const cell = $(table)
    .find('tfoot td')
    .toArray()
    .find((node) => $(node).attr('class') === FOOTER_TOTAL_CELL_CLASS);
  if (!cell) {
    throw new PageStructureError(context, 'table footer has no total cell');
  }

  const span = $(cell).find('span[title="Cap Hit"]').first();
  if (!span.length) {
    throw new PageStructureError(context, 'table footer has no Cap Hit total');
  }

  const total = parseCurrency(span.text());
  if (total === null) {
    console.warn('[extract] Table footer total is not a number; using 0', {
      context,
      found: cleanText(span.text()),
    });
    return 0;
  }
  return total;
}

/** The grand total from the "<season> Cap Totals" block. */
export function extractTeamTotal($: CheerioAPI, season: string, context: string): number {
  const headingText = capTotalsHeading(season);
  const heading = findHeading($, headingText);
  if (!heading) {
    throw new PageStructureError(context, `no "${headingText}" heading`);
  }

  const table = findNextTable($, heading, CAP_TOTALS_TABLE_CLASS);
  if (!table) {
    throw new PageStructureError(context, `no cap totals table after "${headingText}"`);
  }

  const label = $(table)
    .find('td')
    .toArray()
    .find((node) => $(node).text().trim() === 'Total');
  if (!label) {
    throw new PageStructureError(context, 'cap totals table has no Total row');
  }

  const valueCell = $(label).closest('tr').find('td').last();
  return requireCurrency(valueCell.text(), context, 'cap totals Total');
}

function requireCurrency(text: string, context: string, what: string): number {
  const value = parseCurrency(text);
  if (value === null) {
    throw new PageStructureError(context, `unparseable ${what} "${cleanText(text)}"`);
  }
  return value;
}
