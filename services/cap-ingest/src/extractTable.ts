import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { ROSTER_TABLE_CLASS, categoryHeading } from './categories.js';
import { PageStructureError } from './errors.js';
import { extractRow } from './extractRow.js';
import { findHeading, findNearMissHeadings, findNextTable, findTableByClass } from './html.js';
import type { FieldExtractionIssue, PlayerCapRecord, RosterCategory } from './types.js';
import { extractTableTotal, verifyTotal } from './verifyTotals.js';

const LOG_PREFIX = '[extract]';

export interface TableExtraction {
  records: PlayerCapRecord[];
  issues: FieldExtractionIssue[];
}

function locateTable(
  $: CheerioAPI,
  category: RosterCategory,
  heading: string,
  context: string,
): Element | null {
  if (category.locator === 'class') {
    const table = findTableByClass($, ROSTER_TABLE_CLASS);
    if (!table) {
      throw new PageStructureError(context, `no table with class "${ROSTER_TABLE_CLASS}"`);
    }
    return table;
  }

  const headingNode = findHeading($, heading);
  if (!headingNode) {
    const nearMisses = findNearMissHeadings($, heading);
    if (nearMisses.length) {
      console.warn(`${LOG_PREFIX} Heading text drifted; treating category as absent`, {
        context,
        expected: heading,
        found: nearMisses,
      });
    }
    return null;
  }

  const table = findNextTable($, headingNode, ROSTER_TABLE_CLASS);
  if (!table) {
    throw new PageStructureError(context, `no "${ROSTER_TABLE_CLASS}" table after heading`);
  }
  return table;
}

/**
 * Extracts one roster category from a team cap page and checks it against the
 * table's footer subtotal. A category whose heading is not on the page yields
 * an empty batch.
 */
export function extractCategoryTable(
  $: CheerioAPI,
  category: RosterCategory,
  team: string,
  season: string,
): TableExtraction {
  const heading = categoryHeading(category, season);
  const context = `${team} / ${heading}`;
  const table = locateTable($, category, heading, context);
  if (!table) {
    return { records: [], issues: [] };
  }

  const records: PlayerCapRecord[] = [];
  const issues: FieldExtractionIssue[] = [];
  const rows = $(table).find('tbody tr').toArray();
  for (const row of rows) {
    const extraction = extractRow($, row, { roster_status: category.status, team });
    records.push(extraction.record);
    issues.push(...extraction.issues);
  }

  verifyTotal(records, extractTableTotal($, table, context), context);
  return { records, issues };
}
