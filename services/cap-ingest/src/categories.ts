import type { RosterCategory } from './types.js';

// Heading labels as printed on Spotrac team cap pages, without the season
// prefix. Order matters: it is the record order of a team dataset.
export const ROSTER_CATEGORIES: readonly RosterCategory[] = [
  { label: 'active', status: 'active', locator: 'class' },
  { label: 'Reserve/Suspended Cap', status: 'reserve/suspended', locator: 'heading' },
  { label: 'Exempt/Commissioner\u2019s Permission List', status: 'exempt', locator: 'heading' },
  { label: 'Injured Reserve Cap', status: 'ir', locator: 'heading' },
  { label: 'Reserve/PUP', status: 'pup', locator: 'heading' },
  { label: 'Non-Football Injury Cap', status: 'non-football injury', locator: 'heading' },
  { label: 'Practice Squad', status: 'practice squad', locator: 'heading' },
  { label: 'Dead Cap', status: 'dead cap', locator: 'heading' },
];

export const ROSTER_TABLE_CLASS = 'datatable rtable';
export const CAP_TOTALS_TABLE_CLASS = 'datatable rtable captotal';

export function categoryHeading(category: RosterCategory, season: string): string {
  return category.locator === 'heading' ? `${season} ${category.label}` : category.label;
}

export function capTotalsHeading(season: string): string {
  return `${season} Cap Totals`;
}
