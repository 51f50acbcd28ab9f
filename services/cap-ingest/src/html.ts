import { load, type CheerioAPI } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import { foldText } from './utils/normalizer.js';

export function loadHtml(html: string): CheerioAPI {
  return load(html);
}

export function cleanText(value: string): string {
  return value.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Parses Spotrac currency text such as `$12,345,678` or `-$1,000` into whole
 * dollars. Returns null for anything that is not a plain integer once the
 * currency symbol and thousands separators are removed.
 */
export function parseCurrency(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }

  const trimmed = cleanText(value);
  const negative = trimmed.startsWith('-');
  const unsigned = (negative ? trimmed.slice(1) : trimmed).replace(/^\$/, '').replace(/,/g, '');
  if (!/^\d+$/.test(unsigned)) {
    return null;
  }

  const amount = Number.parseInt(unsigned, 10);
  if (!Number.isSafeInteger(amount)) {
    return null;
  }
  return negative ? -amount : amount;
}

export function findHeading($: CheerioAPI, text: string, tag = 'h2'): Element | null {
  const match = $(tag)
    .toArray()
    .filter(isTag)
    .find((node) => $(node).text().trim() === text);
  return match ?? null;
}

/** Headings that only differ from `text` in quote glyphs, case or spacing. */
export function findNearMissHeadings($: CheerioAPI, text: string, tag = 'h2'): string[] {
  const folded = foldText(text);
  return $(tag)
    .toArray()
    .filter(isTag)
    .map((node) => $(node).text().trim())
    .filter((candidate) => candidate !== text && foldText(candidate) === folded);
}

/**
 * First `table` after `anchor` in document order whose class attribute is
 * exactly `classAttr`, wherever it sits in the tree.
 */
export function findNextTable($: CheerioAPI, anchor: Element, classAttr: string): Element | null {
  const ordered = $(`${anchor.tagName}, table`).toArray().filter(isTag);
  const start = ordered.indexOf(anchor);
  if (start === -1) {
    return null;
  }

  for (const node of ordered.slice(start + 1)) {
    if (node.tagName === 'table' && $(node).attr('class') === classAttr) {
      return node;
    }
  }
  return null;
}

export function findTableByClass($: CheerioAPI, classAttr: string): Element | null {
  const match = $('table')
    .toArray()
    .find((node) => $(node).attr('class') === classAttr);
  return match ?? null;
}
