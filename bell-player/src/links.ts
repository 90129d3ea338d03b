/**
 * Link source: reads the single-column link sheet and picks the link for
 * each bell.
 *
 * The sheet is plain text (one URL per line) or a CSV export where the URL
 * sits in the first column. `#` comment lines and blank rows are skipped, as
 * is a header row such as `url` or `Link`.
 */

import { readFileSync } from 'fs';
import type { LinkOrder } from './schemas/index.js';
import { LinkSheetError } from './errors.js';

export interface SelectedLink {
  index: number;
  url: string;
}

/**
 * First cell of a CSV row, with surrounding quotes removed
 */
function firstCell(row: string): string {
  const trimmed = row.trim();
  if (trimmed.startsWith('"')) {
    const close = trimmed.indexOf('"', 1);
    return close === -1 ? trimmed.slice(1) : trimmed.slice(1, close);
  }
  const comma = trimmed.indexOf(',');
  return (comma === -1 ? trimmed : trimmed.slice(0, comma)).trim();
}

function looksLikeUrl(value: string): boolean {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(value);
}

export function parseLinkSheet(content: string): string[] {
  const links: string[] = [];
  const rows = content.replace(/^\uFEFF/, '').split(/\r?\n/);

  let firstRow = true;
  for (const row of rows) {
    if (row.trim().startsWith('#')) continue;
    const cell = firstCell(row);
    if (!cell) continue;
    // Header row from a spreadsheet export
    const header = firstRow && !looksLikeUrl(cell);
    firstRow = false;
    if (header) continue;
    links.push(cell);
  }

  return links;
}

export function readLinkSheet(path: string): string[] {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new LinkSheetError(`Link sheet ${path} does not exist or cannot be read`, { cause: err });
  }

  const links = parseLinkSheet(content);
  if (links.length === 0) {
    throw new LinkSheetError(`Link sheet ${path} contains no links`);
  }
  return links;
}

/**
 * Picks the next link in rotation. Sequential order walks the list and
 * wraps; random order never repeats the previous pick when it can avoid it.
 */
export class LinkSelector {
  private links: string[];
  private position: number;
  private lastIndex: number | null = null;

  constructor(
    links: string[],
    private readonly order: LinkOrder = 'sequential',
    startIndex = 0,
    private readonly random: () => number = Math.random
  ) {
    if (links.length === 0) {
      throw new LinkSheetError('Cannot rotate through an empty link list');
    }
    this.links = [...links];
    this.position = ((startIndex % this.links.length) + this.links.length) % this.links.length;
  }

  get cursor(): number {
    return this.position;
  }

  get size(): number {
    return this.links.length;
  }

  /**
   * Swap in a freshly read sheet, keeping the cursor where it can
   */
  replaceLinks(links: string[]): void {
    if (links.length === 0) {
      throw new LinkSheetError('Cannot rotate through an empty link list');
    }
    this.links = [...links];
    this.position %= this.links.length;
    this.lastIndex = null;
  }

  next(): SelectedLink {
    const index = this.order === 'random' ? this.pickRandom() : this.position;
    this.position = (index + 1) % this.links.length;
    this.lastIndex = index;
    return { index, url: this.links[index] };
  }

  private pickRandom(): number {
    const count = this.links.length;
    if (count === 1 || this.lastIndex === null) {
      return Math.floor(this.random() * count);
    }
    // Pick among the other count - 1 entries, then step over the last one
    const pick = Math.floor(this.random() * (count - 1));
    return pick >= this.lastIndex ? pick + 1 : pick;
  }
}
