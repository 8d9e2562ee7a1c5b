/**
 * Locates stat tables in a reference-site document.
 */

import * as cheerio from 'cheerio';
import { StatsError } from '../errors/StatsError';

export interface StatsTableOptions {
  /** Throw TABLE_NOT_FOUND instead of returning no rows when the container is missing. */
  required?: boolean;
}

/**
 * Parse a full document. Many tables are shipped inside HTML comments and
 * revealed client-side, so comment markers are dropped before parsing.
 */
export function loadDocument(html: string): cheerio.CheerioAPI {
  return cheerio.load(html.replace(/<!--/g, '').replace(/-->/g, ''));
}

/**
 * Outer HTML of every body row of the table found under `selector`.
 * Header rows repeated inside the body (`tr.thead`) are skipped.
 */
export function getStatsTable(
  doc: string | cheerio.CheerioAPI,
  selector: string,
  opts: StatsTableOptions = {},
): string[] {
  const $ = typeof doc === 'string' ? loadDocument(doc) : doc;
  const container = $(selector).first();
  if (container.length === 0) {
    if (opts.required) {
      throw StatsError.tableNotFound(selector);
    }
    return [];
  }

  const rows: string[] = [];
  container.find('tbody tr').each((_, el) => {
    const row = $(el);
    if (row.hasClass('thead') || row.hasClass('over_header')) return;
    rows.push($.html(el));
  });
  return rows;
}
