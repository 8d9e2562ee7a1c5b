/**
 * Scheme-driven row parsing.
 *
 * A row is the outer HTML of one `<tr>`, or several concatenated `<tr>`s when
 * rows from different tables were merged for the same team. Every scheme field
 * resolves to the trimmed text of the first element its selector matches.
 */

import * as cheerio from 'cheerio';
import type { FieldScheme } from '../types';

const TEAM_LINK_RE = /\/teams\/([^/]+)\//;
const BOXSCORE_LINK_RE = /\/boxscores\/([^/?#]+?)\.html?/;

/**
 * Load row markup for querying. Rows are wrapped in a table so the HTML parser
 * keeps `<tr>`/`<td>` elements instead of dropping them as misplaced.
 */
export function loadRow(row: string): cheerio.CheerioAPI {
  return cheerio.load(`<table><tbody>${row}</tbody></table>`);
}

export function parseField<F extends string>(
  scheme: FieldScheme<F>,
  $: cheerio.CheerioAPI,
  field: F,
): string | null {
  const match = $(scheme[field]).first();
  if (match.length === 0) return null;
  return match.text().trim();
}

export function schemeFields<F extends string>(scheme: FieldScheme<F>): F[] {
  return Object.keys(scheme).filter((key): key is F => Object.prototype.hasOwnProperty.call(scheme, key));
}

/**
 * Resolve every field of a scheme against one row.
 */
export function parseRecordFields<F extends string>(
  scheme: FieldScheme<F>,
  row: string | cheerio.CheerioAPI,
): Map<F, string | null> {
  const $ = typeof row === 'string' ? loadRow(row) : row;
  const fields = new Map<F, string | null>();
  for (const field of schemeFields(scheme)) {
    fields.set(field, parseField(scheme, $, field));
  }
  return fields;
}

function firstHref($: cheerio.CheerioAPI, selector: string): string | null {
  return $(selector).first().attr('href') ?? null;
}

/**
 * Team abbreviation from a `/teams/<ABBR>/<year>.html` link, e.g. "DET".
 */
export function parseAbbreviation(
  row: string | cheerio.CheerioAPI,
  selector = 'a[href*="/teams/"]',
): string | null {
  const $ = typeof row === 'string' ? loadRow(row) : row;
  const href = firstHref($, selector);
  if (!href) return null;
  const match = TEAM_LINK_RE.exec(href);
  return match ? match[1].toUpperCase() : null;
}

/**
 * Boxscore identifier from a `/boxscores/<ID>.html` link, e.g. "201710050NYR".
 */
export function parseBoxscoreId(row: string | cheerio.CheerioAPI, selector: string): string | null {
  const $ = typeof row === 'string' ? loadRow(row) : row;
  const href = firstHref($, selector);
  if (!href) return null;
  const match = BOXSCORE_LINK_RE.exec(href);
  return match ? match[1] : null;
}
