/**
 * Sports-reference HTML client.
 * Handles all HTTP requests to basketball-reference and hockey-reference pages.
 */

import { env } from '../../config/env';
import { StatsError } from '../../errors/StatsError';
import type { League } from '../../types';
import { createLogger } from '../logger';

const logger = createLogger('referenceClient');

const SEASON_PAGE_TMPL: Record<League, string> = {
  nba: '/leagues/NBA_{year}.html',
  nhl: '/leagues/NHL_{year}.html',
};
const SCHEDULE_TMPL = '/teams/{abbr}/{year}_games.html';
const BOXSCORE_TMPL = '/boxscores/{boxscore_id}.html';

function baseUrl(league: League): string {
  const base = league === 'nba' ? env.NBA_BASE_URL : env.NHL_BASE_URL;
  return base.replace(/\/+$/, '');
}

export function seasonPageUrl(league: League, year: number): string {
  return baseUrl(league) + SEASON_PAGE_TMPL[league].replace('{year}', String(year));
}

export function scheduleUrl(league: League, abbreviation: string, year: number): string {
  const path = SCHEDULE_TMPL
    .replace('{abbr}', encodeURIComponent(abbreviation.toUpperCase()))
    .replace('{year}', String(year));
  return baseUrl(league) + path;
}

export function boxscoreUrl(league: League, boxscoreId: string): string {
  return baseUrl(league) + BOXSCORE_TMPL.replace('{boxscore_id}', encodeURIComponent(boxscoreId));
}

/**
 * Fetch an HTML document with standard headers.
 * Non-2xx responses and network errors are raised as FETCH_FAILED.
 */
export async function fetchHtml(url: string): Promise<string> {
  const start = Date.now();
  let res: Response;
  try {
    res = await fetch(url, {
      headers: {
        'User-Agent': env.HTTP_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml',
      },
    });
  } catch (err) {
    logger.warn({ url, err }, 'HTTP error');
    throw StatsError.fetchFailed(url, undefined, err);
  }

  if (!res.ok) {
    logger.warn({ url, status: res.status }, 'Fetch failed');
    throw StatsError.fetchFailed(url, res.status);
  }

  const html = await res.text();
  logger.debug({ url, bytes: html.length, latencyMs: Date.now() - start }, 'Fetched document');
  return html;
}
