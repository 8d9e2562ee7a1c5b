/**
 * Season team statistics and schedules from basketball-reference and
 * hockey-reference.
 *
 *   import { nba } from 'reference-season-stats';
 *   const teams = await nba.Teams.load(2018);
 *   const pistons = teams.get('DET');
 */

import * as nba from './leagues/nba';
import * as nhl from './leagues/nhl';

export { nba, nhl };

export { StatsError, STATS_ERROR_CODES, type StatsErrorCode } from './errors/StatsError';
export * from './types';

export {
  toInt,
  toFloat,
  toPercentage,
  toDurationMinutes,
  toDateTime,
  parseOvertime,
  parseGameResult,
  parseLocation,
  type IntOptions,
  type PercentageOptions,
} from './scraping/coercion';
export { loadRow, parseField, parseRecordFields, parseAbbreviation, parseBoxscoreId } from './scraping/rowParser';
export { loadDocument, getStatsTable, type StatsTableOptions } from './scraping/statsTable';
export { aggregateRows, type AggregatedRow } from './scraping/rowAggregator';
export { RecordCollection, TeamCollection, ScheduleCollection } from './scraping/recordCollection';
export { SchemeRecord } from './scraping/schemeRecord';

export { findYearForSeason, resolveSeasonYear } from './utils/season';
export { fetchHtml, seasonPageUrl, scheduleUrl, boxscoreUrl } from './utils/http/referenceClient';
export { createLogger, type Logger, type LogPayload } from './utils/logger';
