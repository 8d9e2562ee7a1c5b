import { StatsError } from '../errors/StatsError';
import { isLeague, type League } from '../types';

const SEASON_YEAR_RE = /^\d{4}$/;

interface SeasonCalendar {
  /** Month (1-12) the regular season opens. */
  startMonth: number;
  /** Whether the season runs past December into the next calendar year. */
  wrapsYear: boolean;
}

const SEASON_CALENDAR: Record<League, SeasonCalendar> = {
  nba: { startMonth: 10, wrapsYear: true },
  nhl: { startMonth: 10, wrapsYear: true },
};

/**
 * Year the reference sites use to label the season in progress on `today`.
 *
 * Seasons that wrap the new year are labelled by their ending year, so from the
 * month before opening night onward the label is next year.
 */
export function findYearForSeason(league: string, today: Date = new Date()): number {
  if (!isLeague(league)) {
    throw StatsError.invalidArgument(`"${league}" league cannot be found`, { league });
  }
  const { startMonth, wrapsYear } = SEASON_CALENDAR[league];
  const month = today.getMonth() + 1;
  const year = today.getFullYear();

  if (wrapsYear && month >= startMonth - 1) {
    return year + 1;
  }
  return year;
}

/**
 * Accept a season given as a number or numeric string; fall back to the current season.
 */
export function resolveSeasonYear(league: League, year?: number | string | null): number {
  if (year === undefined || year === null || year === '') {
    return findYearForSeason(league);
  }
  // Strings must be four plain digits; Number() would also take "0x7E2" or "2e3"
  const parsed = typeof year === 'number' ? year : SEASON_YEAR_RE.test(year.trim()) ? Number(year.trim()) : NaN;
  if (!Number.isInteger(parsed) || parsed < 1800 || parsed > 9999) {
    throw StatsError.invalidArgument(`Invalid season year "${year}"`, { year });
  }
  return parsed;
}
