import { describe, it, expect, vi, afterEach } from 'vitest';
import { findYearForSeason, resolveSeasonYear } from '../../../src/utils/season';
import { catchStatsError } from '../../helpers/errors';

describe('findYearForSeason', () => {
  it('labels a season by the year it ends in once it is near', () => {
    expect(findYearForSeason('nba', new Date(2017, 9, 17))).toBe(2018);
    expect(findYearForSeason('nhl', new Date(2017, 11, 31))).toBe(2018);
  });

  it('switches to the next label from September', () => {
    expect(findYearForSeason('nhl', new Date(2017, 7, 31))).toBe(2017);
    expect(findYearForSeason('nhl', new Date(2017, 8, 1))).toBe(2018);
  });

  it('keeps the calendar year through the spring', () => {
    expect(findYearForSeason('nba', new Date(2018, 3, 14))).toBe(2018);
    expect(findYearForSeason('nba', new Date(2018, 0, 1))).toBe(2018);
  });

  it('rejects an unknown league', () => {
    const err = catchStatsError(() => findYearForSeason('mlb', new Date(2018, 0, 1)));
    expect(err.code).toBe('INVALID_ARGUMENT');
    expect(err.message).toBe('"mlb" league cannot be found');
  });
});

describe('resolveSeasonYear', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('accepts numbers and numeric strings', () => {
    expect(resolveSeasonYear('nba', 2018)).toBe(2018);
    expect(resolveSeasonYear('nba', ' 2019 ')).toBe(2019);
  });

  it('falls back to the season in progress', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2020, 10, 1));

    expect(resolveSeasonYear('nhl')).toBe(2021);
    expect(resolveSeasonYear('nhl', null)).toBe(2021);
    expect(resolveSeasonYear('nhl', '')).toBe(2021);
  });

  it('rejects years that are not whole numbers', () => {
    expect(catchStatsError(() => resolveSeasonYear('nba', 'next')).message).toBe('Invalid season year "next"');
    expect(catchStatsError(() => resolveSeasonYear('nba', 2018.5)).code).toBe('INVALID_ARGUMENT');
    expect(catchStatsError(() => resolveSeasonYear('nba', 1700)).code).toBe('INVALID_ARGUMENT');
  });

  it('rejects strings that are not four plain digits', () => {
    expect(catchStatsError(() => resolveSeasonYear('nba', '0x7E2')).message).toBe('Invalid season year "0x7E2"');
    expect(catchStatsError(() => resolveSeasonYear('nhl', '2e3')).code).toBe('INVALID_ARGUMENT');
    expect(catchStatsError(() => resolveSeasonYear('nhl', '+2018')).code).toBe('INVALID_ARGUMENT');
  });
});
