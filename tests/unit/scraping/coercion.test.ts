/**
 * Unit Tests: Field coercion
 */

import { describe, it, expect } from 'vitest';
import {
  parseGameResult,
  parseLocation,
  parseOvertime,
  toDateTime,
  toDurationMinutes,
  toFloat,
  toInt,
  toPercentage,
} from '../../../src/scraping/coercion';
import { StatsError } from '../../../src/errors/StatsError';
import { SHOOTOUT } from '../../../src/types';
import { catchStatsError } from '../../helpers/errors';

// ─────────────────────────────────────────────────────────────────────────────
// Numbers
// ─────────────────────────────────────────────────────────────────────────────

describe('toInt', () => {
  it('parses integers with surrounding whitespace', () => {
    expect(toInt('points', ' 102 ')).toBe(102);
    expect(toInt('diff', '-7')).toBe(-7);
  });

  it('returns null for an absent cell', () => {
    expect(toInt('points', null)).toBeNull();
  });

  it('rejects empty and non-integer text', () => {
    const err = catchStatsError(() => toInt('points', ''));
    expect(err.code).toBe('COERCION_FAILED');
    expect(err.message).toBe('Cannot convert points value "" to integer');
    expect(() => toInt('points', '10.5')).toThrow(StatsError);
    expect(() => toInt('points', '12a')).toThrow(StatsError);
  });

  it('strips thousands separators only when asked', () => {
    expect(toInt('attendance', '18,006', { thousands: true })).toBe(18006);
    expect(() => toInt('attendance', '18,006')).toThrow(StatsError);
  });
});

describe('toFloat', () => {
  it('parses signed and leading-dot decimals', () => {
    expect(toFloat('srs', '-0.53')).toBe(-0.53);
    expect(toFloat('age', '28.4')).toBe(28.4);
    expect(toFloat('pct', '.5')).toBe(0.5);
  });

  it('rejects non-numeric text', () => {
    expect(catchStatsError(() => toFloat('srs', 'n/a')).message).toBe('Cannot convert srs value "n/a" to decimal');
  });
});

describe('toPercentage', () => {
  it('reads fractions as published', () => {
    expect(toPercentage('fieldGoalPercentage', '.456')).toBe(0.456);
    expect(toPercentage('fieldGoalPercentage', '1.000')).toBe(1);
  });

  it('scales values with a percent sign', () => {
    expect(toPercentage('savePercentage', '50%')).toBe(0.5);
  });

  it('rejects values outside 0-1', () => {
    const err = catchStatsError(() => toPercentage('fieldGoalPercentage', '45.6'));
    expect(err.code).toBe('COERCION_FAILED');
    expect(err.message).toBe('Cannot convert fieldGoalPercentage value "45.6" to percentage between 0 and 1');
  });

  it('returns null for an absent cell', () => {
    expect(toPercentage('fieldGoalPercentage', null)).toBeNull();
  });

  it('reads values published on a 0-100 scale', () => {
    expect(toPercentage('powerPlayPercentage', '22.99', { scale: 100 })).toBeCloseTo(0.2299, 10);
    expect(toPercentage('penaltyKillPercentage', '100.0', { scale: 100 })).toBe(1);
    expect(catchStatsError(() => toPercentage('shootingPercentage', '101.5', { scale: 100 })).code).toBe(
      'COERCION_FAILED',
    );
  });
});

describe('toDurationMinutes', () => {
  it('converts H:MM to minutes', () => {
    expect(toDurationMinutes('lengthOfGame', '2:31')).toBe(151);
  });

  it('rejects malformed durations', () => {
    expect(() => toDurationMinutes('lengthOfGame', '2:75')).toThrow(StatsError);
    expect(() => toDurationMinutes('lengthOfGame', '151')).toThrow(StatsError);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Dates
// ─────────────────────────────────────────────────────────────────────────────

describe('toDateTime', () => {
  it('combines an ISO date with a 12-hour start time', () => {
    expect(toDateTime('date', '2017-10-05', '7:00 PM', 'yyyy-MM-dd')).toEqual(new Date(2017, 9, 5, 19, 0));
  });

  it('accepts the short "7:30p" form', () => {
    expect(toDateTime('date', 'Tue, Oct 17, 2017', '7:30p', 'EEE, MMM d, yyyy')).toEqual(
      new Date(2017, 9, 17, 19, 30),
    );
  });

  it('places games without a start time at midnight', () => {
    expect(toDateTime('date', '2017-10-05', '', 'yyyy-MM-dd')).toEqual(new Date(2017, 9, 5));
    expect(toDateTime('date', '2017-10-05', null, 'yyyy-MM-dd')).toEqual(new Date(2017, 9, 5));
  });

  it('returns null without a date', () => {
    expect(toDateTime('date', null, '7:00 PM', 'yyyy-MM-dd')).toBeNull();
  });

  it('rejects dates in another format', () => {
    const err = catchStatsError(() => toDateTime('date', 'October 5', null, 'yyyy-MM-dd'));
    expect(err.message).toBe('Cannot convert date value "October 5" to date (yyyy-MM-dd)');
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Game outcome
// ─────────────────────────────────────────────────────────────────────────────

describe('parseOvertime', () => {
  const cases: Array<[string | null, number]> = [
    [null, 0],
    ['', 0],
    ['OT', 1],
    ['2OT', 2],
    ['3OT', 3],
    ['SO', SHOOTOUT],
    ['so', SHOOTOUT],
    ['--', 0],
  ];

  it.each(cases)('%s → %i', (raw, expected) => {
    expect(parseOvertime(raw)).toBe(expected);
  });
});

describe('parseGameResult', () => {
  it('maps wins and regulation losses', () => {
    expect(parseGameResult('W')).toBe('Win');
    expect(parseGameResult('L')).toBe('Loss');
    expect(parseGameResult('l', 0)).toBe('Loss');
  });

  it('treats a loss after overtime or a shootout as an overtime loss', () => {
    expect(parseGameResult('L', 1)).toBe('Overtime Loss');
    expect(parseGameResult('L', SHOOTOUT)).toBe('Overtime Loss');
    expect(parseGameResult('OTL')).toBe('Overtime Loss');
    expect(parseGameResult('SOL')).toBe('Overtime Loss');
  });

  it('a win stays a win after overtime', () => {
    expect(parseGameResult('W', 2)).toBe('Win');
  });

  it('returns null for games not yet played', () => {
    expect(parseGameResult('')).toBeNull();
    expect(parseGameResult(null)).toBeNull();
  });

  it('counts a tie or any other completed marker as a loss', () => {
    expect(parseGameResult('T')).toBe('Loss');
    expect(parseGameResult('T', 1)).toBe('Loss');
  });
});

describe('parseLocation', () => {
  it('maps venue markers', () => {
    expect(parseLocation('@')).toBe('Away');
    expect(parseLocation('N')).toBe('Neutral');
    expect(parseLocation('')).toBe('Home');
    expect(parseLocation(null)).toBe('Home');
  });
});
