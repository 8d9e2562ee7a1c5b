/**
 * Field coercion rules.
 *
 * Each rule turns the raw text of a table cell into its semantic type. A `null`
 * raw value (cell absent) stays `null`; present text that does not fit the
 * expected shape raises COERCION_FAILED.
 */

import { isValid, parse } from 'date-fns';
import { StatsError } from '../errors/StatsError';
import { SHOOTOUT, type GameLocation, type GameResult } from '../types';

const INTEGER_RE = /^[+-]?\d+$/;
const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)$/;
const DURATION_RE = /^(\d+):([0-5]\d)$/;

export interface IntOptions {
  /** Strip thousands separators (e.g. attendance "18,006"). */
  thousands?: boolean;
}

export function toInt(field: string, raw: string | null, opts: IntOptions = {}): number | null {
  if (raw === null) return null;
  const text = opts.thousands ? raw.trim().replace(/,/g, '') : raw.trim();
  if (!INTEGER_RE.test(text)) {
    throw StatsError.coercionFailed(field, raw, 'integer');
  }
  return Number.parseInt(text, 10);
}

export function toFloat(field: string, raw: string | null): number | null {
  if (raw === null) return null;
  const text = raw.trim();
  if (!DECIMAL_RE.test(text)) {
    throw StatsError.coercionFailed(field, raw, 'decimal');
  }
  return Number(text);
}

export interface PercentageOptions {
  /** Published on a 0-100 scale without a percent sign (e.g. "22.99"). */
  scale?: 1 | 100;
}

/**
 * Percentages are published as a fraction (".456"), with a percent sign
 * ("45.6%") or on a 0-100 scale. All decode to a value in [0, 1].
 */
export function toPercentage(field: string, raw: string | null, opts: PercentageOptions = {}): number | null {
  if (raw === null) return null;
  let text = raw.trim();
  let scale: number = opts.scale ?? 1;
  if (text.endsWith('%')) {
    text = text.slice(0, -1).trim();
    scale = 100;
  }
  if (!DECIMAL_RE.test(text)) {
    throw StatsError.coercionFailed(field, raw, 'percentage');
  }
  const value = Number(text) / scale;
  if (value < 0 || value > 1) {
    throw StatsError.coercionFailed(field, raw, 'percentage between 0 and 1');
  }
  return value;
}

/** "H:MM" → total minutes. */
export function toDurationMinutes(field: string, raw: string | null): number | null {
  if (raw === null) return null;
  const match = DURATION_RE.exec(raw.trim());
  if (!match) {
    throw StatsError.coercionFailed(field, raw, 'duration (H:MM)');
  }
  return Number(match[1]) * 60 + Number(match[2]);
}

/**
 * "7:00 PM", "7:00p" and "7:00 p.m." all normalise to "7:00 PM".
 */
function normalizeClockTime(raw: string | null): string | null {
  const text = (raw ?? '').trim();
  if (text === '') return null;
  const match = /^(\d{1,2}:\d{2})\s*([ap])\.?\s*(m\.?)?$/i.exec(text);
  return match ? `${match[1]} ${match[2].toUpperCase()}M` : text;
}

/**
 * Combine a date cell and an optional start-time cell into a local Date.
 * Without a start time the game is placed at midnight.
 */
export function toDateTime(
  field: string,
  date: string | null,
  time: string | null,
  dateFormat: string,
): Date | null {
  if (date === null) return null;
  const dateText = date.trim();
  const timeText = normalizeClockTime(time);
  const text = timeText ? `${dateText} ${timeText}` : dateText;
  const value = parse(text, timeText ? `${dateFormat} h:mm a` : dateFormat, new Date(0));
  if (!isValid(value)) {
    throw StatsError.coercionFailed(field, text, `date (${dateFormat})`);
  }
  return value;
}

/**
 * Number of overtime periods played: "" → 0, "OT" → 1, "3OT" → 3, "SO" → SHOOTOUT.
 */
export function parseOvertime(raw: string | null): number {
  const text = (raw ?? '').trim().toLowerCase();
  if (text === '') return 0;
  if (text === 'ot') return 1;
  if (text === 'so') return SHOOTOUT;
  const digits = /\d+/.exec(text);
  return digits ? Number.parseInt(digits[0], 10) : 0;
}

/**
 * Outcome of a completed game from the team's point of view.
 *
 * A loss after any overtime (or a shootout) counts as an overtime loss; any
 * other marker that is not a win, ties ("T") included, is a Loss. Games not
 * played yet have no outcome and return `null`.
 */
export function parseGameResult(raw: string | null, overtime = 0): GameResult | null {
  const text = (raw ?? '').trim().toLowerCase();
  if (text === '') return null;
  if (text === 'w') return 'Win';
  if (text === 'l' && overtime !== 0) return 'Overtime Loss';
  if (text === 'otl' || text === 'sol') return 'Overtime Loss';
  return 'Loss';
}

export function parseLocation(raw: string | null): GameLocation {
  const text = (raw ?? '').trim().toUpperCase();
  if (text === '@') return 'Away';
  if (text === 'N') return 'Neutral';
  return 'Home';
}
