/**
 * StatsError - Unified library error class
 *
 * Every failure raised while fetching, locating, parsing or looking up
 * season data is a StatsError carrying a machine-readable `code`.
 *
 * @example
 * throw StatsError.notFound('Team abbreviation XYZ not found');
 * throw StatsError.coercionFailed('points', 'abc', 'integer');
 */

export const STATS_ERROR_CODES = [
  'NOT_FOUND',
  'COERCION_FAILED',
  'TABLE_NOT_FOUND',
  'FETCH_FAILED',
  'INVALID_ARGUMENT',
] as const;

export type StatsErrorCode = (typeof STATS_ERROR_CODES)[number];

export class StatsError extends Error {
  constructor(
    message: string,
    public readonly code: StatsErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'StatsError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Lookup by key, date or index matched nothing
   */
  static notFound(message: string = 'Not found', details?: unknown): StatsError {
    return new StatsError(message, 'NOT_FOUND', details);
  }

  /**
   * A field was present but its text could not be converted
   */
  static coercionFailed(field: string, raw: string, expected: string): StatsError {
    return new StatsError(
      `Cannot convert ${field} value "${raw}" to ${expected}`,
      'COERCION_FAILED',
      { field, raw, expected },
    );
  }

  static tableNotFound(selector: string): StatsError {
    return new StatsError(`Stats table ${selector} not found`, 'TABLE_NOT_FOUND', { selector });
  }

  /**
   * Upstream document could not be retrieved
   */
  static fetchFailed(url: string, status?: number, cause?: unknown): StatsError {
    const reason = status === undefined ? 'network error' : `HTTP ${status}`;
    return new StatsError(`Failed to fetch ${url}: ${reason}`, 'FETCH_FAILED', { url, status, cause });
  }

  static invalidArgument(message: string, details?: unknown): StatsError {
    return new StatsError(message, 'INVALID_ARGUMENT', details);
  }

  /**
   * Check if an error is a StatsError
   */
  static isStatsError(err: unknown): err is StatsError {
    return err instanceof StatsError || (err instanceof Error && err.name === 'StatsError');
  }
}
