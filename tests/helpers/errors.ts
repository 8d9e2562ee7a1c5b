import { StatsError } from '../../src/errors/StatsError';

/**
 * Run `fn` and return the StatsError it throws; fail if it throws nothing else.
 */
export function catchStatsError(fn: () => unknown): StatsError {
  try {
    fn();
  } catch (err) {
    if (err instanceof StatsError) return err;
    throw err;
  }
  throw new Error('Expected a StatsError to be thrown');
}

export async function rejectStatsError(promise: Promise<unknown>): Promise<StatsError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof StatsError) return err;
    throw err;
  }
  throw new Error('Expected a StatsError to be thrown');
}
