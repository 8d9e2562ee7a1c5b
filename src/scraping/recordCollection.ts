import { isSameDay, isValid } from 'date-fns';
import { StatsError } from '../errors/StatsError';

/**
 * Ordered, read-only list of parsed records.
 */
export class RecordCollection<T> implements Iterable<T> {
  protected readonly items: readonly T[];

  constructor(items: Iterable<T>) {
    this.items = Object.freeze([...items]);
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Record at a 0-based position; negative indexes count from the end.
   */
  at(index: number): T {
    const position = index < 0 ? this.items.length + index : index;
    if (!Number.isInteger(position) || position < 0 || position >= this.items.length) {
      throw StatsError.notFound(`Index ${index} is out of range`, { index, length: this.items.length });
    }
    return this.items[position];
  }

  find(predicate: (item: T, index: number) => boolean): T | undefined {
    return this.items.find(predicate);
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}

/**
 * Season team list keyed by abbreviation.
 */
export class TeamCollection<T extends { readonly abbreviation: string }> extends RecordCollection<T> {
  readonly year: number;

  constructor(teams: Iterable<T>, year: number) {
    super(teams);
    this.year = year;
  }

  /**
   * Team by abbreviation, case-insensitive.
   */
  get(abbreviation: string): T {
    const wanted = abbreviation.toUpperCase();
    const team = this.items.find((candidate) => candidate.abbreviation.toUpperCase() === wanted);
    if (!team) {
      throw StatsError.notFound(`Team abbreviation ${abbreviation} not found`, { abbreviation, year: this.year });
    }
    return team;
  }

  has(abbreviation: string): boolean {
    const wanted = abbreviation.toUpperCase();
    return this.items.some((candidate) => candidate.abbreviation.toUpperCase() === wanted);
  }
}

/**
 * One team's games for a season, in the order they were scheduled.
 */
export class ScheduleCollection<T extends { readonly datetime: Date | null }> extends RecordCollection<T> {
  readonly abbreviation: string;
  readonly year: number;

  constructor(games: Iterable<T>, abbreviation: string, year: number) {
    super(games);
    this.abbreviation = abbreviation.toUpperCase();
    this.year = year;
  }

  /**
   * Game played on the same calendar day as `date`; the time of day is ignored.
   */
  onDate(date: Date): T {
    if (!isValid(date)) {
      throw StatsError.invalidArgument('Invalid date', { date: String(date) });
    }
    const game = this.items.find((candidate) => {
      const played = candidate.datetime;
      return played !== null && isSameDay(played, date);
    });
    if (!game) {
      throw StatsError.notFound('No games found for requested date', { date: date.toISOString() });
    }
    return game;
  }
}
