export const LEAGUES = ['nba', 'nhl'] as const;

export type League = (typeof LEAGUES)[number];

export const GAME_RESULTS = ['Win', 'Loss', 'Overtime Loss'] as const;

export type GameResult = (typeof GAME_RESULTS)[number];

export const GAME_LOCATIONS = ['Home', 'Away', 'Neutral'] as const;

export type GameLocation = (typeof GAME_LOCATIONS)[number];

export const SEASON_TYPES = ['Regular Season', 'Playoffs'] as const;

export type SeasonType = (typeof SEASON_TYPES)[number];

/** Overtime value reported for a game decided in a shootout. */
export const SHOOTOUT = -1;

/**
 * Field name → CSS selector, evaluated against a single (possibly merged) table row.
 */
export type FieldScheme<F extends string = string> = Readonly<Record<F, string>>;

/**
 * Retrieves an HTML document. The default implementation uses the global `fetch`.
 */
export type HtmlFetcher = (url: string) => Promise<string>;

export interface LoadOptions {
  fetchHtml?: HtmlFetcher;
}

export function isLeague(value: string): value is League {
  return LEAGUES.some((league) => league === value);
}
