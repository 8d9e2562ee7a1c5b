/**
 * NBA team-season statistics.
 *
 * Every team's line is assembled from two tables on the season page: the team's
 * own totals and its opponents' totals. Rows are merged by abbreviation before
 * parsing, so one Team carries both halves.
 */

import { StatsError } from '../../errors/StatsError';
import { aggregateRows } from '../../scraping/rowAggregator';
import { TeamCollection } from '../../scraping/recordCollection';
import { parseAbbreviation } from '../../scraping/rowParser';
import { SchemeRecord } from '../../scraping/schemeRecord';
import { getStatsTable, loadDocument } from '../../scraping/statsTable';
import type { LoadOptions } from '../../types';
import { fetchHtml, seasonPageUrl } from '../../utils/http/referenceClient';
import { createLogger } from '../../utils/logger';
import { resolveSeasonYear } from '../../utils/season';
import {
  OPPONENT_STATS_TABLE,
  PARSING_SCHEME,
  TEAM_LINK,
  TEAM_STATS_TABLE,
  type TeamField,
} from './constants';
import { Schedule } from './schedule';

const logger = createLogger('nbaTeams');

export class Team extends SchemeRecord<TeamField> {
  /** Position in the league by points per game, as listed on the season page. */
  readonly rank: number;
  readonly year: number;
  /** Three-letter code such as "DET". */
  readonly abbreviation: string;

  constructor(teamData: string, rank: number, year: number) {
    super(PARSING_SCHEME, teamData);
    const abbreviation = parseAbbreviation(teamData, TEAM_LINK);
    if (!abbreviation) {
      throw StatsError.invalidArgument('Team row has no team link', { rank, year });
    }
    this.rank = rank;
    this.year = year;
    this.abbreviation = abbreviation;
  }

  /**
   * The team's schedule for the same season, fetched on demand.
   */
  getSchedule(options: LoadOptions = {}): Promise<Schedule> {
    return Schedule.load(this.abbreviation, this.year, options);
  }

  /** Full name, such as "Detroit Pistons". */
  get name(): string | null {
    return this.raw('name');
  }

  get gamesPlayed(): number | null {
    return this.int('gamesPlayed');
  }

  /** Total minutes played by all of the team's players. */
  get minutesPlayed(): number | null {
    return this.int('minutesPlayed');
  }

  get fieldGoals(): number | null {
    return this.int('fieldGoals');
  }

  get fieldGoalAttempts(): number | null {
    return this.int('fieldGoalAttempts');
  }

  /** Field goals made divided by attempts, 0-1. */
  get fieldGoalPercentage(): number | null {
    return this.percentage('fieldGoalPercentage');
  }

  get threePointFieldGoals(): number | null {
    return this.int('threePointFieldGoals');
  }

  get threePointFieldGoalAttempts(): number | null {
    return this.int('threePointFieldGoalAttempts');
  }

  get threePointFieldGoalPercentage(): number | null {
    return this.percentage('threePointFieldGoalPercentage');
  }

  get twoPointFieldGoals(): number | null {
    return this.int('twoPointFieldGoals');
  }

  get twoPointFieldGoalAttempts(): number | null {
    return this.int('twoPointFieldGoalAttempts');
  }

  get twoPointFieldGoalPercentage(): number | null {
    return this.percentage('twoPointFieldGoalPercentage');
  }

  get freeThrows(): number | null {
    return this.int('freeThrows');
  }

  get freeThrowAttempts(): number | null {
    return this.int('freeThrowAttempts');
  }

  get freeThrowPercentage(): number | null {
    return this.percentage('freeThrowPercentage');
  }

  get offensiveRebounds(): number | null {
    return this.int('offensiveRebounds');
  }

  get defensiveRebounds(): number | null {
    return this.int('defensiveRebounds');
  }

  get totalRebounds(): number | null {
    return this.int('totalRebounds');
  }

  /** Field goals that were assisted. */
  get assists(): number | null {
    return this.int('assists');
  }

  get steals(): number | null {
    return this.int('steals');
  }

  get blocks(): number | null {
    return this.int('blocks');
  }

  get turnovers(): number | null {
    return this.int('turnovers');
  }

  get personalFouls(): number | null {
    return this.int('personalFouls');
  }

  get points(): number | null {
    return this.int('points');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Opponent totals
  // ─────────────────────────────────────────────────────────────────────────

  get oppFieldGoals(): number | null {
    return this.int('oppFieldGoals');
  }

  get oppFieldGoalAttempts(): number | null {
    return this.int('oppFieldGoalAttempts');
  }

  get oppFieldGoalPercentage(): number | null {
    return this.percentage('oppFieldGoalPercentage');
  }

  get oppThreePointFieldGoals(): number | null {
    return this.int('oppThreePointFieldGoals');
  }

  get oppThreePointFieldGoalAttempts(): number | null {
    return this.int('oppThreePointFieldGoalAttempts');
  }

  get oppThreePointFieldGoalPercentage(): number | null {
    return this.percentage('oppThreePointFieldGoalPercentage');
  }

  get oppTwoPointFieldGoals(): number | null {
    return this.int('oppTwoPointFieldGoals');
  }

  get oppTwoPointFieldGoalAttempts(): number | null {
    return this.int('oppTwoPointFieldGoalAttempts');
  }

  get oppTwoPointFieldGoalPercentage(): number | null {
    return this.percentage('oppTwoPointFieldGoalPercentage');
  }

  get oppFreeThrows(): number | null {
    return this.int('oppFreeThrows');
  }

  get oppFreeThrowAttempts(): number | null {
    return this.int('oppFreeThrowAttempts');
  }

  get oppFreeThrowPercentage(): number | null {
    return this.percentage('oppFreeThrowPercentage');
  }

  get oppOffensiveRebounds(): number | null {
    return this.int('oppOffensiveRebounds');
  }

  get oppDefensiveRebounds(): number | null {
    return this.int('oppDefensiveRebounds');
  }

  get oppTotalRebounds(): number | null {
    return this.int('oppTotalRebounds');
  }

  get oppAssists(): number | null {
    return this.int('oppAssists');
  }

  get oppSteals(): number | null {
    return this.int('oppSteals');
  }

  get oppBlocks(): number | null {
    return this.int('oppBlocks');
  }

  get oppTurnovers(): number | null {
    return this.int('oppTurnovers');
  }

  get oppPersonalFouls(): number | null {
    return this.int('oppPersonalFouls');
  }

  /** Points the team conceded over the season. */
  get oppPoints(): number | null {
    return this.int('oppPoints');
  }
}

/**
 * All NBA teams that played in a season, in season-page order.
 */
export class Teams extends TeamCollection<Team> {
  /**
   * Fetch and parse the season page. Defaults to the season in progress.
   */
  static async load(year?: number | string, options: LoadOptions = {}): Promise<Teams> {
    const season = resolveSeasonYear('nba', year);
    const fetcher = options.fetchHtml ?? fetchHtml;
    const html = await fetcher(seasonPageUrl('nba', season));
    return Teams.fromHtml(html, season);
  }

  static fromHtml(html: string, year: number): Teams {
    const doc = loadDocument(html);
    const teamRows = getStatsTable(doc, TEAM_STATS_TABLE, { required: true });
    const opponentRows = getStatsTable(doc, OPPONENT_STATS_TABLE);

    const merged = aggregateRows([teamRows, opponentRows], (row) => parseAbbreviation(row, TEAM_LINK));
    const teams = merged.map((entry) => new Team(entry.data, entry.rank, year));

    logger.info({ year, count: teams.length, opponentRows: opponentRows.length }, 'Parsed NBA teams');
    return new Teams(teams, year);
  }
}
