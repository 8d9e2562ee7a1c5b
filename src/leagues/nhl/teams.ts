/**
 * NHL team-season statistics, read from the league standings table of the
 * season page. Rank is the team's position in that table.
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
import { PARSING_SCHEME, TEAM_LINK, TEAM_STATS_TABLE, type TeamField } from './constants';
import { Schedule } from './schedule';

const logger = createLogger('nhlTeams');

export class Team extends SchemeRecord<TeamField> {
  readonly rank: number;
  readonly year: number;
  /** Three-letter code such as "NYR". */
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

  getSchedule(options: LoadOptions = {}): Promise<Schedule> {
    return Schedule.load(this.abbreviation, this.year, options);
  }

  get name(): string | null {
    return this.raw('name');
  }

  /** Average age of the roster, weighted by time on ice. */
  get averageAge(): number | null {
    return this.decimal('averageAge');
  }

  get gamesPlayed(): number | null {
    return this.int('gamesPlayed');
  }

  get wins(): number | null {
    return this.int('wins');
  }

  /** Regulation losses only. */
  get losses(): number | null {
    return this.int('losses');
  }

  /** Losses in overtime or a shootout. */
  get overtimeLosses(): number | null {
    return this.int('overtimeLosses');
  }

  get points(): number | null {
    return this.int('points');
  }

  /** Points earned over points available, 0-1. */
  get pointsPercentage(): number | null {
    return this.percentage('pointsPercentage');
  }

  get goalsFor(): number | null {
    return this.int('goalsFor');
  }

  get goalsAgainst(): number | null {
    return this.int('goalsAgainst');
  }

  /** Goal differential per game adjusted for schedule strength; can be negative. */
  get simpleRatingSystem(): number | null {
    return this.decimal('simpleRatingSystem');
  }

  get strengthOfSchedule(): number | null {
    return this.decimal('strengthOfSchedule');
  }

  get powerPlayGoals(): number | null {
    return this.int('powerPlayGoals');
  }

  get powerPlayOpportunities(): number | null {
    return this.int('powerPlayOpportunities');
  }

  // Published on a 0-100 scale, e.g. "22.14"
  get powerPlayPercentage(): number | null {
    return this.percentage('powerPlayPercentage', { scale: 100 });
  }

  get penaltyKillPercentage(): number | null {
    return this.percentage('penaltyKillPercentage', { scale: 100 });
  }

  get shortHandedGoals(): number | null {
    return this.int('shortHandedGoals');
  }

  get shortHandedGoalsAllowed(): number | null {
    return this.int('shortHandedGoalsAllowed');
  }

  get shotsOnGoal(): number | null {
    return this.int('shotsOnGoal');
  }

  get shootingPercentage(): number | null {
    return this.percentage('shootingPercentage', { scale: 100 });
  }

  get shotsAgainst(): number | null {
    return this.int('shotsAgainst');
  }

  /** Saves over shots against, 0-1. */
  get savePercentage(): number | null {
    return this.percentage('savePercentage');
  }

  get shutouts(): number | null {
    return this.int('shutouts');
  }
}

export class Teams extends TeamCollection<Team> {
  static async load(year?: number | string, options: LoadOptions = {}): Promise<Teams> {
    const season = resolveSeasonYear('nhl', year);
    const fetcher = options.fetchHtml ?? fetchHtml;
    const html = await fetcher(seasonPageUrl('nhl', season));
    return Teams.fromHtml(html, season);
  }

  static fromHtml(html: string, year: number): Teams {
    const rows = getStatsTable(loadDocument(html), TEAM_STATS_TABLE, { required: true });
    const merged = aggregateRows([rows], (row) => parseAbbreviation(row, TEAM_LINK));
    const teams = merged.map((entry) => new Team(entry.data, entry.rank, year));

    logger.info({ year, count: teams.length }, 'Parsed NHL teams');
    return new Teams(teams, year);
  }
}
