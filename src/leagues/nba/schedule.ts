/**
 * NBA team schedule: one Game per row of the team's season game log.
 */

import type { CheerioAPI } from 'cheerio';
import { parseGameResult, parseLocation, parseOvertime, toDateTime } from '../../scraping/coercion';
import { ScheduleCollection } from '../../scraping/recordCollection';
import { loadRow, parseAbbreviation, parseBoxscoreId } from '../../scraping/rowParser';
import { SchemeRecord } from '../../scraping/schemeRecord';
import { getStatsTable, loadDocument } from '../../scraping/statsTable';
import type { GameLocation, GameResult, LoadOptions, SeasonType } from '../../types';
import { boxscoreUrl, fetchHtml, scheduleUrl } from '../../utils/http/referenceClient';
import { createLogger } from '../../utils/logger';
import { resolveSeasonYear } from '../../utils/season';
import {
  BOXSCORE_LINK,
  OPPONENT_LINK,
  PLAYOFF_SCHEDULE_TABLE,
  SCHEDULE_DATE_FORMAT,
  SCHEDULE_SCHEME,
  SCHEDULE_TABLE,
  type ScheduleField,
} from './constants';

const logger = createLogger('nbaSchedule');

export class Game extends SchemeRecord<ScheduleField> {
  readonly year: number;
  readonly seasonType: SeasonType;
  /** Key of the game's boxscore page, e.g. "201710180DET". */
  readonly boxscoreId: string | null;
  readonly opponentAbbr: string | null;

  constructor($: CheerioAPI, year: number, seasonType: SeasonType = 'Regular Season') {
    super(SCHEDULE_SCHEME, $);
    this.year = year;
    this.seasonType = seasonType;
    this.boxscoreId = parseBoxscoreId($, BOXSCORE_LINK);
    this.opponentAbbr = parseAbbreviation($, OPPONENT_LINK);
  }

  static fromRow(row: string, year: number, seasonType: SeasonType = 'Regular Season'): Game {
    return new Game(loadRow(row), year, seasonType);
  }

  /** 1 for the season opener. */
  get game(): number | null {
    return this.int('game');
  }

  /** Date as listed, such as "Tue, Oct 17, 2017". */
  get date(): string | null {
    return this.raw('date');
  }

  /** Tip-off time as listed, such as "8:00p". */
  get time(): string | null {
    return this.raw('time');
  }

  get datetime(): Date | null {
    return toDateTime('date', this.raw('date'), this.raw('time'), SCHEDULE_DATE_FORMAT);
  }

  get boxscoreUrl(): string | null {
    return this.boxscoreId ? boxscoreUrl('nba', this.boxscoreId) : null;
  }

  get location(): GameLocation {
    return parseLocation(this.raw('location'));
  }

  get opponentName(): string | null {
    return this.raw('opponentName');
  }

  get pointsScored(): number | null {
    return this.int('pointsScored');
  }

  get pointsAllowed(): number | null {
    return this.int('pointsAllowed');
  }

  /** Basketball has no overtime-loss column; every loss is a Loss. */
  get result(): GameResult | null {
    return parseGameResult(this.raw('result'));
  }

  get overtimes(): number {
    return parseOvertime(this.raw('overtimes'));
  }

  /** Season wins after this game. */
  get wins(): number | null {
    return this.int('wins');
  }

  get losses(): number | null {
    return this.int('losses');
  }

  /** e.g. "W 3" for a three-game winning streak. */
  get streak(): string | null {
    return this.raw('streak');
  }
}

/**
 * A team's complete schedule for a season.
 */
export class Schedule extends ScheduleCollection<Game> {
  static async load(abbreviation: string, year?: number | string, options: LoadOptions = {}): Promise<Schedule> {
    const season = resolveSeasonYear('nba', year);
    const fetcher = options.fetchHtml ?? fetchHtml;
    const html = await fetcher(scheduleUrl('nba', abbreviation, season));
    return Schedule.fromHtml(html, abbreviation, season);
  }

  static fromHtml(html: string, abbreviation: string, year: number): Schedule {
    const doc = loadDocument(html);
    const regular = getStatsTable(doc, SCHEDULE_TABLE, { required: true });
    const playoffs = getStatsTable(doc, PLAYOFF_SCHEDULE_TABLE);

    const games = [
      ...regular.map((row) => Game.fromRow(row, year, 'Regular Season')),
      ...playoffs.map((row) => Game.fromRow(row, year, 'Playoffs')),
    ];
    logger.info({ abbreviation, year, games: games.length, playoffGames: playoffs.length }, 'Parsed NBA schedule');
    return new Schedule(games, abbreviation, year);
  }
}
