/**
 * NHL team schedule and per-game results.
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
  BOXSCORE_TEXT_LINK,
  OPPONENT_LINK,
  PLAYOFF_SCHEDULE_TABLE,
  SCHEDULE_DATE_FORMAT,
  SCHEDULE_SCHEME,
  SCHEDULE_TABLE,
  type ScheduleField,
} from './constants';

const logger = createLogger('nhlSchedule');

export class Game extends SchemeRecord<ScheduleField> {
  readonly year: number;
  readonly seasonType: SeasonType;
  /** e.g. "201710050NYR" */
  readonly boxscoreId: string | null;
  readonly opponentAbbr: string | null;

  constructor($: CheerioAPI, year: number, seasonType: SeasonType = 'Regular Season') {
    super(SCHEDULE_SCHEME, $);
    this.year = year;
    this.seasonType = seasonType;
    this.boxscoreId = parseBoxscoreId($, BOXSCORE_LINK) ?? parseBoxscoreId($, BOXSCORE_TEXT_LINK);
    this.opponentAbbr = parseAbbreviation($, OPPONENT_LINK);
  }

  static fromRow(row: string, year: number, seasonType: SeasonType = 'Regular Season'): Game {
    return new Game(loadRow(row), year, seasonType);
  }

  get game(): number | null {
    return this.int('game');
  }

  /** e.g. "2017-10-05" */
  get date(): string | null {
    return this.raw('date');
  }

  /** e.g. "7:00 PM"; empty for games without a listed start time. */
  get time(): string | null {
    return this.raw('time');
  }

  get datetime(): Date | null {
    return toDateTime('date', this.raw('date'), this.raw('time'), SCHEDULE_DATE_FORMAT);
  }

  get boxscoreUrl(): string | null {
    return this.boxscoreId ? boxscoreUrl('nhl', this.boxscoreId) : null;
  }

  get location(): GameLocation {
    return parseLocation(this.raw('location'));
  }

  get opponentName(): string | null {
    return this.raw('opponentName');
  }

  get goalsScored(): number | null {
    return this.int('goalsScored');
  }

  get goalsAllowed(): number | null {
    return this.int('goalsAllowed');
  }

  /**
   * A loss after overtime or a shootout is an Overtime Loss.
   */
  get result(): GameResult | null {
    return parseGameResult(this.raw('result'), this.overtime);
  }

  /** Overtime periods played, or SHOOTOUT. */
  get overtime(): number {
    return parseOvertime(this.raw('overtime'));
  }

  get wins(): number | null {
    return this.int('wins');
  }

  /** Regulation losses after this game. */
  get losses(): number | null {
    return this.int('losses');
  }

  get overtimeLosses(): number | null {
    return this.int('overtimeLosses');
  }

  get streak(): string | null {
    return this.raw('streak');
  }

  get shotsOnGoal(): number | null {
    return this.int('shotsOnGoal');
  }

  get penaltiesInMinutes(): number | null {
    return this.int('penaltiesInMinutes');
  }

  get powerPlayGoals(): number | null {
    return this.int('powerPlayGoals');
  }

  get powerPlayOpportunities(): number | null {
    return this.int('powerPlayOpportunities');
  }

  get shortHandedGoals(): number | null {
    return this.int('shortHandedGoals');
  }

  /** Listed as "18,006". */
  get attendance(): number | null {
    return this.int('attendance', { thousands: true });
  }

  /** "H:MM" as listed. */
  get lengthOfGame(): string | null {
    return this.raw('lengthOfGame');
  }

  get lengthOfGameMinutes(): number | null {
    return this.minutes('lengthOfGame');
  }
}

export class Schedule extends ScheduleCollection<Game> {
  static async load(abbreviation: string, year?: number | string, options: LoadOptions = {}): Promise<Schedule> {
    const season = resolveSeasonYear('nhl', year);
    const fetcher = options.fetchHtml ?? fetchHtml;
    const html = await fetcher(scheduleUrl('nhl', abbreviation, season));
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
    logger.info({ abbreviation, year, games: games.length, playoffGames: playoffs.length }, 'Parsed NHL schedule');
    return new Schedule(games, abbreviation, year);
  }
}
