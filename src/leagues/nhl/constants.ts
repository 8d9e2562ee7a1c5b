// hockey-reference.com selectors

export const TEAM_STATS_TABLE = 'table#stats';

export const TEAM_LINK = 'td[data-stat="team_name"] a';

export const PARSING_SCHEME = {
  name: 'td[data-stat="team_name"] a',
  averageAge: 'td[data-stat="avg_age"]',
  gamesPlayed: 'td[data-stat="games"]',
  wins: 'td[data-stat="wins"]',
  losses: 'td[data-stat="losses"]',
  overtimeLosses: 'td[data-stat="losses_ot"]',
  points: 'td[data-stat="points"]',
  pointsPercentage: 'td[data-stat="points_pct"]',
  goalsFor: 'td[data-stat="goals"]',
  goalsAgainst: 'td[data-stat="opp_goals"]',
  simpleRatingSystem: 'td[data-stat="srs"]',
  strengthOfSchedule: 'td[data-stat="sos"]',
  powerPlayGoals: 'td[data-stat="goals_pp"]',
  powerPlayOpportunities: 'td[data-stat="chances_pp"]',
  powerPlayPercentage: 'td[data-stat="power_play_pct"]',
  penaltyKillPercentage: 'td[data-stat="pen_kill_pct"]',
  shortHandedGoals: 'td[data-stat="goals_sh"]',
  shortHandedGoalsAllowed: 'td[data-stat="opp_goals_sh"]',
  shotsOnGoal: 'td[data-stat="shots"]',
  shootingPercentage: 'td[data-stat="shot_pct"]',
  shotsAgainst: 'td[data-stat="opp_shots"]',
  savePercentage: 'td[data-stat="save_pct"]',
  shutouts: 'td[data-stat="shutouts"]',
} as const;

export type TeamField = keyof typeof PARSING_SCHEME;

export const SCHEDULE_TABLE = 'table#games';
export const PLAYOFF_SCHEDULE_TABLE = 'table#games_playoffs';

export const SCHEDULE_SCHEME = {
  game: 'th[data-stat="games"]',
  date: 'td[data-stat="date_game"]',
  time: 'td[data-stat="time_game"]',
  location: 'td[data-stat="game_location"]',
  opponentName: 'td[data-stat="opp_name"]',
  goalsScored: 'td[data-stat="goals"]',
  goalsAllowed: 'td[data-stat="opp_goals"]',
  result: 'td[data-stat="game_outcome"]',
  overtime: 'td[data-stat="overtimes"]',
  wins: 'td[data-stat="wins"]',
  losses: 'td[data-stat="losses"]',
  overtimeLosses: 'td[data-stat="losses_ot"]',
  streak: 'td[data-stat="game_streak"]',
  shotsOnGoal: 'td[data-stat="shots"]',
  penaltiesInMinutes: 'td[data-stat="pen_min"]',
  powerPlayGoals: 'td[data-stat="goals_pp"]',
  powerPlayOpportunities: 'td[data-stat="chances_pp"]',
  shortHandedGoals: 'td[data-stat="goals_sh"]',
  attendance: 'td[data-stat="attendance"]',
  lengthOfGame: 'td[data-stat="game_duration"]',
} as const;

export type ScheduleField = keyof typeof SCHEDULE_SCHEME;

// Current pages link the boxscore from the game date; older ones from a separate cell
export const BOXSCORE_LINK = 'td[data-stat="date_game"] a';
export const BOXSCORE_TEXT_LINK = 'td[data-stat="box_score_text"] a';
export const OPPONENT_LINK = 'td[data-stat="opp_name"] a';

/** e.g. "2017-10-05" */
export const SCHEDULE_DATE_FORMAT = 'yyyy-MM-dd';
