// basketball-reference.com selectors

export const TEAM_STATS_TABLE = 'div#all_team-stats-base';
export const OPPONENT_STATS_TABLE = 'div#all_opponent-stats-base';

export const TEAM_LINK = 'td[data-stat="team"] a';

export const PARSING_SCHEME = {
  name: 'td[data-stat="team"] a',
  gamesPlayed: 'td[data-stat="g"]',
  minutesPlayed: 'td[data-stat="mp"]',
  fieldGoals: 'td[data-stat="fg"]',
  fieldGoalAttempts: 'td[data-stat="fga"]',
  fieldGoalPercentage: 'td[data-stat="fg_pct"]',
  threePointFieldGoals: 'td[data-stat="fg3"]',
  threePointFieldGoalAttempts: 'td[data-stat="fg3a"]',
  threePointFieldGoalPercentage: 'td[data-stat="fg3_pct"]',
  twoPointFieldGoals: 'td[data-stat="fg2"]',
  twoPointFieldGoalAttempts: 'td[data-stat="fg2a"]',
  twoPointFieldGoalPercentage: 'td[data-stat="fg2_pct"]',
  freeThrows: 'td[data-stat="ft"]',
  freeThrowAttempts: 'td[data-stat="fta"]',
  freeThrowPercentage: 'td[data-stat="ft_pct"]',
  offensiveRebounds: 'td[data-stat="orb"]',
  defensiveRebounds: 'td[data-stat="drb"]',
  totalRebounds: 'td[data-stat="trb"]',
  assists: 'td[data-stat="ast"]',
  steals: 'td[data-stat="stl"]',
  blocks: 'td[data-stat="blk"]',
  turnovers: 'td[data-stat="tov"]',
  personalFouls: 'td[data-stat="pf"]',
  points: 'td[data-stat="pts"]',
  oppFieldGoals: 'td[data-stat="opp_fg"]',
  oppFieldGoalAttempts: 'td[data-stat="opp_fga"]',
  oppFieldGoalPercentage: 'td[data-stat="opp_fg_pct"]',
  oppThreePointFieldGoals: 'td[data-stat="opp_fg3"]',
  oppThreePointFieldGoalAttempts: 'td[data-stat="opp_fg3a"]',
  oppThreePointFieldGoalPercentage: 'td[data-stat="opp_fg3_pct"]',
  oppTwoPointFieldGoals: 'td[data-stat="opp_fg2"]',
  oppTwoPointFieldGoalAttempts: 'td[data-stat="opp_fg2a"]',
  oppTwoPointFieldGoalPercentage: 'td[data-stat="opp_fg2_pct"]',
  oppFreeThrows: 'td[data-stat="opp_ft"]',
  oppFreeThrowAttempts: 'td[data-stat="opp_fta"]',
  oppFreeThrowPercentage: 'td[data-stat="opp_ft_pct"]',
  oppOffensiveRebounds: 'td[data-stat="opp_orb"]',
  oppDefensiveRebounds: 'td[data-stat="opp_drb"]',
  oppTotalRebounds: 'td[data-stat="opp_trb"]',
  oppAssists: 'td[data-stat="opp_ast"]',
  oppSteals: 'td[data-stat="opp_stl"]',
  oppBlocks: 'td[data-stat="opp_blk"]',
  oppTurnovers: 'td[data-stat="opp_tov"]',
  oppPersonalFouls: 'td[data-stat="opp_pf"]',
  oppPoints: 'td[data-stat="opp_pts"]',
} as const;

export type TeamField = keyof typeof PARSING_SCHEME;

export const SCHEDULE_TABLE = 'table#games';
export const PLAYOFF_SCHEDULE_TABLE = 'table#games_playoffs';

export const SCHEDULE_SCHEME = {
  game: 'th[data-stat="g"]',
  date: 'td[data-stat="date_game"]',
  time: 'td[data-stat="game_start_time"]',
  location: 'td[data-stat="game_location"]',
  opponentName: 'td[data-stat="opp_name"]',
  result: 'td[data-stat="game_result"]',
  overtimes: 'td[data-stat="overtimes"]',
  pointsScored: 'td[data-stat="pts"]',
  pointsAllowed: 'td[data-stat="opp_pts"]',
  wins: 'td[data-stat="wins"]',
  losses: 'td[data-stat="losses"]',
  streak: 'td[data-stat="game_streak"]',
} as const;

export type ScheduleField = keyof typeof SCHEDULE_SCHEME;

// Link cells the identifiers are pulled from
export const BOXSCORE_LINK = 'td[data-stat="box_score_text"] a';
export const OPPONENT_LINK = 'td[data-stat="opp_name"] a';

/** e.g. "Tue, Oct 17, 2017" */
export const SCHEDULE_DATE_FORMAT = 'EEE, MMM d, yyyy';
