export { Team, Teams } from './teams';
export { Game, Schedule } from './schedule';
export * as constants from './constants';
