/**
 * Unit Tests: Scheme-driven row parsing
 */

import { describe, it, expect } from 'vitest';
import {
  loadRow,
  parseAbbreviation,
  parseBoxscoreId,
  parseField,
  parseRecordFields,
  schemeFields,
} from '../../../src/scraping/rowParser';
import { nbaTeamRow, td } from '../../fixtures/html';

const SCHEME = {
  name: 'td[data-stat="team"] a',
  games: 'td[data-stat="g"]',
  points: 'td[data-stat="pts"]',
  oppPoints: 'td[data-stat="opp_pts"]',
} as const;

const ROW = nbaTeamRow('DET', 'Detroit Pistons', { g: '82', pts: ' 8,507 ' }, '18');

describe('parseField', () => {
  it('returns the trimmed text of the first match', () => {
    const $ = loadRow(ROW);
    expect(parseField(SCHEME, $, 'name')).toBe('Detroit Pistons');
    expect(parseField(SCHEME, $, 'points')).toBe('8,507');
  });

  it('returns null when the selector matches nothing', () => {
    expect(parseField(SCHEME, loadRow(ROW), 'oppPoints')).toBeNull();
  });

  it('keeps an empty cell as an empty string', () => {
    const $ = loadRow(`<tr>${td('g', '')}</tr>`);
    expect(parseField(SCHEME, $, 'games')).toBe('');
  });
});

describe('parseRecordFields', () => {
  it('resolves every scheme field', () => {
    const fields = parseRecordFields(SCHEME, ROW);
    expect([...fields.keys()]).toEqual(['name', 'games', 'points', 'oppPoints']);
    expect(fields.get('games')).toBe('82');
    expect(fields.get('oppPoints')).toBeNull();
  });

  it('reads the first table row when rows are merged', () => {
    const merged = ROW + `<tr>${td('g', '99')}${td('opp_pts', '8,392')}</tr>`;
    const fields = parseRecordFields(SCHEME, merged);
    expect(fields.get('games')).toBe('82');
    expect(fields.get('oppPoints')).toBe('8,392');
  });
});

describe('schemeFields', () => {
  it('lists scheme keys in declaration order', () => {
    expect(schemeFields(SCHEME)).toEqual(['name', 'games', 'points', 'oppPoints']);
  });
});

describe('parseAbbreviation', () => {
  it('extracts the uppercased code from a team link', () => {
    expect(parseAbbreviation(ROW)).toBe('DET');
    expect(parseAbbreviation('<tr><td><a href="/teams/nyr/2018.html">Rangers</a></td></tr>')).toBe('NYR');
  });

  it('honours a narrower selector', () => {
    const row = `<tr>${td('team', 'League Average')}${td('opp_name', '<a href="/teams/CHO/2018.html">Hornets</a>')}</tr>`;
    expect(parseAbbreviation(row, 'td[data-stat="team"] a')).toBeNull();
    expect(parseAbbreviation(row, 'td[data-stat="opp_name"] a')).toBe('CHO');
  });
});

describe('parseBoxscoreId', () => {
  it('extracts the id from a boxscore link', () => {
    const row = `<tr>${td('box_score_text', '<a href="/boxscores/201710180DET.html">Box Score</a>')}</tr>`;
    expect(parseBoxscoreId(row, 'td[data-stat="box_score_text"] a')).toBe('201710180DET');
  });

  it('returns null for links that are not boxscores', () => {
    const row = `<tr>${td('date_game', '<a href="/leagues/NHL_2018_games.html">2017-10-05</a>')}</tr>`;
    expect(parseBoxscoreId(row, 'td[data-stat="date_game"] a')).toBeNull();
    expect(parseBoxscoreId(`<tr>${td('date_game', '2017-10-05')}</tr>`, 'td[data-stat="date_game"] a')).toBeNull();
  });
});
