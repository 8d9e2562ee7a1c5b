/**
 * Unit Tests: Stats table location
 */

import { describe, it, expect } from 'vitest';
import { getStatsTable, loadDocument } from '../../../src/scraping/statsTable';
import { catchStatsError } from '../../helpers/errors';
import { THEAD_ROW, nbaSeasonPage, nbaTeamRow, td } from '../../fixtures/html';

const DET = nbaTeamRow('DET', 'Detroit Pistons', { g: '82' }, '1');
const BOS = nbaTeamRow('BOS', 'Boston Celtics', { g: '82' }, '2');

describe('getStatsTable', () => {
  it('returns body rows in order and skips repeated headers', () => {
    const rows = getStatsTable(nbaSeasonPage([DET, THEAD_ROW, BOS]), 'div#all_team-stats-base');
    expect(rows).toHaveLength(2);
    expect(rows[0]).toContain('/teams/DET/2018.html');
    expect(rows[1]).toContain('/teams/BOS/2018.html');
  });

  it('finds tables shipped inside HTML comments', () => {
    const opponent = `<tr>${td('team', '<a href="/teams/DET/2018.html">Detroit Pistons</a>')}${td('opp_pts', '8392')}</tr>`;
    const rows = getStatsTable(nbaSeasonPage([DET], [opponent]), 'div#all_opponent-stats-base');
    expect(rows).toHaveLength(1);
    expect(rows[0]).toContain('8392');
  });

  it('returns no rows for a missing optional table', () => {
    expect(getStatsTable(nbaSeasonPage([DET]), 'div#all_opponent-stats-base')).toEqual([]);
  });

  it('throws TABLE_NOT_FOUND for a missing required table', () => {
    const err = catchStatsError(() => getStatsTable('<html><body></body></html>', 'table#stats', { required: true }));
    expect(err.code).toBe('TABLE_NOT_FOUND');
    expect(err.message).toBe('Stats table table#stats not found');
  });

  it('accepts an already loaded document', () => {
    const doc = loadDocument(nbaSeasonPage([DET, BOS]));
    expect(getStatsTable(doc, 'div#all_team-stats-base')).toHaveLength(2);
  });
});
