import { buildTeamStatsRows } from '../../src/services/teamStatsExport';
import type { CompleteResult, Game } from '../../src/types/tournament';
import { gameX } from '../fixtures/tournamentData';

const overall: Game = { key: 'overall', name: 'Overall', shortLabel: 'All', csv: 'overall.csv', role: { kind: 'overall' } };

// Totals [0.5, 0.5, 0.5, 0] put the field mean at 0.375, so every differential lands on a half.
const result: CompleteResult = {
  status: 'complete',
  perGameAverages: { overall: [10, 8, 6, 4], x: [0.5, 0.5, 0.5, 0] },
  teamTotals: { overall: [20, 8, 12, 4], x: [0.5, 0.5, 0.5, 0] },
  differentials: [[0.125], [0.125], [0.125], [-0.375]],
  differentialGameKeys: ['x'],
};

describe('buildTeamStatsRows', () => {
  const rows = buildTeamStatsRows([overall, gameX], result);

  test('writes one row per game and team in catalogue order', () => {
    expect(rows.map(row => `${row.game}/${row.team}`)).toEqual([
      'Overall/Red',
      'Overall/Yellow',
      'Overall/Green',
      'Overall/Blue',
      'Game X/Red',
      'Game X/Yellow',
      'Game X/Green',
      'Game X/Blue',
    ]);
  });

  test('leaves the differential blank for the overall game', () => {
    expect(rows[0]).toEqual({ game: 'Overall', team: 'Red', average: 10, total: 20, differential: '' });
  });

  test('rounds differentials the same way as averages', () => {
    expect(rows.slice(4).map(row => row.differential)).toEqual([0.12, 0.12, 0.12, -0.38]);
  });
});
