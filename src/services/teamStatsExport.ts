import { createObjectCsvStringifier } from 'csv-writer';
import type { CompleteResult, Game } from '../types/tournament';
import { roundTo2 } from './teamMath';
import { TEAMS } from './teams';

export type TeamStatsExportRow = {
  game: string;
  team: string;
  average: number;
  total: number;
  differential: number | '';
};

export function buildTeamStatsRows(games: Game[], result: CompleteResult): TeamStatsExportRow[] {
  const rows: TeamStatsExportRow[] = [];

  for (const game of games) {
    const diffIndex = result.differentialGameKeys.indexOf(game.key);

    TEAMS.forEach((team, teamIndex) => {
      const differential = diffIndex === -1 ? '' : result.differentials[teamIndex][diffIndex];
      rows.push({
        game: game.name,
        team: team.name,
        average: result.perGameAverages[game.key][teamIndex],
        total: result.teamTotals[game.key][teamIndex],
        differential: typeof differential === 'number' ? roundTo2(differential) : differential,
      });
    });
  }

  return rows;
}

export function exportTeamStatsCsv(games: Game[], result: CompleteResult): string {
  const csvStringifier = createObjectCsvStringifier({
    header: [
      { id: 'game', title: 'game' },
      { id: 'team', title: 'team' },
      { id: 'average', title: 'average' },
      { id: 'total', title: 'total' },
      { id: 'differential', title: 'differential' },
    ],
  });

  const rows = buildTeamStatsRows(games, result);
  return (csvStringifier.getHeaderString() ?? '') + csvStringifier.stringifyRecords(rows);
}
