import { BarChart, Bar, Cell, XAxis, YAxis } from 'recharts';
import type { Game } from '../../types/tournament';
import { TEAMS } from '../../services/teams';

interface GameAveragesGridProps {
  games: Game[];
  perGameAverages: Record<string, number[]>;
  width?: number;
  height?: number;
}

export function averagesDomain(values: number[]): [number, number] {
  if (!values.some(value => value !== 0)) return [-1, 1];

  const low = Math.min(...values) * 0.9;
  const high = Math.max(...values) * 1.1;
  return low === high ? [-1, 1] : [low, high];
}

export function GameAveragesGrid({ games, perGameAverages, width = 240, height = 110 }: GameAveragesGridProps) {
  return (
    <div className="chart-grid chart-grid--games">
      {games.map(game => {
        const values = perGameAverages[game.key] ?? TEAMS.map(() => 0);
        const data = TEAMS.map((team, index) => ({ team: team.name, average: values[index] ?? 0 }));

        return (
          <figure key={game.key} className="chart-tile" data-game={game.key}>
            <figcaption className="chart-tile__title">{game.name}</figcaption>
            <BarChart width={width} height={height} data={data} margin={{ top: 4, right: 4, bottom: 4, left: 4 }}>
              <XAxis dataKey="team" hide />
              <YAxis hide domain={averagesDomain(values)} allowDataOverflow />
              <Bar dataKey="average" isAnimationActive={false}>
                {TEAMS.map(team => (
                  <Cell key={team.name} fill={team.color} />
                ))}
              </Bar>
            </BarChart>
          </figure>
        );
      })}
    </div>
  );
}
