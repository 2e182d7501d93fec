import { BarChart, Bar, CartesianGrid, ReferenceLine, XAxis, YAxis } from 'recharts';
import type { Game } from '../../types/tournament';
import { TEAMS } from '../../services/teams';

interface DifferentialsGridProps {
  games: Game[];
  differentialGameKeys: string[];
  differentials: number[][];
  width?: number;
  height?: number;
}

export function differentialsDomain(diffs: number[]): [number, number] {
  const low = Math.min(...diffs, 0) * 1.15;
  const high = Math.max(...diffs, 0) * 1.15;
  return low === high ? [-1, 1] : [low, high];
}

export function DifferentialsGrid({ games, differentialGameKeys, differentials, width = 380, height = 200 }: DifferentialsGridProps) {
  const labels = differentialGameKeys.map(key => games.find(game => game.key === key)?.shortLabel ?? key);

  return (
    <div className="chart-grid chart-grid--teams">
      {TEAMS.map((team, teamIndex) => {
        const diffs = (differentials[teamIndex] ?? []).slice(0, labels.length);
        const data = labels.map((label, index) => ({ label, differential: diffs[index] ?? 0 }));

        return (
          <figure key={team.name} className="chart-tile" data-team={team.name}>
            <BarChart width={width} height={height} data={data} margin={{ top: 8, right: 8, bottom: 24, left: 0 }}>
              <CartesianGrid vertical={false} strokeDasharray="1 3" strokeOpacity={0.3} />
              <XAxis dataKey="label" interval={0} angle={-40} textAnchor="end" tick={{ fontSize: 10 }} />
              <YAxis domain={differentialsDomain(diffs)} tick={{ fontSize: 10 }} allowDataOverflow />
              <ReferenceLine y={0} stroke="#444444" strokeOpacity={0.6} />
              <Bar dataKey="differential" fill={team.color} isAnimationActive={false} />
            </BarChart>
          </figure>
        );
      })}
    </div>
  );
}
