import { renderToStaticMarkup } from 'react-dom/server';
import type { CompleteResult, Game } from '../types/tournament';
import { GameAveragesGrid } from '../components/charts/GameAveragesGrid';
import { DifferentialsGrid } from '../components/charts/DifferentialsGrid';

export interface RenderedCharts {
  perGame: string;
  differentials: string;
}

export function renderGameAveragesGrid(games: Game[], result: CompleteResult): string {
  return renderToStaticMarkup(<GameAveragesGrid games={games} perGameAverages={result.perGameAverages} />);
}

export function renderDifferentialsGrid(games: Game[], result: CompleteResult): string {
  return renderToStaticMarkup(
    <DifferentialsGrid
      games={games}
      differentialGameKeys={result.differentialGameKeys}
      differentials={result.differentials}
    />
  );
}

export function renderCharts(games: Game[], result: CompleteResult): RenderedCharts {
  return {
    perGame: renderGameAveragesGrid(games, result),
    differentials: renderDifferentialsGrid(games, result),
  };
}
