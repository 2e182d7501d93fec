import type { CompleteResult, Game, RecomputeResult, Roster, TeamTally } from '../types/tournament';
import type { ResolutionStore } from './resolutionStore';
import type { StatsTable } from './statsTable';
import { averagingFactor, differentialGames } from './games';
import { average, differential, fieldAverage } from './teamMath';
import { TEAM_NAMES } from './teams';

export interface RecomputeInput {
  games: Game[];
  stats: StatsTable;
  roster: Roster;
  resolutions: ResolutionStore;
}

type PlayerLookup = { kind: 'skip' } | { kind: 'scored'; score: number } | { kind: 'missing' };

function lookupPlayer(stats: StatsTable, resolutions: ResolutionStore, gameKey: string, player: string): PlayerLookup {
  if (resolutions.isIgnored(player)) return { kind: 'skip' };

  // A substitute is checked game by game; no coverage here still needs an answer.
  const scoredAs = resolutions.substitutionFor(player) ?? player;
  const score = stats.score(gameKey, scoredAs);
  return score === undefined ? { kind: 'missing' } : { kind: 'scored', score };
}

/** Sums scores per team for one game, recording any player left without a score. */
export function tallyGame(
  stats: StatsTable,
  resolutions: ResolutionStore,
  roster: Roster,
  gameKey: string,
  onMissing: (player: string) => void
): TeamTally[] {
  return TEAM_NAMES.map(teamName => {
    const tally: TeamTally = { total: 0, count: 0 };

    for (const raw of roster[teamName]) {
      const player = raw.trim();
      if (!player) continue;

      const lookup = lookupPlayer(stats, resolutions, gameKey, player);
      if (lookup.kind === 'scored') {
        tally.total += lookup.score;
        tally.count += 1;
      } else if (lookup.kind === 'missing') {
        onMissing(player);
      }
    }

    return tally;
  });
}

/**
 * Maps a roster onto per-game team averages and per-team differentials
 * against the field. Any player still lacking a score in any game yields an
 * `unresolved` result naming every such player instead; the caller resolves
 * them and calls again. Reads `resolutions` but never writes it.
 */
export function recompute({ games, stats, roster, resolutions }: RecomputeInput): RecomputeResult {
  const missingIn = new Map<string, string[]>();
  const tallies = new Map<string, TeamTally[]>();

  for (const game of games) {
    const gameTallies = tallyGame(stats, resolutions, roster, game.key, player => {
      const gamesMissing = missingIn.get(player) ?? [];
      if (!gamesMissing.includes(game.key)) gamesMissing.push(game.key);
      missingIn.set(player, gamesMissing);
    });
    tallies.set(game.key, gameTallies);
  }

  if (missingIn.size > 0) {
    const missing = [...missingIn.keys()].sort();
    return {
      status: 'unresolved',
      missing,
      missingIn: Object.fromEntries(missing.map(player => [player, missingIn.get(player) ?? []])),
    };
  }

  return summarize(games, tallies);
}

function summarize(games: Game[], tallies: Map<string, TeamTally[]>): CompleteResult {
  const perGameAverages: Record<string, number[]> = {};
  const teamTotals: Record<string, number[]> = {};

  for (const game of games) {
    const gameTallies = tallies.get(game.key) ?? [];
    const factor = averagingFactor(game);
    perGameAverages[game.key] = gameTallies.map(({ total, count }) => average(total, count * factor));
    teamTotals[game.key] = gameTallies.map(({ total }) => total);
  }

  const diffGames = differentialGames(games);
  const differentials: number[][] = TEAM_NAMES.map(() => []);

  for (const game of diffGames) {
    const totals = teamTotals[game.key];
    const field = fieldAverage(totals);
    totals.forEach((total, teamIndex) => {
      differentials[teamIndex].push(differential(total, field));
    });
  }

  return {
    status: 'complete',
    perGameAverages,
    teamTotals,
    differentials,
    differentialGameKeys: diffGames.map(game => game.key),
  };
}
