import { recompute } from '../../src/services/recomputeEngine';
import { ResolutionStore } from '../../src/services/resolutionStore';
import { StatsTable } from '../../src/services/statsTable';
import type { CompleteResult, Game, RecomputeResult } from '../../src/types/tournament';
import { buildRoster, buildStats, gameX, gameY, scenarioRoster } from '../fixtures/tournamentData';

function expectComplete(result: RecomputeResult): CompleteResult {
  if (result.status !== 'complete') {
    throw new Error(`expected a complete result, got missing ${result.missing.join(', ')}`);
  }
  return result;
}

describe('recompute', () => {
  let resolutions: ResolutionStore;

  beforeEach(() => {
    resolutions = new ResolutionStore();
  });

  describe('single game scenario', () => {
    const games = [gameX];
    const stats = buildStats(games);

    test('computes per-team averages', () => {
      const result = expectComplete(recompute({ games, stats, roster: scenarioRoster, resolutions }));

      expect(result.perGameAverages).toEqual({ x: [15, 0, 0, 5] });
      expect(result.teamTotals).toEqual({ x: [30, 0, 0, 5] });
    });

    test('computes differentials against the field mean', () => {
      const result = expectComplete(recompute({ games, stats, roster: scenarioRoster, resolutions }));

      expect(result.differentialGameKeys).toEqual(['x']);
      expect(result.differentials).toEqual([[21.25], [-8.75], [-8.75], [-3.75]]);
    });

    test('differentials for a game sum to zero', () => {
      const result = expectComplete(recompute({ games, stats, roster: scenarioRoster, resolutions }));
      const sum = result.differentials.reduce((acc, diffs) => acc + diffs[0], 0);

      expect(sum).toBeCloseTo(0, 10);
    });

    test('reports a player with no score and no resolution', () => {
      const roster = buildRoster({ ...scenarioRoster, Blue: ['D', 'E'] });
      const result = recompute({ games, stats, roster, resolutions });

      expect(result).toEqual({ status: 'unresolved', missing: ['E'], missingIn: { E: ['x'] } });
    });

    test('reports every missing player, sorted', () => {
      const roster = buildRoster({ Red: ['Zed', 'A'], Green: ['Eve'], Blue: ['Zed'] });
      const result = recompute({ games, stats, roster, resolutions });

      expect(result.status).toBe('unresolved');
      if (result.status === 'unresolved') {
        expect(result.missing).toEqual(['Eve', 'Zed']);
      }
    });

    test('an ignored player drops out of missing detection and the average', () => {
      const roster = buildRoster({ ...scenarioRoster, Blue: ['D', 'E'] });
      resolutions.setIgnored('E');

      const result = expectComplete(recompute({ games, stats, roster, resolutions }));

      expect(result.perGameAverages.x).toEqual([15, 0, 0, 5]);
      expect(result.differentials).toEqual([[21.25], [-8.75], [-8.75], [-3.75]]);
    });

    test('ignored players do not dilute the denominator', () => {
      const roster = buildRoster({ Red: ['A', 'B', 'E'] });
      resolutions.setIgnored('E');

      const result = expectComplete(recompute({ games, stats, roster, resolutions }));

      expect(result.perGameAverages.x[0]).toBe(15);
    });

    test('a zero score counts as a participant', () => {
      const roster = buildRoster({ Red: ['A', 'C'] });

      const result = expectComplete(recompute({ games, stats, roster, resolutions }));

      expect(result.perGameAverages.x[0]).toBe(5);
    });

    test('an empty team averages 0', () => {
      const result = expectComplete(recompute({ games, stats, roster: buildRoster({}), resolutions }));

      expect(result.perGameAverages.x).toEqual([0, 0, 0, 0]);
      expect(result.differentials).toEqual([[0], [0], [0], [0]]);
    });

    test('trims names and skips blanks', () => {
      const roster = buildRoster({ Red: [' A ', '', '  '], Blue: ['D'] });

      const result = expectComplete(recompute({ games, stats, roster, resolutions }));

      expect(result.perGameAverages.x).toEqual([10, 0, 0, 5]);
    });

    test('rounds averages to two decimals', () => {
      const table = new StatsTable(games, { x: { P: 10, Q: 0, R: 0 } });
      const roster = buildRoster({ Red: ['P', 'Q', 'R'] });

      const result = expectComplete(recompute({ games, stats: table, roster, resolutions }));

      expect(result.perGameAverages.x[0]).toBe(3.33);
    });

    test('is idempotent and leaves resolutions untouched', () => {
      resolutions.setSubstitution('E', 'A');
      const roster = buildRoster({ ...scenarioRoster, Green: ['E'] });
      const before = resolutions.snapshot();

      const first = recompute({ games, stats, roster, resolutions });
      const second = recompute({ games, stats, roster, resolutions });

      expect(second).toEqual(first);
      expect(resolutions.snapshot()).toEqual(before);
    });
  });

  describe('per-game substitution', () => {
    const games = [gameX, gameY];
    const stats = buildStats(games);
    const roster = buildRoster({ Red: ['B'], Yellow: ['C'], Blue: ['D', 'E'] });

    test('a substitute without a score in one game leaves the player missing there', () => {
      resolutions.setSubstitution('E', 'A');

      const result = recompute({ games, stats, roster, resolutions });

      expect(result).toEqual({ status: 'unresolved', missing: ['E'], missingIn: { E: ['y'] } });
    });

    test('the same player can be missing in the other game with a different substitute', () => {
      resolutions.setSubstitution('E', 'F');

      const result = recompute({ games, stats, roster, resolutions });

      expect(result).toEqual({ status: 'unresolved', missing: ['E'], missingIn: { E: ['x'] } });
    });

    test('a substitute scored in every game resolves the player', () => {
      resolutions.setSubstitution('E', 'B');

      const result = expectComplete(recompute({ games, stats, roster, resolutions }));

      expect(result.perGameAverages).toEqual({ x: [20, 0, 0, 12.5], y: [4, 6, 0, 3] });
      expect(result.differentialGameKeys).toEqual(['x', 'y']);
      expect(result.differentials).toEqual([
        [8.75, 0],
        [-11.25, 2],
        [-11.25, -4],
        [13.75, 2],
      ]);
    });

    test('lists every game a player is missing from', () => {
      const result = recompute({ games, stats, roster: buildRoster({ Red: ['Nobody'] }), resolutions });

      expect(result).toEqual({ status: 'unresolved', missing: ['Nobody'], missingIn: { Nobody: ['x', 'y'] } });
    });
  });

  test('returns complete whenever every player has a direct score in every game', () => {
    const games = [gameX, gameY];
    const stats = buildStats(games, {
      x: { B: 20, C: 0, D: 5 },
      y: { B: 4, C: 6, D: 2 },
    });
    const rosters = [
      buildRoster({ Red: ['B'] }),
      buildRoster({ Red: ['B', 'C'], Blue: ['D'] }),
      buildRoster({ Yellow: ['D', 'D'], Green: ['C'], Blue: ['B'] }),
    ];

    for (const roster of rosters) {
      expect(recompute({ games, stats, roster, resolutions }).status).toBe('complete');
    }
  });

  describe('game roles', () => {
    const overall: Game = { key: 'overall', name: 'Overall', shortLabel: 'All', csv: 'overall.csv', role: { kind: 'overall' } };
    const x: Game = { ...gameX, role: { kind: 'regular', category: 'non_pvp' } };
    const y: Game = { ...gameY, role: { kind: 'regular', category: 'non_pvp' } };
    const nonPvp: Game = {
      key: 'np',
      name: 'Non-PvP',
      shortLabel: 'nP',
      csv: 'np.csv',
      role: { kind: 'aggregate', of: 'non_pvp', perGameAverage: true, memberCount: 2 },
    };
    const games = [overall, x, y, nonPvp];
    const stats = new StatsTable(games, {
      overall: { A: 100, B: 50 },
      x: { A: 10, B: 20 },
      y: { A: 6, B: 8 },
      np: { A: 30, B: 14 },
    });
    const roster = buildRoster({ Red: ['A', 'B'] });

    test('the overall game is averaged but left out of differentials', () => {
      const result = expectComplete(recompute({ games, stats, roster, resolutions }));

      expect(result.perGameAverages.overall).toEqual([75, 0, 0, 0]);
      expect(result.differentialGameKeys).toEqual(['x', 'y', 'np']);
      expect(result.differentials[0]).toEqual([22.5, 10.5, 33]);
      expect(result.differentials[1]).toEqual([-7.5, -3.5, -11]);
    });

    test('a per-game aggregate divides by its member game count', () => {
      const result = expectComplete(recompute({ games, stats, roster, resolutions }));

      expect(result.perGameAverages.np).toEqual([11, 0, 0, 0]);
      expect(result.perGameAverages.x).toEqual([15, 0, 0, 0]);
      expect(result.perGameAverages.y).toEqual([7, 0, 0, 0]);
    });
  });
});
