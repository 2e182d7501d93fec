import type { AppContext } from '../context';
import type { RecomputeResult } from '../types/tournament';
import { recompute } from './recomputeEngine';
import { normalizeRoster } from './teams';

export interface RecalcCommand {
  sessionId: string;
  teams: Record<string, unknown>;
  resolutions?: Record<string, string>;
}

/**
 * Folds any newly submitted resolutions into the session's store, then
 * recomputes the roster against it. Resolutions accumulate across calls.
 */
export function recalculate(ctx: AppContext, command: RecalcCommand): RecomputeResult {
  ctx.sessions.prune();
  const store = ctx.sessions.get(command.sessionId);

  if (command.resolutions) {
    store.resolveAll(command.resolutions);
  }

  return recompute({
    games: ctx.games,
    stats: ctx.stats,
    roster: normalizeRoster(command.teams),
    resolutions: store,
  });
}
