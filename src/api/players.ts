import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler, ApiError } from './middleware/errorHandlers';
import type { AppContext } from '../context';
import type { PlayerScoresResponse, PlayersResponse } from '../../shared/types/api';

const playerNameSchema = z.object({
  name: z.string().trim().min(1),
});

export function createPlayersRouter(ctx: AppContext): Router {
  const playersRouter = Router();

  // GET /api/players - Every player with a score in at least one game
  playersRouter.get('/', asyncHandler(async (_req, res) => {
    const body: PlayersResponse = {
      players: ctx.stats.knownPlayers(),
      lastUpdated: ctx.statsLastUpdated,
    };
    res.status(200).json(body);
  }));

  // GET /api/players/:name/scores - One player's score in each game (case-insensitive name)
  playersRouter.get('/:name/scores', asyncHandler(async (req, res) => {
    const { name } = playerNameSchema.parse(req.params);
    const scores = ctx.stats.playerProfile(name);

    if (scores.length === 0) {
      throw new ApiError(`No stats found for player "${name}"`, 404, 'PLAYER_NOT_FOUND');
    }

    const body: PlayerScoresResponse = { player: name, scores };
    res.status(200).json(body);
  }));

  return playersRouter;
}
