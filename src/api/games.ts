import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler, ApiError } from './middleware/errorHandlers';
import { findGame } from '../services/games';
import type { AppContext } from '../context';
import type { GameSummary, LeaderboardResponse } from '../../shared/types/api';

const leaderboardParamsSchema = z.object({
  gameKey: z.string().min(1),
});

export function createGamesRouter(ctx: AppContext): Router {
  const gamesRouter = Router();

  const leaderboardQuerySchema = z.object({
    top: z.coerce.number().int().min(1).max(100).default(ctx.config.leaderboardDefaultSize),
  });

  // GET /api/games - Enabled games in display order
  gamesRouter.get('/', asyncHandler(async (_req, res) => {
    const games: GameSummary[] = ctx.games.map(game => ({
      key: game.key,
      name: game.name,
      shortLabel: game.shortLabel,
      role: game.role.kind,
    }));
    res.status(200).json({ games });
  }));

  // GET /api/games/:gameKey/leaderboard?top=N - Highest scorers in one game
  gamesRouter.get('/:gameKey/leaderboard', asyncHandler(async (req, res) => {
    const { gameKey } = leaderboardParamsSchema.parse(req.params);
    const { top } = leaderboardQuerySchema.parse(req.query);

    const game = findGame(ctx.games, gameKey);
    if (!game) {
      throw new ApiError(`Unknown game "${gameKey}"`, 404, 'GAME_NOT_FOUND');
    }

    const body: LeaderboardResponse = {
      gameKey: game.key,
      gameName: game.name,
      entries: ctx.stats.leaderboard(game.key, top),
    };
    res.status(200).json(body);
  }));

  return gamesRouter;
}
