import { Router } from 'express';
import { asyncHandler } from './middleware/errorHandlers';
import type { AppContext } from '../context';

export function createHealthRouter(ctx: AppContext): Router {
  const healthRouter = Router();

  healthRouter.get('/', asyncHandler(async (_req, res) => {
    const healthCheck = {
      uptime: process.uptime(),
      message: 'Team balancer API is healthy',
      timestamp: new Date().toISOString(),
      environment: ctx.config.nodeEnv,
      games: ctx.games.length,
      players: ctx.stats.playerCount,
      statsLastUpdated: ctx.statsLastUpdated,
      activeSessions: ctx.sessions.size,
    };

    res.status(200).json(healthCheck);
  }));

  return healthRouter;
}
