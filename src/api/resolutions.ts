import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from './middleware/errorHandlers';
import { sessionQuerySchema } from './schemas';
import type { AppContext } from '../context';
import type { ResolutionsResponse } from '../../shared/types/api';

const playerParamSchema = z.object({
  player: z.string().trim().min(1),
});

export function createResolutionsRouter(ctx: AppContext): Router {
  const resolutionsRouter = Router();

  // GET /api/resolutions?sessionId= - Current substitutions and ignores for a session
  resolutionsRouter.get('/', asyncHandler(async (req, res) => {
    const { sessionId } = sessionQuerySchema.parse(req.query);
    const store = ctx.sessions.peek(sessionId);
    const snapshot = store ? store.snapshot() : { substitutions: {}, ignored: [] };

    const body: ResolutionsResponse = { sessionId, ...snapshot };
    res.status(200).json(body);
  }));

  // DELETE /api/resolutions?sessionId= - Forget every resolution for a session
  resolutionsRouter.delete('/', asyncHandler(async (req, res) => {
    const { sessionId } = sessionQuerySchema.parse(req.query);
    ctx.sessions.peek(sessionId)?.clearAll();
    res.status(204).end();
  }));

  // DELETE /api/resolutions/:player?sessionId= - Forget one player's resolution
  resolutionsRouter.delete('/:player', asyncHandler(async (req, res) => {
    const { sessionId } = sessionQuerySchema.parse(req.query);
    const { player } = playerParamSchema.parse(req.params);

    const cleared = ctx.sessions.peek(sessionId)?.clear(player) ?? false;
    res.status(200).json({ sessionId, player, cleared });
  }));

  return resolutionsRouter;
}
