import { Router } from 'express';
import { asyncHandler } from './middleware/errorHandlers';
import { recalcRequestSchema } from './schemas';
import { recalculate } from '../services/recalcService';
import { renderCharts } from '../services/chartRenderer';
import type { AppContext } from '../context';
import type { RecalcResponse } from '../../shared/types/api';

export function createRecalcRouter(ctx: AppContext): Router {
  const recalcRouter = Router();

  // POST /api/recalc - Apply resolutions, recompute, and chart the result
  recalcRouter.post('/', asyncHandler(async (req, res) => {
    const command = recalcRequestSchema.parse(req.body);
    const result = recalculate(ctx, command);

    if (result.status === 'unresolved') {
      console.log(`🔎 ${result.missing.length} player(s) need resolving: ${result.missing.join(', ')}`);
      const body: RecalcResponse = {
        ok: false,
        status: 'unresolved',
        missing: result.missing,
        missingIn: result.missingIn,
        candidates: ctx.stats.knownPlayers(),
      };
      res.status(200).json(body);
      return;
    }

    const body: RecalcResponse = {
      ok: true,
      status: 'complete',
      perGameAverages: result.perGameAverages,
      differentials: result.differentials,
      differentialGames: result.differentialGameKeys,
      charts: renderCharts(ctx.games, result),
    };
    res.status(200).json(body);
  }));

  return recalcRouter;
}
