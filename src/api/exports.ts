import { Router } from 'express';
import { asyncHandler, ApiError } from './middleware/errorHandlers';
import { recalcRequestSchema } from './schemas';
import { recalculate } from '../services/recalcService';
import { exportTeamStatsCsv } from '../services/teamStatsExport';
import type { AppContext } from '../context';

export function createExportsRouter(ctx: AppContext): Router {
  const exportsRouter = Router();

  // POST /api/exports/team-stats - Per-game, per-team averages and differentials as CSV
  exportsRouter.post('/team-stats', asyncHandler(async (req, res) => {
    const command = recalcRequestSchema.parse(req.body);
    const result = recalculate(ctx, command);

    if (result.status === 'unresolved') {
      throw new ApiError('Resolve missing players before exporting', 409, 'UNRESOLVED_PLAYERS', {
        missing: result.missing,
        missingIn: result.missingIn,
      });
    }

    const csvContent = exportTeamStatsCsv(ctx.games, result);
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');

    console.log(`📤 Exporting team stats for ${ctx.games.length} games`);

    res.setHeader('Content-Type', 'text/csv');
    res.setHeader('Content-Disposition', `attachment; filename="team-stats-${timestamp}.csv"`);
    res.status(200).send(csvContent);
  }));

  return exportsRouter;
}
