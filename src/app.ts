import path from 'path';
import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { AppContext } from './context';
import { createHealthRouter } from './api/health';
import { createPlayersRouter } from './api/players';
import { createGamesRouter } from './api/games';
import { createRecalcRouter } from './api/recalc';
import { createResolutionsRouter } from './api/resolutions';
import { createExportsRouter } from './api/exports';
import { errorHandler, notFoundHandler } from './api/middleware/errorHandlers';
import { renderDashboardPage } from './views/DashboardPage';
import { TEAMS } from './services/teams';

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({
    origin: ctx.config.corsOrigins,
    credentials: true,
  }));
  if (ctx.config.nodeEnv !== 'test') {
    app.use(morgan(ctx.config.nodeEnv === 'production' ? 'combined' : 'dev'));
  }
  app.use(express.json({ limit: '1mb' }));

  app.use('/assets', express.static(path.resolve(ctx.config.publicDir)));

  app.get('/', (_req, res) => {
    res.type('html').send(renderDashboardPage({ teams: TEAMS, lastUpdated: ctx.statsLastUpdated }));
  });

  app.use('/api/health', createHealthRouter(ctx));
  app.use('/api/players', createPlayersRouter(ctx));
  app.use('/api/games', createGamesRouter(ctx));
  app.use('/api/recalc', createRecalcRouter(ctx));
  app.use('/api/resolutions', createResolutionsRouter(ctx));
  app.use('/api/exports', createExportsRouter(ctx));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
