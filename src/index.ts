import 'dotenv/config';
import path from 'path';
import { config } from './config';
import { createApp } from './app';
import { loadGames } from './services/games';
import { loadStatsTable, statsLastUpdated } from './services/statsTable';
import { SessionResolutionStores } from './services/sessionStores';

const games = loadGames(path.resolve(config.gamesConfigPath));
const statsDir = path.resolve(config.statsDir);
const stats = loadStatsTable(statsDir, games);

const app = createApp({
  games,
  stats,
  sessions: new SessionResolutionStores(config.sessionTtlMinutes),
  statsLastUpdated: statsLastUpdated(statsDir),
  config,
});

const server = app.listen(config.port, () => {
  console.log(`🚀 Team balancer running on port ${config.port}`);
  console.log(`📊 Environment: ${config.nodeEnv}`);
  console.log(`📁 Stats directory: ${statsDir} (${stats.playerCount} players)`);
});

process.on('SIGTERM', () => {
  console.log('📴 SIGTERM received, shutting down gracefully');
  server.close(() => {
    console.log('✅ Process terminated');
  });
});

export default app;
