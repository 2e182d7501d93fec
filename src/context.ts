import type { AppConfig } from './config';
import type { Game } from './types/tournament';
import type { StatsTable } from './services/statsTable';
import type { SessionResolutionStores } from './services/sessionStores';

/** Everything the HTTP layer needs, loaded once at start-up. */
export interface AppContext {
  games: Game[];
  stats: StatsTable;
  sessions: SessionResolutionStores;
  statsLastUpdated: string | null;
  config: Pick<AppConfig, 'nodeEnv' | 'corsOrigins' | 'publicDir' | 'leaderboardDefaultSize'>;
}
