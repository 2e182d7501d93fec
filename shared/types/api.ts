export interface ApiErrorBody {
  error: {
    message: string;
    code: string;
    details?: unknown;
    stack?: string;
  };
}

export interface RecalcRequest {
  sessionId: string;
  teams: Record<string, string[]>;
  /** Player → replacement name; an empty string means ignore the player. */
  resolutions?: Record<string, string>;
}

export interface UnresolvedRecalcResponse {
  ok: false;
  status: 'unresolved';
  missing: string[];
  missingIn: Record<string, string[]>;
  candidates: string[];
}

export interface CompleteRecalcResponse {
  ok: true;
  status: 'complete';
  perGameAverages: Record<string, number[]>;
  differentials: number[][];
  differentialGames: string[];
  charts: {
    perGame: string;
    differentials: string;
  };
}

export type RecalcResponse = UnresolvedRecalcResponse | CompleteRecalcResponse;

export interface ResolutionsResponse {
  sessionId: string;
  substitutions: Record<string, string>;
  ignored: string[];
}

export interface PlayersResponse {
  players: string[];
  lastUpdated: string | null;
}

export interface PlayerScoresResponse {
  player: string;
  scores: Array<{ gameKey: string; gameName: string; score: number }>;
}

export interface GameSummary {
  key: string;
  name: string;
  shortLabel: string;
  role: 'overall' | 'regular' | 'aggregate';
}

export interface LeaderboardResponse {
  gameKey: string;
  gameName: string;
  entries: Array<{ rank: number; player: string; score: number }>;
}
