import { z } from 'zod';

const configSchema = z.object({
  port: z.number().int().positive().default(3001),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  statsDir: z.string().min(1).default('stats'),
  gamesConfigPath: z.string().min(1).default('config/games.json'),
  publicDir: z.string().min(1).default('public'),
  corsOrigins: z.array(z.string().url()).default(['http://localhost:3001']),
  sessionTtlMinutes: z.number().int().positive().default(240),
  leaderboardDefaultSize: z.number().int().min(1).max(100).default(10),
});

export type AppConfig = z.infer<typeof configSchema>;

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = {
    port: parseInteger(source.PORT),
    nodeEnv: source.NODE_ENV,
    statsDir: source.STATS_DIR,
    gamesConfigPath: source.GAMES_CONFIG_PATH,
    publicDir: source.PUBLIC_DIR,
    corsOrigins: parseList(source.CORS_ORIGINS),
    sessionTtlMinutes: parseInteger(source.SESSION_TTL_MINUTES),
    leaderboardDefaultSize: parseInteger(source.LEADERBOARD_DEFAULT_SIZE),
  };

  return configSchema.parse(env);
}

export const config = loadConfig();
