import { readFileSync } from 'fs';
import { z } from 'zod';
import type { Game, GameCategory } from '../types/tournament';

const categorySchema = z.enum(['pvp', 'non_pvp']);

const roleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('overall') }),
  z.object({ kind: z.literal('regular'), category: categorySchema }),
  z.object({ kind: z.literal('aggregate'), of: categorySchema, perGameAverage: z.boolean().default(false) }),
]);

const gameEntrySchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  shortLabel: z.string().min(1).optional(),
  csv: z.string().min(1),
  enabled: z.boolean().default(true),
  role: roleSchema,
});

const catalogueSchema = z
  .array(gameEntrySchema)
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.key)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate game key "${entry.key}"`, path: [index, 'key'] });
      }
      seen.add(entry.key);
    });

    const enabled = entries.filter(entry => entry.enabled);

    if (enabled.filter(entry => entry.role.kind === 'overall').length > 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At most one enabled game may have the overall role' });
    }

    enabled.forEach(entry => {
      if (entry.role.kind !== 'aggregate') return;
      const category = entry.role.of;
      const members = enabled.filter(other => other.role.kind === 'regular' && other.role.category === category);
      if (members.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Aggregate game "${entry.key}" has no enabled ${category} games`,
          path: [entries.indexOf(entry), 'role'],
        });
      }
    });
  });

/**
 * Validates raw catalogue JSON and returns the enabled games in configured order.
 * An aggregate's member count covers every configured game in its category,
 * including disabled ones, since its CSV is summed over all of them.
 */
export function parseGames(raw: unknown): Game[] {
  const entries = catalogueSchema.parse(raw);
  const memberCount = (category: GameCategory): number =>
    entries.filter(entry => entry.role.kind === 'regular' && entry.role.category === category).length;

  return entries
    .filter(entry => entry.enabled)
    .map(entry => ({
      key: entry.key,
      name: entry.name,
      shortLabel: entry.shortLabel ?? entry.name,
      csv: entry.csv,
      role: entry.role.kind === 'aggregate' ? { ...entry.role, memberCount: memberCount(entry.role.of) } : entry.role,
    }));
}

export function loadGames(path: string): Game[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const games = parseGames(raw);
  console.log(`🎮 Loaded ${games.length} games from ${path}`);
  return games;
}

export function isOverall(game: Game): boolean {
  return game.role.kind === 'overall';
}

/** Games that take part in differentials: everything except the overall aggregate. */
export function differentialGames(games: Game[]): Game[] {
  return games.filter(game => !isOverall(game));
}

/**
 * How many games each player's score stands for. Per-game aggregates are
 * averaged over their member games; every other game counts once.
 */
export function averagingFactor(game: Game): number {
  if (game.role.kind === 'aggregate' && game.role.perGameAverage) {
    return Math.max(game.role.memberCount, 1);
  }
  return 1;
}

export function findGame(games: Game[], key: string): Game | undefined {
  return games.find(game => game.key === key);
}
