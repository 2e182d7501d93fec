import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import * as Papa from 'papaparse';
import type { Game } from '../types/tournament';

export type GameScores = ReadonlyMap<string, number>;

export interface LeaderboardEntry {
  rank: number;
  player: string;
  score: number;
}

export interface PlayerGameScore {
  gameKey: string;
  gameName: string;
  score: number;
}

/**
 * Read-only (game key → player → score) lookup built once from the stats
 * CSVs. Absence of a player is distinct from a score of zero.
 */
export class StatsTable {
  private readonly byGame: ReadonlyMap<string, GameScores>;

  constructor(private readonly games: readonly Game[], scores: Record<string, Record<string, number>>) {
    const byGame = new Map<string, GameScores>();
    for (const game of games) {
      byGame.set(game.key, new Map(Object.entries(scores[game.key] ?? {})));
    }
    this.byGame = byGame;
  }

  score(gameKey: string, player: string): number | undefined {
    return this.byGame.get(gameKey)?.get(player);
  }

  has(gameKey: string, player: string): boolean {
    return this.byGame.get(gameKey)?.has(player) ?? false;
  }

  playersIn(gameKey: string): string[] {
    return [...(this.byGame.get(gameKey)?.keys() ?? [])];
  }

  /** Every name with a score in at least one game, sorted. */
  knownPlayers(): string[] {
    const names = new Set<string>();
    for (const scores of this.byGame.values()) {
      for (const name of scores.keys()) names.add(name);
    }
    return [...names].sort();
  }

  leaderboard(gameKey: string, top: number): LeaderboardEntry[] {
    const scores = this.byGame.get(gameKey);
    if (!scores) return [];

    return [...scores.entries()]
      .sort(([nameA, a], [nameB, b]) => b - a || (nameA < nameB ? -1 : nameA > nameB ? 1 : 0))
      .slice(0, top)
      .map(([player, score], index) => ({ rank: index + 1, player, score }));
  }

  /** Case-insensitive lookup of one player's score in every game they appear in. */
  playerProfile(name: string): PlayerGameScore[] {
    const wanted = name.trim().toLowerCase();
    const profile: PlayerGameScore[] = [];
    if (!wanted) return profile;

    for (const game of this.games) {
      const scores = this.byGame.get(game.key);
      if (!scores) continue;
      for (const [player, score] of scores) {
        if (player.toLowerCase() === wanted) {
          profile.push({ gameKey: game.key, gameName: game.name, score });
          break;
        }
      }
    }

    return profile;
  }

  get playerCount(): number {
    return this.knownPlayers().length;
  }
}

function cell(row: string[], index: number): string {
  return (row[index] ?? '').trim();
}

/**
 * Parses one stats CSV of `Player,Points` rows. The header row is optional;
 * placeholder rows such as `#N/A`, blank names and unparseable points are skipped.
 */
export function parseScoresCsv(text: string): Record<string, number> {
  const parsed = Papa.parse<string[]>(text, { delimiter: ',', skipEmptyLines: true });
  const rows = parsed.data;
  const scores: Record<string, number> = {};

  rows.forEach((row, index) => {
    if (index === 0 && cell(row, 0).toLowerCase() === 'player') return;

    const player = cell(row, 0);
    const points = cell(row, 1).replace(/,/g, '');
    if (!player || player.startsWith('#') || !points || points.startsWith('#')) return;

    const value = Number(points);
    if (!Number.isFinite(value)) return;

    scores[player] = value;
  });

  return scores;
}

export function loadStatsTable(statsDir: string, games: Game[]): StatsTable {
  const scores: Record<string, Record<string, number>> = {};

  for (const game of games) {
    const csvPath = join(statsDir, game.csv);
    if (!existsSync(csvPath)) {
      console.warn(`⚠️ CSV not found for ${game.name}: ${csvPath}`);
      scores[game.key] = {};
      continue;
    }

    scores[game.key] = parseScoresCsv(readFileSync(csvPath, 'utf-8'));
    console.log(`📊 Loaded ${Object.keys(scores[game.key]).length} rows for ${game.name}`);
  }

  return new StatsTable(games, scores);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/** Newest modification time of any CSV in the stats directory, or null if there are none. */
export function statsLastUpdated(statsDir: string): string | null {
  if (!existsSync(statsDir)) return null;

  let latest: number | null = null;
  for (const file of readdirSync(statsDir)) {
    if (!file.toLowerCase().endsWith('.csv')) continue;
    const mtime = statSync(join(statsDir, file)).mtimeMs;
    if (latest === null || mtime > latest) latest = mtime;
  }

  return latest === null ? null : formatTimestamp(new Date(latest));
}
