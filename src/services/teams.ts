import type { Roster, Team, TeamName } from '../types/tournament';

export const TEAMS: readonly Team[] = [
  { name: 'Red', color: '#ff5050' },
  { name: 'Yellow', color: '#ffdc78' },
  { name: 'Green', color: '#78dc78' },
  { name: 'Blue', color: '#78b4ff' },
];

export const TEAM_NAMES: readonly TeamName[] = TEAMS.map(team => team.name);

export function isTeamName(value: string): value is TeamName {
  return TEAM_NAMES.some(name => name === value);
}

export function emptyRoster(): Roster {
  return { Red: [], Yellow: [], Green: [], Blue: [] };
}

/**
 * Coerces a client payload into a full roster. Unknown team names are dropped,
 * missing teams come back empty and blank or non-string entries are filtered.
 * Duplicate names are left alone.
 */
export function normalizeRoster(input: Record<string, unknown> | null | undefined): Roster {
  const roster = emptyRoster();
  if (!input) return roster;

  for (const [teamName, players] of Object.entries(input)) {
    if (!isTeamName(teamName) || !Array.isArray(players)) continue;

    for (const player of players) {
      if (typeof player !== 'string') continue;
      const trimmed = player.trim();
      if (trimmed) roster[teamName].push(trimmed);
    }
  }

  return roster;
}
