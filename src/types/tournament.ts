export type GameCategory = 'pvp' | 'non_pvp';

export type GameRole =
  | { kind: 'overall' }
  | { kind: 'regular'; category: GameCategory }
  | {
      kind: 'aggregate';
      of: GameCategory;
      perGameAverage: boolean;
      /** Configured regular games in the category, disabled ones included. */
      memberCount: number;
    };

export interface Game {
  key: string;
  name: string;
  shortLabel: string;
  csv: string;
  role: GameRole;
}

export type TeamName = 'Red' | 'Yellow' | 'Green' | 'Blue';

export interface Team {
  name: TeamName;
  color: string;
}

/** Ordered player names for every team; all four teams are always present. */
export type Roster = Record<TeamName, string[]>;

export interface TeamTally {
  total: number;
  count: number;
}

export interface UnresolvedResult {
  status: 'unresolved';
  /** Sorted, de-duplicated names with no score and no resolution. */
  missing: string[];
  /** Game keys, in catalogue order, where each missing player had no score. */
  missingIn: Record<string, string[]>;
}

export interface CompleteResult {
  status: 'complete';
  /** Game key → one average per team, in team order. */
  perGameAverages: Record<string, number[]>;
  /** Game key → one raw score total per team, in team order. */
  teamTotals: Record<string, number[]>;
  /** Team index → one differential per entry of `differentialGameKeys`. */
  differentials: number[][];
  differentialGameKeys: string[];
}

export type RecomputeResult = UnresolvedResult | CompleteResult;
