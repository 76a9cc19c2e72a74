/**
 * Per-game stat lines and derived season summaries
 */

export interface StatRecord {
  readonly playerId: string;
  /** Calendar date, YYYY-MM-DD */
  readonly gameDate: string;
  /** Opposing team abbreviation */
  readonly opponent: string;
  // Basic
  readonly minutesPlayed: number;
  readonly points: number;
  readonly rebounds: number;
  readonly assists: number;
  readonly steals: number;
  readonly blocks: number;
  readonly turnovers: number;
  // Shooting (made <= attempted is not enforced)
  readonly fieldGoalsMade: number;
  readonly fieldGoalsAttempted: number;
  readonly threePointersMade: number;
  readonly threePointersAttempted: number;
  readonly freeThrowsMade: number;
  readonly freeThrowsAttempted: number;
  // Advanced
  readonly offensiveRebounds: number;
  readonly defensiveRebounds: number;
  readonly personalFouls: number;
  readonly plusMinus?: number;
}

/**
 * Aggregated stats over a set of games. Recomputed on every query, never stored.
 */
export interface SeasonSummary {
  playerId: string;
  season: string;
  gamesPlayed: number;
  // Averages
  avgPoints: number;
  avgRebounds: number;
  avgAssists: number;
  avgSteals: number;
  avgBlocks: number;
  avgTurnovers: number;
  avgMinutes: number;
  // Shooting, null when there were no attempts
  fieldGoalPercentage: number | null;
  threePointPercentage: number | null;
  freeThrowPercentage: number | null;
  // Totals
  totalPoints: number;
  totalRebounds: number;
  totalAssists: number;
  totalSteals: number;
  totalBlocks: number;
}

/**
 * Counting stats that can be summed or averaged across records.
 */
export type CountingStatKey = Exclude<keyof StatRecord, 'playerId' | 'gameDate' | 'opponent' | 'plusMinus'>;
