/**
 * Derived analytics over a player's game log
 */

export type TrendKey = 'pointsChange' | 'reboundsChange' | 'assistsChange';

/** Percent change of recent vs older averages; stats with a zero older average are omitted */
export type TrendReport = Partial<Record<TrendKey, number>>;

export type ConsistencyKey = 'pointsCv' | 'reboundsCv' | 'assistsCv';

/** Coefficient of variation per stat (lower is steadier); zero-mean stats are omitted */
export type ConsistencyReport = Partial<Record<ConsistencyKey, number>>;

export interface GameProjection {
  projectedPoints: number;
  projectedRebounds: number;
  projectedAssists: number;
  projectedSteals: number;
  projectedBlocks: number;
  /** Sample standard deviation of points; 0 with fewer than two games */
  pointsStd: number;
  gamesUsed: number;
  /** Accepted for display; the projection does not adjust for it */
  opponent?: string;
}

export interface PlayerAverages {
  avgPoints: number;
  avgRebounds: number;
  avgAssists: number;
}

export interface PlayerComparison {
  playerA: PlayerAverages;
  playerB: PlayerAverages;
  /** A minus B */
  difference: {
    points: number;
    rebounds: number;
    assists: number;
  };
}

export interface ModelProjectionStatus {
  status: 'not_implemented';
  message: string;
}
