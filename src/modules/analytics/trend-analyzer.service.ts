/**
 * Player Trend Analysis Service
 *
 * Read-only analytics over StatTracker game logs: recent-vs-older trends,
 * consistency, a simple average-based projection and head-to-head averages.
 * Every call recomputes from the tracker; nothing is cached.
 */

import { StatTracker } from '../stats/stat-tracker.service';
import { CountingStatKey, StatRecord } from '../stats/stats.model';
import { coefficientOfVariation, mean, percentChange, sampleStdDev } from '../../domain/stats/descriptive';
import {
  ConsistencyReport,
  GameProjection,
  PlayerAverages,
  PlayerComparison,
  TrendReport,
} from './analytics.model';

export const DEFAULT_TREND_RECENT_GAMES = 10;
export const DEFAULT_TREND_COMPARISON_GAMES = 20;
export const DEFAULT_CONSISTENCY_GAMES = 20;
export const DEFAULT_PROJECTION_GAMES = 10;
export const DEFAULT_COMPARISON_GAMES = 20;

const MIN_CONSISTENCY_GAMES = 3;

function values(games: readonly StatRecord[], key: CountingStatKey): number[] {
  return games.map((g) => g[key]);
}

function average(games: readonly StatRecord[], key: CountingStatKey): number {
  return mean(values(games, key)) ?? 0;
}

function averagesOf(games: readonly StatRecord[]): PlayerAverages {
  return {
    avgPoints: average(games, 'points'),
    avgRebounds: average(games, 'rebounds'),
    avgAssists: average(games, 'assists'),
  };
}

export class TrendAnalyzer {
  constructor(private readonly statTracker: StatTracker) {}

  /**
   * Compare the most recent `recentGames` against the games before them,
   * within the last `comparisonGames`.
   *
   * Returns {} unless the player has at least `comparisonGames` games and both
   * windows are non-empty. A `recentGames` below one leaves no recent window.
   */
  getTrendingStats(
    playerId: string,
    recentGames: number = DEFAULT_TREND_RECENT_GAMES,
    comparisonGames: number = DEFAULT_TREND_COMPARISON_GAMES
  ): TrendReport {
    const allGames = this.statTracker.getLastNGames(playerId, comparisonGames);

    if (allGames.length < comparisonGames) {
      return {};
    }

    const recent = allGames.slice(0, recentGames);
    const older = allGames.slice(recentGames, comparisonGames);

    if (recentGames < 1 || older.length === 0) {
      return {};
    }

    const trends: TrendReport = {};

    const pointsChange = percentChange(average(recent, 'points'), average(older, 'points'));
    if (pointsChange !== null) trends.pointsChange = pointsChange;

    const reboundsChange = percentChange(average(recent, 'rebounds'), average(older, 'rebounds'));
    if (reboundsChange !== null) trends.reboundsChange = reboundsChange;

    const assistsChange = percentChange(average(recent, 'assists'), average(older, 'assists'));
    if (assistsChange !== null) trends.assistsChange = assistsChange;

    return trends;
  }

  /**
   * Coefficient of variation over the last `numGames`. Needs at least three games.
   */
  getConsistencyScore(
    playerId: string,
    numGames: number = DEFAULT_CONSISTENCY_GAMES
  ): ConsistencyReport {
    const games = this.statTracker.getLastNGames(playerId, numGames);

    if (games.length < MIN_CONSISTENCY_GAMES) {
      return {};
    }

    const consistency: ConsistencyReport = {};

    const pointsCv = coefficientOfVariation(values(games, 'points'));
    if (pointsCv !== null) consistency.pointsCv = pointsCv;

    const reboundsCv = coefficientOfVariation(values(games, 'rebounds'));
    if (reboundsCv !== null) consistency.reboundsCv = reboundsCv;

    const assistsCv = coefficientOfVariation(values(games, 'assists'));
    if (assistsCv !== null) consistency.assistsCv = assistsCv;

    return consistency;
  }

  /**
   * Project the next game as the plain average of the last `numGames`.
   * The opponent is carried through but does not adjust the numbers.
   */
  projectNextGame(
    playerId: string,
    numGames: number = DEFAULT_PROJECTION_GAMES,
    opponent?: string
  ): GameProjection | null {
    const games = this.statTracker.getLastNGames(playerId, numGames);

    if (games.length === 0) {
      return null;
    }

    const projection: GameProjection = {
      projectedPoints: average(games, 'points'),
      projectedRebounds: average(games, 'rebounds'),
      projectedAssists: average(games, 'assists'),
      projectedSteals: average(games, 'steals'),
      projectedBlocks: average(games, 'blocks'),
      pointsStd: sampleStdDev(values(games, 'points')) ?? 0,
      gamesUsed: games.length,
    };
    if (opponent !== undefined) {
      projection.opponent = opponent;
    }
    return projection;
  }

  /**
   * Recent averages for two players and their difference (A - B).
   * Null when either player has no games.
   */
  comparePlayers(
    playerAId: string,
    playerBId: string,
    numGames: number = DEFAULT_COMPARISON_GAMES
  ): PlayerComparison | null {
    const gamesA = this.statTracker.getLastNGames(playerAId, numGames);
    const gamesB = this.statTracker.getLastNGames(playerBId, numGames);

    if (gamesA.length === 0 || gamesB.length === 0) {
      return null;
    }

    const playerA = averagesOf(gamesA);
    const playerB = averagesOf(gamesB);

    return {
      playerA,
      playerB,
      difference: {
        points: playerA.avgPoints - playerB.avgPoints,
        rebounds: playerA.avgRebounds - playerB.avgRebounds,
        assists: playerA.avgAssists - playerB.avgAssists,
      },
    };
  }
}
