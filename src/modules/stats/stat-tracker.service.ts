/**
 * Player Stat Tracking Service
 *
 * Owns the per-player game logs. Logs are append-only: a record handed to
 * addGameStats is kept as-is (records are frozen at construction, so nothing
 * is copied) and is never edited or removed.
 */

import { logger } from '../../config/logger.config';
import { Player } from '../players/players.model';
import { SeasonSummary, StatRecord } from './stats.model';
import { compareIsoDates } from '../../shared/utils/date.utils';
import { safeRatio, sumBy } from '../../domain/stats/descriptive';

export const DEFAULT_RECENT_GAMES = 10;

export class StatTracker {
  private readonly gameStats = new Map<string, StatRecord[]>();
  private readonly players = new Map<string, Player>();

  /**
   * Register a player. Re-adding an id replaces the stored player.
   */
  addPlayer(player: Player): void {
    if (this.players.has(player.playerId)) {
      logger.debug('Replacing player', { playerId: player.playerId });
    }
    this.players.set(player.playerId, player);
  }

  getPlayer(playerId: string): Player | undefined {
    return this.players.get(playerId);
  }

  listPlayers(): Player[] {
    return [...this.players.values()];
  }

  /**
   * Append a game to the player's log. Duplicate games are not detected and
   * will count twice in every aggregate.
   */
  addGameStats(record: StatRecord): void {
    const log = this.gameStats.get(record.playerId);
    if (log) {
      log.push(record);
    } else {
      this.gameStats.set(record.playerId, [record]);
    }
    logger.debug('Recorded game stats', {
      playerId: record.playerId,
      gameDate: record.gameDate,
      opponent: record.opponent,
    });
  }

  /**
   * The player's log in insertion order.
   */
  getAllGameStats(playerId: string): readonly StatRecord[] {
    return this.gameStats.get(playerId) ?? [];
  }

  /**
   * Games within an inclusive date range, oldest first. Either bound may be omitted.
   */
  getPlayerGameStats(playerId: string, startDate?: string, endDate?: string): StatRecord[] {
    let stats = [...this.getAllGameStats(playerId)];

    if (startDate !== undefined) {
      stats = stats.filter((s) => compareIsoDates(s.gameDate, startDate) >= 0);
    }
    if (endDate !== undefined) {
      stats = stats.filter((s) => compareIsoDates(s.gameDate, endDate) <= 0);
    }

    return stats.sort((a, b) => compareIsoDates(a.gameDate, b.gameDate));
  }

  /**
   * Up to `n` most recent games, newest first.
   */
  getLastNGames(playerId: string, n: number = DEFAULT_RECENT_GAMES): StatRecord[] {
    const sorted = [...this.getAllGameStats(playerId)].sort((a, b) =>
      compareIsoDates(b.gameDate, a.gameDate)
    );
    return sorted.slice(0, Math.max(0, n));
  }

  /**
   * Aggregate a season summary.
   *
   * Without `games` the player's whole log is used; `season` only labels the
   * result and does not filter. Pass a pre-filtered list to scope a season.
   *
   * @returns null when there are no games to aggregate
   */
  calculateSeasonStats(
    playerId: string,
    season: string,
    games?: readonly StatRecord[]
  ): SeasonSummary | null {
    const records = games ?? this.getAllGameStats(playerId);

    if (records.length === 0) {
      return null;
    }

    const gamesPlayed = records.length;

    // Totals
    const totalPoints = sumBy(records, (g) => g.points);
    const totalRebounds = sumBy(records, (g) => g.rebounds);
    const totalAssists = sumBy(records, (g) => g.assists);
    const totalSteals = sumBy(records, (g) => g.steals);
    const totalBlocks = sumBy(records, (g) => g.blocks);
    const totalTurnovers = sumBy(records, (g) => g.turnovers);
    const totalMinutes = sumBy(records, (g) => g.minutesPlayed);

    // Shooting
    const totalFgm = sumBy(records, (g) => g.fieldGoalsMade);
    const totalFga = sumBy(records, (g) => g.fieldGoalsAttempted);
    const total3pm = sumBy(records, (g) => g.threePointersMade);
    const total3pa = sumBy(records, (g) => g.threePointersAttempted);
    const totalFtm = sumBy(records, (g) => g.freeThrowsMade);
    const totalFta = sumBy(records, (g) => g.freeThrowsAttempted);

    return {
      playerId,
      season,
      gamesPlayed,
      avgPoints: totalPoints / gamesPlayed,
      avgRebounds: totalRebounds / gamesPlayed,
      avgAssists: totalAssists / gamesPlayed,
      avgSteals: totalSteals / gamesPlayed,
      avgBlocks: totalBlocks / gamesPlayed,
      avgTurnovers: totalTurnovers / gamesPlayed,
      avgMinutes: totalMinutes / gamesPlayed,
      fieldGoalPercentage: safeRatio(totalFgm, totalFga),
      threePointPercentage: safeRatio(total3pm, total3pa),
      freeThrowPercentage: safeRatio(totalFtm, totalFta),
      totalPoints,
      totalRebounds,
      totalAssists,
      totalSteals,
      totalBlocks,
    };
  }
}
