/**
 * Schedule Manager
 *
 * Keeps one schedule per season plus a game-id index, and answers calendar
 * queries over them. All calendar days are UTC days.
 */

import { logger } from '../../config/logger.config';
import { StatErrors } from '../../utils/exceptions';
import { addDays, calendarDaysBetween, isIsoDate, toIsoDate } from '../../shared/utils/date.utils';
import { Game, Schedule, compareByGameDate, involvesTeam } from './schedule.model';

export const DEFAULT_UPCOMING_DAYS = 7;

export interface UpcomingGamesOptions {
  daysAhead?: number;
  team?: string;
  season?: string;
  /** Reference instant; defaults to the current time */
  now?: Date;
}

export class ScheduleManager {
  private readonly schedules = new Map<string, Schedule>();
  private readonly gamesById = new Map<string, Game>();

  /**
   * Store a season's schedule, replacing any previous one for that season.
   */
  addSchedule(schedule: Schedule): void {
    this.schedules.set(schedule.season, { ...schedule, games: [...schedule.games] });
    for (const game of schedule.games) {
      this.gamesById.set(game.gameId, game);
    }
    logger.debug('Indexed schedule', { season: schedule.season, games: schedule.games.length });
  }

  /**
   * Add one game, creating the season's schedule on first use.
   */
  addGame(season: string, game: Game): void {
    let schedule = this.schedules.get(season);
    if (!schedule) {
      schedule = { scheduleId: `schedule_${season}`, season, games: [] };
      this.schedules.set(season, schedule);
    }
    schedule.games.push(game);
    this.gamesById.set(game.gameId, game);
  }

  getGame(gameId: string): Game | undefined {
    return this.gamesById.get(gameId);
  }

  getSchedule(season: string): Schedule | undefined {
    return this.schedules.get(season);
  }

  listSeasons(): string[] {
    return [...this.schedules.keys()];
  }

  /**
   * Games on a UTC calendar date (YYYY-MM-DD), earliest first.
   * @throws ValidationException for a malformed date
   */
  getGamesForDate(targetDate: string, season?: string): Game[] {
    if (!isIsoDate(targetDate)) {
      throw StatErrors.invalidDate(targetDate);
    }
    return this.gamesIn(season)
      .filter((game) => toIsoDate(game.gameDate) === targetDate)
      .sort(compareByGameDate);
  }

  getGamesForTeam(team: string, season?: string): Game[] {
    return this.gamesIn(season)
      .filter((game) => involvesTeam(game, team))
      .sort(compareByGameDate);
  }

  /**
   * Scheduled (not started) games between `now` and `now + daysAhead`, inclusive.
   */
  getUpcomingGames(options: UpcomingGamesOptions = {}): Game[] {
    const now = options.now ?? new Date();
    const end = addDays(now, options.daysAhead ?? DEFAULT_UPCOMING_DAYS);
    const { team } = options;

    return this.gamesIn(options.season)
      .filter((game) => game.status === 'scheduled')
      .filter((game) => game.gameDate >= now && game.gameDate <= end)
      .filter((game) => team === undefined || involvesTeam(game, team))
      .sort(compareByGameDate);
  }

  /**
   * Games per team between two instants (inclusive). Home and away both count.
   */
  getGameCountByTeam(start: Date, end: Date, season?: string): Map<string, number> {
    const counts = new Map<string, number>();
    for (const game of this.gamesIn(season)) {
      if (game.gameDate < start || game.gameDate > end) continue;
      counts.set(game.homeTeam, (counts.get(game.homeTeam) ?? 0) + 1);
      counts.set(game.awayTeam, (counts.get(game.awayTeam) ?? 0) + 1);
    }
    return counts;
  }

  /**
   * Pairs of consecutive team games on back-to-back calendar days.
   */
  getBackToBackGames(team: string, season?: string): Array<[Game, Game]> {
    const teamGames = this.getGamesForTeam(team, season);
    const backToBacks: Array<[Game, Game]> = [];

    for (let i = 0; i < teamGames.length - 1; i++) {
      const first = teamGames[i];
      const second = teamGames[i + 1];
      if (calendarDaysBetween(first.gameDate, second.gameDate) === 1) {
        backToBacks.push([first, second]);
      }
    }

    return backToBacks;
  }

  /**
   * Games of one season, or of every season when `season` is omitted or unknown.
   */
  private gamesIn(season?: string): Game[] {
    const selected = season !== undefined ? this.schedules.get(season) : undefined;
    const schedules = selected ? [selected] : [...this.schedules.values()];
    return schedules.flatMap((schedule) => schedule.games);
  }
}
