import { StatTracker, DEFAULT_RECENT_GAMES } from '../stats/stat-tracker.service';
import { StatRecord } from '../stats/stats.model';
import { Team } from './teams.model';

/**
 * Pool the last `numGames` games of every rostered player into one list, in
 * roster order and newest first within each player. Rostered players without
 * games add nothing.
 */
export function getRosterGames(
  statTracker: StatTracker,
  team: Team,
  numGames: number = DEFAULT_RECENT_GAMES
): StatRecord[] {
  return team.playerIds.flatMap((playerId) => statTracker.getLastNGames(playerId, numGames));
}
