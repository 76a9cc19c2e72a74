export type GameStatus = 'scheduled' | 'in_progress' | 'final';

export interface Game {
  readonly gameId: string;
  /** Tip-off, read as UTC */
  readonly gameDate: Date;
  readonly homeTeam: string;
  readonly awayTeam: string;
  readonly homeScore?: number;
  readonly awayScore?: number;
  readonly status: GameStatus;
}

export interface Schedule {
  readonly scheduleId: string;
  /** e.g. 2024-25 */
  readonly season: string;
  readonly games: Game[];
}

export function involvesTeam(game: Game, team: string): boolean {
  return game.homeTeam === team || game.awayTeam === team;
}

export function compareByGameDate(a: Game, b: Game): number {
  return a.gameDate.getTime() - b.gameDate.getTime();
}
