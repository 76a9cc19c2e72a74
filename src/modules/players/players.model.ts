export type PlayerStatus = 'active' | 'injured' | 'out';

export interface Player {
  readonly playerId: string;
  readonly name: string;
  /** NBA team abbreviation, e.g. LAL */
  readonly team: string;
  /** PG, SG, SF, PF or C (not enforced) */
  readonly position: string;
  readonly jerseyNumber?: number;
  readonly status: PlayerStatus;
}

export function playerDisplayName(player: Player | undefined, fallbackId: string): string {
  return player ? player.name : fallbackId;
}
