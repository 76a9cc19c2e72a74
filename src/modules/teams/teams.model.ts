import { CategoryCode } from '../scoring/category.model';
import { FantasyFormat } from '../scoring/league-format';

export interface Team {
  readonly teamId: string;
  readonly name: string;
  readonly owner: string;
  readonly leagueId: string;
  /** Rostered players, in roster order */
  readonly playerIds: readonly string[];
  readonly wins: number;
  readonly losses: number;
  readonly ties: number;
}

export interface League {
  readonly leagueId: string;
  readonly name: string;
  /** e.g. 2024-25 */
  readonly season: string;
  readonly format: FantasyFormat;
  readonly numTeams: number;
  readonly rosterSize: number;
  /** Only set for category and roto leagues that list their own categories */
  readonly scoringCategories?: readonly CategoryCode[];
}

/**
 * Win-loss-tie record, e.g. 5-3-0
 */
export function teamRecord(team: Team): string {
  return `${team.wins}-${team.losses}-${team.ties}`;
}
