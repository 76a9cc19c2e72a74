import { z } from 'zod';
import { League, Team } from './teams.model';
import { createCategorySettings } from '../scoring/category.model';
import { fantasyFormatSchema } from '../scoring/scoring.schemas';
import { parseOrThrow } from '../../utils/schema.utils';

const recordCountSchema = z.number().int().min(0).default(0);

// ========== Team ==========
export const teamSchema = z.object({
  teamId: z.string().trim().min(1, 'teamId is required'),
  name: z.string().trim().min(1, 'name is required'),
  owner: z.string().trim().min(1, 'owner is required'),
  leagueId: z.string().trim().min(1, 'leagueId is required'),
  playerIds: z
    .array(z.string().trim().min(1))
    .default([])
    .refine((ids) => new Set(ids).size === ids.length, 'playerIds must not repeat a player'),
  wins: recordCountSchema,
  losses: recordCountSchema,
  ties: recordCountSchema,
});

export type TeamInput = z.input<typeof teamSchema>;

// ========== League ==========
// Category codes are checked by createCategorySettings so unknown ones get INVALID_CATEGORY
export const leagueSchema = z.object({
  leagueId: z.string().trim().min(1, 'leagueId is required'),
  name: z.string().trim().min(1, 'name is required'),
  season: z.string().trim().min(1, 'season is required'),
  format: fantasyFormatSchema,
  numTeams: z.number().int().min(2, 'a league needs at least two teams'),
  rosterSize: z.number().int().min(1, 'rosterSize must be at least 1'),
  scoringCategories: z.array(z.string().min(1)).min(1).optional(),
});

export type LeagueInput = z.input<typeof leagueSchema>;

/**
 * Build a validated, frozen Team.
 * @throws ValidationException when a required field is missing or malformed
 */
export function parseTeam(input: unknown): Team {
  const team = parseOrThrow(teamSchema, input, 'team');
  return Object.freeze({ ...team, playerIds: Object.freeze(team.playerIds) });
}

/**
 * Build a validated, frozen League with normalized category codes.
 * @throws ValidationException for malformed fields or an unknown category
 */
export function parseLeague(input: unknown): League {
  const { scoringCategories, ...league } = parseOrThrow(leagueSchema, input, 'league');
  if (!scoringCategories) {
    return Object.freeze(league);
  }
  return Object.freeze({
    ...league,
    scoringCategories: createCategorySettings({ categories: scoringCategories }).categories,
  });
}
