import { z } from 'zod';
import { StatRecord } from './stats.model';
import { isIsoDate } from '../../shared/utils/date.utils';
import { parseOrThrow } from '../../utils/schema.utils';

const countingStat = z.number().int().min(0).default(0);

// ========== Single-game stat line ==========
// Each field is checked on its own; made/attempted pairs are not cross-checked.
export const statRecordSchema = z.object({
  playerId: z.string().trim().min(1, 'playerId is required'),
  gameDate: z.string().refine(isIsoDate, 'gameDate must be a calendar date (YYYY-MM-DD)'),
  opponent: z.string().trim().min(1, 'opponent is required'),
  minutesPlayed: z.number().min(0).finite().default(0),
  points: countingStat,
  rebounds: countingStat,
  assists: countingStat,
  steals: countingStat,
  blocks: countingStat,
  turnovers: countingStat,
  fieldGoalsMade: countingStat,
  fieldGoalsAttempted: countingStat,
  threePointersMade: countingStat,
  threePointersAttempted: countingStat,
  freeThrowsMade: countingStat,
  freeThrowsAttempted: countingStat,
  offensiveRebounds: countingStat,
  defensiveRebounds: countingStat,
  personalFouls: countingStat,
  plusMinus: z.number().int().optional(),
});

export type StatRecordInput = z.input<typeof statRecordSchema>;

/**
 * Build a validated, frozen StatRecord. Omitted counting stats default to 0.
 * @throws ValidationException on a negative stat or missing identity field
 */
export function parseStatRecord(input: unknown): StatRecord {
  return Object.freeze(parseOrThrow(statRecordSchema, input, 'stat record'));
}
