import { z } from 'zod';
import { Game, Schedule } from './schedule.model';
import { parseUtcDateTime } from '../../shared/utils/date.utils';
import { parseOrThrow } from '../../utils/schema.utils';

const gameDateSchema = z.union([z.date(), z.string()]).transform((value, ctx) => {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'gameDate is not a valid date' });
      return z.NEVER;
    }
    return value;
  }
  const parsed = parseUtcDateTime(value);
  if (!parsed) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'gameDate must be an ISO date-time such as 2025-10-26T19:30',
    });
    return z.NEVER;
  }
  return parsed;
});

// ========== Game ==========
export const gameSchema = z.object({
  gameId: z.string().trim().min(1, 'gameId is required'),
  gameDate: gameDateSchema,
  homeTeam: z.string().trim().min(1, 'homeTeam is required'),
  awayTeam: z.string().trim().min(1, 'awayTeam is required'),
  homeScore: z.number().int().min(0).optional(),
  awayScore: z.number().int().min(0).optional(),
  status: z.enum(['scheduled', 'in_progress', 'final']).default('scheduled'),
});

export type GameInput = z.input<typeof gameSchema>;

// ========== Schedule ==========
export const scheduleSchema = z.object({
  scheduleId: z.string().trim().min(1, 'scheduleId is required'),
  season: z.string().trim().min(1, 'season is required'),
  games: z.array(gameSchema).default([]),
});

export type ScheduleInput = z.input<typeof scheduleSchema>;

/**
 * @throws ValidationException when a field is missing or the date cannot be parsed
 */
export function parseGame(input: unknown): Game {
  return Object.freeze(parseOrThrow(gameSchema, input, 'game'));
}

export function parseSchedule(input: unknown): Schedule {
  const schedule = parseOrThrow(scheduleSchema, input, 'schedule');
  return { ...schedule, games: schedule.games.map((game) => Object.freeze(game)) };
}
