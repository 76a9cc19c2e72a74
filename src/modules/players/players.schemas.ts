import { z } from 'zod';
import { Player } from './players.model';
import { parseOrThrow } from '../../utils/schema.utils';

// ========== Player record ==========
export const playerSchema = z.object({
  playerId: z.string().trim().min(1, 'playerId is required'),
  name: z.string().trim().min(1, 'name is required'),
  team: z.string().trim().min(1, 'team is required').max(5),
  position: z.string().trim().min(1, 'position is required').max(5),
  jerseyNumber: z.number().int().min(0).optional(),
  status: z.enum(['active', 'injured', 'out']).default('active'),
});

export type PlayerInput = z.input<typeof playerSchema>;

/**
 * Build a validated, frozen Player.
 * @throws ValidationException when a required field is missing or malformed
 */
export function parsePlayer(input: unknown): Player {
  return Object.freeze(parseOrThrow(playerSchema, input, 'player'));
}
