import { z } from 'zod';
import { FANTASY_FORMATS } from './league-format';

// ========== Category settings ==========
// Codes are checked by createCategorySettings so unknown ones get INVALID_CATEGORY
export const categorySettingsSchema = z
  .object({
    categories: z.array(z.string().min(1)).min(1, 'at least one category is required').optional(),
    countTurnoversNegative: z.boolean().optional(),
  })
  .strict();


// ========== League format ==========
export const fantasyFormatSchema = z.enum(FANTASY_FORMATS);
