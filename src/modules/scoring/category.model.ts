/**
 * Category-league settings
 */

import { StatErrors } from '../../utils/exceptions';

export const CATEGORY_CODES = [
  'PTS',
  'REB',
  'AST',
  'STL',
  'BLK',
  'TO',
  '3PM',
  'FGM',
  'FGA',
  'FTM',
  'FTA',
  'FG%',
  '3P%',
  'FT%',
] as const;

export type CategoryCode = (typeof CATEGORY_CODES)[number];

export type PercentageCategory = Extract<CategoryCode, 'FG%' | '3P%' | 'FT%'>;

export interface CategorySettings {
  /** Scored categories in display order, without duplicates */
  readonly categories: readonly CategoryCode[];
  /** When true, fewer turnovers wins the TO category */
  readonly countTurnoversNegative: boolean;
}

export interface CategorySettingsInput {
  categories?: readonly string[];
  countTurnoversNegative?: boolean;
}

export const DEFAULT_CATEGORIES: readonly CategoryCode[] = Object.freeze([
  'PTS',
  'REB',
  'AST',
  'STL',
  'BLK',
  'FG%',
  'FT%',
  '3PM',
  'TO',
]);

export function isCategoryCode(value: string): value is CategoryCode {
  return CATEGORY_CODES.some((code) => code === value);
}

export function isPercentageCategory(code: CategoryCode): code is PercentageCategory {
  return code === 'FG%' || code === '3P%' || code === 'FT%';
}

/**
 * Build frozen category settings. The category list is always copied and
 * de-duplicated (first occurrence keeps its position).
 *
 * @throws ValidationException (INVALID_CATEGORY) for an unknown code
 */
export function createCategorySettings(input: CategorySettingsInput = {}): CategorySettings {
  const requested = input.categories ?? DEFAULT_CATEGORIES;
  const categories: CategoryCode[] = [];

  for (const raw of requested) {
    const code = raw.trim().toUpperCase();
    if (!isCategoryCode(code)) {
      throw StatErrors.unknownCategory(raw);
    }
    if (!categories.includes(code)) {
      categories.push(code);
    }
  }

  return Object.freeze({
    categories: Object.freeze(categories),
    countTurnoversNegative: input.countTurnoversNegative ?? true,
  });
}
