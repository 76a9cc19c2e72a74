import { PointsScoringRules } from './scoring.model';
import { CategorySettings } from './category.model';

export const FANTASY_FORMATS = ['category', 'points', 'roto'] as const;

export type FantasyFormat = (typeof FANTASY_FORMATS)[number];

/**
 * Complete scoring setup for a league. Only the block matching the format is required.
 */
export interface FantasyFormatSettings {
  formatType: FantasyFormat;
  pointsRules?: PointsScoringRules;
  categorySettings?: CategorySettings;
}

/**
 * Points leagues need points rules; category and roto leagues need category settings.
 */
export function validateFormatSettings(settings: FantasyFormatSettings): boolean {
  if (settings.formatType === 'points' && !settings.pointsRules) {
    return false;
  }
  if (
    (settings.formatType === 'category' || settings.formatType === 'roto') &&
    !settings.categorySettings
  ) {
    return false;
  }
  return true;
}
