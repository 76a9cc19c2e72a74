/**
 * Points-league scoring rules
 */

import { StatErrors } from '../../utils/exceptions';

export interface PointsScoringRules {
  // Basic
  readonly pointsPerPoint: number; // e.g., 1.0
  readonly pointsPerRebound: number; // e.g., 1.2
  readonly pointsPerAssist: number; // e.g., 1.5
  readonly pointsPerSteal: number; // e.g., 3.0
  readonly pointsPerBlock: number; // e.g., 3.0
  readonly pointsPerTurnover: number; // usually negative, e.g., -1.0
  // Bonus per three made, on top of the points it scored
  readonly pointsPerThree: number; // e.g., 0.5
  // Shooting
  readonly pointsPerFgm: number;
  readonly pointsPerFga: number; // usually negative when used
  readonly pointsPerFtm: number;
  readonly pointsPerFta: number;
  // Milestones (0 disables the check)
  readonly doubleDoubleBonus: number;
  readonly tripleDoubleBonus: number;
}

export type ScoringRuleKey = keyof PointsScoringRules;

export const DEFAULT_POINTS_SCORING_RULES: PointsScoringRules = Object.freeze({
  pointsPerPoint: 1.0,
  pointsPerRebound: 1.2,
  pointsPerAssist: 1.5,
  pointsPerSteal: 3.0,
  pointsPerBlock: 3.0,
  pointsPerTurnover: -1.0,
  pointsPerThree: 0.5,
  pointsPerFgm: 0,
  pointsPerFga: 0,
  pointsPerFtm: 0,
  pointsPerFta: 0,
  doubleDoubleBonus: 0,
  tripleDoubleBonus: 0,
});

export const SCORING_RULE_KEYS: readonly ScoringRuleKey[] = [
  'pointsPerPoint',
  'pointsPerRebound',
  'pointsPerAssist',
  'pointsPerSteal',
  'pointsPerBlock',
  'pointsPerTurnover',
  'pointsPerThree',
  'pointsPerFgm',
  'pointsPerFga',
  'pointsPerFtm',
  'pointsPerFta',
  'doubleDoubleBonus',
  'tripleDoubleBonus',
];

/**
 * Build a frozen rule set from the defaults plus any overrides.
 * Each call returns a new object; overrides may be zero or negative.
 *
 * @throws ValidationException when an override is not a finite number
 */
export function createPointsScoringRules(
  overrides: Partial<PointsScoringRules> = {}
): PointsScoringRules {
  for (const key of SCORING_RULE_KEYS) {
    const value = overrides[key];
    if (value !== undefined && !Number.isFinite(value)) {
      throw StatErrors.invalidScoringRule(key, value);
    }
  }
  return Object.freeze({ ...DEFAULT_POINTS_SCORING_RULES, ...overrides });
}
