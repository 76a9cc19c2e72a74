import {
  PointsScoringRules,
  ScoringRuleKey,
  SCORING_RULE_KEYS,
  createPointsScoringRules,
} from './scoring.model';
import { StatErrors } from '../../utils/exceptions';

type AnyObj = Record<string, unknown>;

/**
 * Flat snake_case keys used by league settings exports and CLI scoring files.
 */
const FLAT_KEY_TO_RULE: ReadonlyMap<string, ScoringRuleKey> = new Map(Object.entries({
  points_per_point: 'pointsPerPoint',
  points_per_rebound: 'pointsPerRebound',
  points_per_assist: 'pointsPerAssist',
  points_per_steal: 'pointsPerSteal',
  points_per_block: 'pointsPerBlock',
  points_per_turnover: 'pointsPerTurnover',
  points_per_three: 'pointsPerThree',
  points_per_fgm: 'pointsPerFgm',
  points_per_fga: 'pointsPerFga',
  points_per_ftm: 'pointsPerFtm',
  points_per_fta: 'pointsPerFta',
  points_per_double_double: 'doubleDoubleBonus',
  points_per_triple_double: 'tripleDoubleBonus',
} satisfies Record<string, ScoringRuleKey>));

function isPlainObject(value: unknown): value is AnyObj {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRuleKey(key: string): key is ScoringRuleKey {
  return SCORING_RULE_KEYS.some((ruleKey) => ruleKey === key);
}

function toNumber(key: string, v: unknown): number {
  const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : v;
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    throw StatErrors.invalidScoringRule(key, v);
  }
  return n;
}

/**
 * Normalizes points-league scoring settings from either format into PointsScoringRules.
 * Supports:
 * 1) Nested: { rules: { pointsPerRebound: 1.2, ... } }
 * 2) Flat: { points_per_rebound: 1.2, points_per_double_double: 2, ... }
 *
 * Camel-case keys at the top level are accepted too. Unknown keys are ignored;
 * numeric strings are converted; anything else non-numeric is rejected.
 */
export function normalizeScoringSettings(
  scoringSettings: AnyObj | null | undefined
): PointsScoringRules {
  const ss = scoringSettings || {};
  const overrides: Partial<Record<ScoringRuleKey, number>> = {};

  // Format 1: nested
  const source = isPlainObject(ss.rules) ? ss.rules : ss;

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined || value === null) continue;
    // Format 2: flat snake_case
    const flatKey = FLAT_KEY_TO_RULE.get(key);
    if (flatKey) {
      overrides[flatKey] = toNumber(key, value);
    } else if (isRuleKey(key)) {
      overrides[key] = toNumber(key, value);
    }
  }

  return createPointsScoringRules(overrides);
}
