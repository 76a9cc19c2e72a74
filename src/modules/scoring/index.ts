export {
  PointsScoringRules,
  ScoringRuleKey,
  DEFAULT_POINTS_SCORING_RULES,
  SCORING_RULE_KEYS,
  createPointsScoringRules,
} from './scoring.model';
export {
  ScoringCalculator,
  calculateFantasyPoints,
  calculateTotalPoints,
  calculateAveragePoints,
  countDoubleDigitCategories,
  isDoubleDouble,
  isTripleDouble,
} from './scoring-calculator';
export { normalizeScoringSettings } from './scoring-settings-normalizer';
export {
  CategoryCode,
  CategorySettings,
  CategorySettingsInput,
  PercentageCategory,
  CATEGORY_CODES,
  DEFAULT_CATEGORIES,
  createCategorySettings,
  isCategoryCode,
  isPercentageCategory,
} from './category.model';
export {
  CategoryComparator,
  CategoryMatchup,
  CategoryResult,
  CategoryTotals,
  CategoryWinner,
  getCategoryValue,
} from './category-comparator';
export {
  FantasyFormat,
  FantasyFormatSettings,
  FANTASY_FORMATS,
  validateFormatSettings,
} from './league-format';
export {
  categorySettingsSchema,
  fantasyFormatSchema,
} from './scoring.schemas';
