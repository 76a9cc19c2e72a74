export {
  TrendReport,
  TrendKey,
  ConsistencyReport,
  ConsistencyKey,
  GameProjection,
  PlayerAverages,
  PlayerComparison,
  ModelProjectionStatus,
} from './analytics.model';
export {
  TrendAnalyzer,
  DEFAULT_TREND_RECENT_GAMES,
  DEFAULT_TREND_COMPARISON_GAMES,
  DEFAULT_CONSISTENCY_GAMES,
  DEFAULT_PROJECTION_GAMES,
  DEFAULT_COMPARISON_GAMES,
} from './trend-analyzer.service';
export { AnalyticsPreparationService, FEATURE_NAMES } from './analytics-preparation.service';
