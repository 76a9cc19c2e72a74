/**
 * Data preparation for model-based analytics.
 *
 * Groups game logs for training and flattens stat lines into feature vectors.
 * Model projections themselves are not implemented.
 */

import { StatTracker } from '../stats/stat-tracker.service';
import { StatRecord } from '../stats/stats.model';
import { ModelProjectionStatus } from './analytics.model';

export const FEATURE_NAMES = [
  'minutesPlayed',
  'points',
  'rebounds',
  'assists',
  'steals',
  'blocks',
  'turnovers',
  'fieldGoalsMade',
  'fieldGoalsAttempted',
  'threePointersMade',
  'threePointersAttempted',
  'freeThrowsMade',
  'freeThrowsAttempted',
] as const;

export class AnalyticsPreparationService {
  constructor(private readonly statTracker: StatTracker) {}

  /**
   * Copy of the full game log per requested player, in recording order.
   * Players with no games map to an empty list.
   */
  prepareTrainingData(playerIds: readonly string[]): Map<string, readonly StatRecord[]> {
    const trainingData = new Map<string, readonly StatRecord[]>();
    for (const playerId of playerIds) {
      trainingData.set(playerId, [...this.statTracker.getAllGameStats(playerId)]);
    }
    return trainingData;
  }

  /**
   * Numeric features in FEATURE_NAMES order
   */
  getFeatureVector(stats: StatRecord): number[] {
    return FEATURE_NAMES.map((name) => stats[name]);
  }

  /**
   * Placeholder until a trained model exists
   */
  projectWithModel(_playerId?: string): ModelProjectionStatus {
    return {
      status: 'not_implemented',
      message: 'Model-based projections are not available yet. Use the average-based projection instead.',
    };
  }
}
