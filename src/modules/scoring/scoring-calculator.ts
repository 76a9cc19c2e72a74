import { StatRecord } from '../stats/stats.model';
import { PointsScoringRules } from './scoring.model';

/**
 * Pure scoring calculation utilities.
 * These functions have no dependencies and can be used anywhere scoring is needed.
 */

const MILESTONE_THRESHOLD = 10;

/**
 * How many of points, rebounds, assists, steals and blocks reached double digits
 */
export function countDoubleDigitCategories(stats: StatRecord): number {
  return [stats.points, stats.rebounds, stats.assists, stats.steals, stats.blocks].filter(
    (value) => value >= MILESTONE_THRESHOLD
  ).length;
}

export function isDoubleDouble(stats: StatRecord): boolean {
  return countDoubleDigitCategories(stats) >= 2;
}

export function isTripleDouble(stats: StatRecord): boolean {
  return countDoubleDigitCategories(stats) >= 3;
}

/**
 * Calculate fantasy points for one game using the given rules.
 * A triple-double also satisfies the double-double check, so it earns both bonuses.
 */
export function calculateFantasyPoints(stats: StatRecord, rules: PointsScoringRules): number {
  let points = 0;

  // Basic
  points += stats.points * rules.pointsPerPoint;
  points += stats.rebounds * rules.pointsPerRebound;
  points += stats.assists * rules.pointsPerAssist;
  points += stats.steals * rules.pointsPerSteal;
  points += stats.blocks * rules.pointsPerBlock;
  points += stats.turnovers * rules.pointsPerTurnover;

  // Threes
  points += stats.threePointersMade * rules.pointsPerThree;

  // Shooting
  points += stats.fieldGoalsMade * rules.pointsPerFgm;
  points += stats.fieldGoalsAttempted * rules.pointsPerFga;
  points += stats.freeThrowsMade * rules.pointsPerFtm;
  points += stats.freeThrowsAttempted * rules.pointsPerFta;

  // Milestone bonuses
  if (rules.doubleDoubleBonus !== 0 && isDoubleDouble(stats)) {
    points += rules.doubleDoubleBonus;
  }
  if (rules.tripleDoubleBonus !== 0 && isTripleDouble(stats)) {
    points += rules.tripleDoubleBonus;
  }

  return points;
}

export function calculateTotalPoints(games: readonly StatRecord[], rules: PointsScoringRules): number {
  let total = 0;
  for (const game of games) {
    total += calculateFantasyPoints(game, rules);
  }
  return total;
}

/**
 * Average fantasy points per game; 0 for no games.
 */
export function calculateAveragePoints(
  games: readonly StatRecord[],
  rules: PointsScoringRules
): number {
  if (games.length === 0) return 0;
  return calculateTotalPoints(games, rules) / games.length;
}

/**
 * Scoring calculator bound to one rule set. Rules are frozen, so one set can
 * back any number of calculators.
 */
export class ScoringCalculator {
  constructor(readonly rules: PointsScoringRules) {}

  calculateFantasyPoints(stats: StatRecord): number {
    return calculateFantasyPoints(stats, this.rules);
  }

  calculateTotalPoints(games: readonly StatRecord[]): number {
    return calculateTotalPoints(games, this.rules);
  }

  calculateAveragePoints(games: readonly StatRecord[]): number {
    return calculateAveragePoints(games, this.rules);
  }
}
