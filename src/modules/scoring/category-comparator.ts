import { StatRecord } from '../stats/stats.model';
import { sumBy } from '../../domain/stats/descriptive';
import {
  CategoryCode,
  CategorySettings,
  PercentageCategory,
  isPercentageCategory,
} from './category.model';

export type CategoryTotals = ReadonlyMap<CategoryCode, number>;

export type CategoryWinner = 'A' | 'B' | 'tie';

export interface CategoryResult {
  category: CategoryCode;
  valueA: number;
  valueB: number;
  winner: CategoryWinner;
}

export interface CategoryMatchup {
  winsA: number;
  winsB: number;
  ties: number;
}

interface ShootingPair {
  made: (stats: StatRecord) => number;
  attempted: (stats: StatRecord) => number;
}

function shootingPair(category: PercentageCategory): ShootingPair {
  switch (category) {
    case 'FG%':
      return { made: (s) => s.fieldGoalsMade, attempted: (s) => s.fieldGoalsAttempted };
    case '3P%':
      return { made: (s) => s.threePointersMade, attempted: (s) => s.threePointersAttempted };
    case 'FT%':
      return { made: (s) => s.freeThrowsMade, attempted: (s) => s.freeThrowsAttempted };
  }
}

function ratioOrZero(made: number, attempted: number): number {
  return attempted > 0 ? made / attempted : 0;
}

/**
 * Value of one category for a single game. Percentages here are that game's
 * own make rate; aggregate percentages come from aggregateCategories.
 */
export function getCategoryValue(stats: StatRecord, category: CategoryCode): number {
  switch (category) {
    case 'PTS':
      return stats.points;
    case 'REB':
      return stats.rebounds;
    case 'AST':
      return stats.assists;
    case 'STL':
      return stats.steals;
    case 'BLK':
      return stats.blocks;
    case 'TO':
      return stats.turnovers;
    case '3PM':
      return stats.threePointersMade;
    case 'FGM':
      return stats.fieldGoalsMade;
    case 'FGA':
      return stats.fieldGoalsAttempted;
    case 'FTM':
      return stats.freeThrowsMade;
    case 'FTA':
      return stats.freeThrowsAttempted;
    case 'FG%':
    case '3P%':
    case 'FT%': {
      const pair = shootingPair(category);
      return ratioOrZero(pair.made(stats), pair.attempted(stats));
    }
    default: {
      const unhandled: never = category;
      throw new Error(`Unhandled category: ${String(unhandled)}`);
    }
  }
}

/**
 * Compares aggregated stats category by category for head-to-head leagues.
 */
export class CategoryComparator {
  constructor(readonly settings: CategorySettings) {}

  getCategoryValue(stats: StatRecord, category: CategoryCode): number {
    return getCategoryValue(stats, category);
  }

  /**
   * Totals per configured category. Counting stats are summed; percentages are
   * total made / total attempted across all games, not a mean of per-game rates.
   */
  aggregateCategories(games: readonly StatRecord[]): CategoryTotals {
    const totals = new Map<CategoryCode, number>();

    for (const category of this.settings.categories) {
      if (isPercentageCategory(category)) {
        const pair = shootingPair(category);
        totals.set(category, ratioOrZero(sumBy(games, pair.made), sumBy(games, pair.attempted)));
      } else {
        totals.set(category, sumBy(games, (g) => getCategoryValue(g, category)));
      }
    }

    return totals;
  }

  /**
   * Per-category outcome of side A against side B, in configured order
   */
  compareCategoriesDetailed(
    gamesA: readonly StatRecord[],
    gamesB: readonly StatRecord[]
  ): CategoryResult[] {
    const totalsA = this.aggregateCategories(gamesA);
    const totalsB = this.aggregateCategories(gamesB);

    return this.settings.categories.map((category) => {
      const valueA = totalsA.get(category) ?? 0;
      const valueB = totalsB.get(category) ?? 0;
      const lowerWins = category === 'TO' && this.settings.countTurnoversNegative;
      return { category, valueA, valueB, winner: decideWinner(valueA, valueB, lowerWins) };
    });
  }

  /**
   * Win/loss/tie tally. winsA + winsB + ties always equals the category count.
   */
  compareCategories(gamesA: readonly StatRecord[], gamesB: readonly StatRecord[]): CategoryMatchup {
    const matchup: CategoryMatchup = { winsA: 0, winsB: 0, ties: 0 };

    for (const result of this.compareCategoriesDetailed(gamesA, gamesB)) {
      if (result.winner === 'A') matchup.winsA++;
      else if (result.winner === 'B') matchup.winsB++;
      else matchup.ties++;
    }

    return matchup;
  }
}

function decideWinner(valueA: number, valueB: number, lowerWins: boolean): CategoryWinner {
  if (valueA === valueB) return 'tie';
  const aAhead = lowerWins ? valueA < valueB : valueA > valueB;
  return aAhead ? 'A' : 'B';
}
