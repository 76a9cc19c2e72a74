/**
 * Plain-text renderers for CLI output. Each returns the lines to print.
 */

import { Player } from '../modules/players/players.model';
import { SeasonSummary, StatRecord } from '../modules/stats/stats.model';
import { CategoryMatchup, CategoryResult } from '../modules/scoring/category-comparator';
import { isPercentageCategory } from '../modules/scoring/category.model';
import {
  ConsistencyKey,
  ConsistencyReport,
  GameProjection,
  ModelProjectionStatus,
  PlayerComparison,
  TrendKey,
  TrendReport,
} from '../modules/analytics/analytics.model';
import { Game } from '../modules/schedule/schedule.model';
import { League, Team, teamRecord } from '../modules/teams/teams.model';
import { formatGameTime, toIsoDate } from '../shared/utils/date.utils';

const RULE = '-'.repeat(60);
const WIDE_RULE = '-'.repeat(80);
const DOUBLE_RULE = '='.repeat(60);

const TREND_LABELS: ReadonlyArray<readonly [TrendKey, string]> = [
  ['pointsChange', 'Points'],
  ['reboundsChange', 'Rebounds'],
  ['assistsChange', 'Assists'],
];

const CONSISTENCY_LABELS: ReadonlyArray<readonly [ConsistencyKey, string]> = [
  ['pointsCv', 'Points'],
  ['reboundsCv', 'Rebounds'],
  ['assistsCv', 'Assists'],
];

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function formatSigned(value: number): string {
  const fixed = value.toFixed(1);
  return value > 0 ? `+${fixed}` : fixed;
}

export function formatPlayerList(players: readonly Player[]): string[] {
  if (players.length === 0) {
    return ['No players found.'];
  }
  return [
    'Players:',
    RULE,
    ...players.map((p) => `${p.name.padEnd(30)} ${p.team.padEnd(5)} ${p.position}`),
  ];
}

export function formatLeagueHeader(league: League, teamCount: number): string {
  return `${league.name} ${league.season} (${league.format}): ${teamCount}/${league.numTeams} teams, rosters of ${league.rosterSize}`;
}

export function formatTeamList(teams: readonly Team[], league?: League): string[] {
  const header = league ? [formatLeagueHeader(league, teams.length)] : [];
  if (teams.length === 0) {
    return [...header, 'No teams found.'];
  }
  return [
    ...header,
    'Teams:',
    RULE,
    ...teams.map(
      (t) => `${t.name.padEnd(24)} ${t.owner.padEnd(16)} ${teamRecord(t).padStart(8)}  ${t.playerIds.length} players`
    ),
  ];
}

/**
 * Team header and roster. `rosterNames` lines up with `team.playerIds`.
 */
export function formatTeamRoster(team: Team, rosterNames: readonly string[]): string[] {
  return [
    `${team.name} (owner: ${team.owner}, record ${teamRecord(team)})`,
    RULE,
    ...(rosterNames.length === 0 ? ['Empty roster.'] : rosterNames.map((name) => `  ${name}`)),
  ];
}

export function formatRecentGames(playerName: string, games: readonly StatRecord[]): string[] {
  const header = ['Date'.padEnd(10), 'Opp'.padEnd(5), ...['MIN', 'PTS', 'REB', 'AST', 'STL', 'BLK'].map((h) => h.padStart(5))];
  return [
    `Recent games for ${playerName}:`,
    WIDE_RULE,
    header.join(' '),
    WIDE_RULE,
    ...games.map((g) =>
      [
        g.gameDate.padEnd(10),
        g.opponent.padEnd(5),
        g.minutesPlayed.toFixed(1).padStart(5),
        ...[g.points, g.rebounds, g.assists, g.steals, g.blocks].map((v) => String(v).padStart(5)),
      ].join(' ')
    ),
  ];
}

export function formatSeasonSummary(playerName: string, summary: SeasonSummary): string[] {
  const lines = [
    `${summary.season} Season Stats for ${playerName}:`,
    RULE,
    `Games Played: ${summary.gamesPlayed}`,
    'Averages:',
    `  Points:   ${summary.avgPoints.toFixed(1)}`,
    `  Rebounds: ${summary.avgRebounds.toFixed(1)}`,
    `  Assists:  ${summary.avgAssists.toFixed(1)}`,
    `  Steals:   ${summary.avgSteals.toFixed(1)}`,
    `  Blocks:   ${summary.avgBlocks.toFixed(1)}`,
    `  Minutes:  ${summary.avgMinutes.toFixed(1)}`,
  ];

  const shooting: Array<[string, number | null]> = [
    ['FG%', summary.fieldGoalPercentage],
    ['3P%', summary.threePointPercentage],
    ['FT%', summary.freeThrowPercentage],
  ];
  const shown = shooting.filter((entry): entry is [string, number] => entry[1] !== null);
  if (shown.length > 0) {
    lines.push('Shooting:');
    for (const [label, pct] of shown) {
      lines.push(`  ${label}:  ${formatPercent(pct)}`);
    }
  }

  return lines;
}

export interface FantasyGameLine {
  game: StatRecord;
  fantasyPoints: number;
}

export function formatFantasyPoints(
  playerName: string,
  rows: readonly FantasyGameLine[],
  average: number
): string[] {
  return [
    `Fantasy Points for ${playerName} (last ${rows.length} games):`,
    RULE,
    ...rows.map(
      ({ game, fantasyPoints }) =>
        `${game.gameDate} vs ${game.opponent.padEnd(5)}: ${fantasyPoints.toFixed(1)} FPTS`
    ),
    RULE,
    `Average: ${average.toFixed(1)} FPTS`,
  ];
}

function formatCategoryValue(result: CategoryResult, value: number): string {
  return isPercentageCategory(result.category) ? value.toFixed(3) : String(value);
}

export function formatCategoryMatchup(
  nameA: string,
  nameB: string,
  results: readonly CategoryResult[],
  matchup: CategoryMatchup
): string[] {
  const winnerLabel = (result: CategoryResult): string => {
    if (result.winner === 'A') return nameA;
    if (result.winner === 'B') return nameB;
    return 'tie';
  };

  return [
    `Category Matchup: ${nameA} vs ${nameB}`,
    DOUBLE_RULE,
    ...results.map(
      (r) =>
        `${r.category.padEnd(5)} ${formatCategoryValue(r, r.valueA).padStart(10)} ${formatCategoryValue(r, r.valueB).padStart(10)}  ${winnerLabel(r)}`
    ),
    DOUBLE_RULE,
    `Result: ${matchup.winsA}-${matchup.winsB}-${matchup.ties} (${nameA} wins - ${nameB} wins - ties)`,
  ];
}

function trendArrow(change: number): string {
  if (change > 0) return '↑';
  if (change < 0) return '↓';
  return '→';
}

export function formatTrends(playerName: string, trends: TrendReport): string[] {
  const lines = [`Performance Trends for ${playerName}:`, RULE];
  for (const [key, label] of TREND_LABELS) {
    const change = trends[key];
    if (change === undefined) continue;
    lines.push(`${label.padEnd(10)}: ${formatSigned(change)}% ${trendArrow(change)}`);
  }
  return lines;
}

export function consistencyRating(cv: number): string {
  if (cv < 20) return 'Very Consistent';
  if (cv < 40) return 'Consistent';
  return 'Inconsistent';
}

export function formatConsistency(playerName: string, report: ConsistencyReport): string[] {
  const lines = [
    `Consistency Analysis for ${playerName}:`,
    RULE,
    '(Lower coefficient of variation = more consistent)',
  ];
  for (const [key, label] of CONSISTENCY_LABELS) {
    const cv = report[key];
    if (cv === undefined) continue;
    lines.push(`${label.padEnd(10)}: ${cv.toFixed(1).padStart(5)}% - ${consistencyRating(cv)}`);
  }
  return lines;
}

export function formatProjection(playerName: string, projection: GameProjection): string[] {
  const against = projection.opponent ? ` vs ${projection.opponent}` : '';
  return [
    `Projection for ${playerName}${against} (last ${projection.gamesUsed} games):`,
    RULE,
    `  Points:   ${projection.projectedPoints.toFixed(1)} (std ${projection.pointsStd.toFixed(1)})`,
    `  Rebounds: ${projection.projectedRebounds.toFixed(1)}`,
    `  Assists:  ${projection.projectedAssists.toFixed(1)}`,
    `  Steals:   ${projection.projectedSteals.toFixed(1)}`,
    `  Blocks:   ${projection.projectedBlocks.toFixed(1)}`,
  ];
}

export function formatComparison(nameA: string, nameB: string, comparison: PlayerComparison): string[] {
  const rows: Array<[string, number, number, number]> = [
    ['Points', comparison.playerA.avgPoints, comparison.playerB.avgPoints, comparison.difference.points],
    ['Rebounds', comparison.playerA.avgRebounds, comparison.playerB.avgRebounds, comparison.difference.rebounds],
    ['Assists', comparison.playerA.avgAssists, comparison.playerB.avgAssists, comparison.difference.assists],
  ];

  const lines = [`Player Comparison: ${nameA} vs ${nameB}`, DOUBLE_RULE];
  for (const [label, valueA, valueB, diff] of rows) {
    lines.push(
      `${label}:`,
      `  ${nameA.padEnd(30)}: ${valueA.toFixed(1)}`,
      `  ${nameB.padEnd(30)}: ${valueB.toFixed(1)}`,
      `  ${'Difference'.padEnd(30)}: ${formatSigned(diff)}`
    );
  }
  return lines;
}

export function formatUpcomingGames(games: readonly Game[], days: number, team?: string): string[] {
  if (games.length === 0) {
    return ['No upcoming games found.'];
  }
  const title = `Upcoming games${team ? ` for ${team}` : ''} (next ${days} days):`;
  return [title, RULE, ...games.map((g) => `${formatGameTime(g.gameDate)} - ${g.awayTeam} @ ${g.homeTeam}`)];
}

export function formatGameDetail(game: Game): string[] {
  const lines = [
    `Game ${game.gameId}: ${game.awayTeam} @ ${game.homeTeam}`,
    RULE,
    `Tip-off: ${formatGameTime(game.gameDate)} UTC`,
    `Status: ${game.status}`,
  ];
  if (game.homeScore !== undefined && game.awayScore !== undefined) {
    lines.push(`Score: ${game.awayTeam} ${game.awayScore} - ${game.homeTeam} ${game.homeScore}`);
  }
  return lines;
}

export function formatBackToBacks(team: string, pairs: ReadonlyArray<readonly [Game, Game]>): string[] {
  if (pairs.length === 0) {
    return [`No back-to-back games found for ${team}.`];
  }
  const describe = (g: Game) => `${toIsoDate(g.gameDate)} ${g.awayTeam} @ ${g.homeTeam}`;
  return [
    `Back-to-back games for ${team}:`,
    RULE,
    ...pairs.map(([first, second]) => `${describe(first)}  ->  ${describe(second)}`),
  ];
}

export interface TrainingDataSummary {
  players: number;
  games: number;
  features: number;
}

export function formatModelStatus(status: ModelProjectionStatus, training: TrainingDataSummary): string[] {
  return [
    'Model Analytics Status',
    DOUBLE_RULE,
    `Status: ${status.status}`,
    status.message,
    `Training data: ${training.games} games across ${training.players} players (${training.features} features)`,
    'Planned:',
    '  - Model-based player projections',
    '  - Matchup-adjusted predictions',
    '  - Player similarity clustering',
  ];
}
