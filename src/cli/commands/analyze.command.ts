import { Argv } from 'yargs';
import {
  DEFAULT_COMPARISON_GAMES,
  DEFAULT_CONSISTENCY_GAMES,
  DEFAULT_PROJECTION_GAMES,
  DEFAULT_TREND_COMPARISON_GAMES,
  DEFAULT_TREND_RECENT_GAMES,
} from '../../modules/analytics/trend-analyzer.service';
import { CliIO, GlobalArgs, openContext, requirePlayer } from '../cli-context';
import {
  formatComparison,
  formatConsistency,
  formatProjection,
  formatTrends,
} from '../formatters';

export function registerAnalyzeCommands(cli: Argv<GlobalArgs>, io: CliIO): Argv<GlobalArgs> {
  return cli.command('analyze', 'Trend and consistency analytics', (analyze) =>
    analyze
      .command(
        'trends',
        'Recent averages against the games before them',
        (y) =>
          y
            .option('player-id', { type: 'string', demandOption: true, describe: 'Player ID' })
            .option('recent', { type: 'number', default: DEFAULT_TREND_RECENT_GAMES, describe: 'Recent window' })
            .option('comparison', {
              type: 'number',
              default: DEFAULT_TREND_COMPARISON_GAMES,
              describe: 'Total games compared',
            }),
        async (args) => {
          const ctx = await openContext(args, io);
          const name = requirePlayer(ctx.dataset, args.playerId);
          const trends = ctx.dataset.app.trendAnalyzer.getTrendingStats(
            args.playerId,
            args.recent,
            args.comparison
          );
          if (Object.keys(trends).length === 0) {
            ctx.print([`Not enough games to compute trends for ${name} (need ${args.comparison}).`]);
            return;
          }
          ctx.print(formatTrends(name, trends));
        }
      )
      .command(
        'consistency',
        'Game-to-game variation of points, rebounds and assists',
        (y) =>
          y
            .option('player-id', { type: 'string', demandOption: true, describe: 'Player ID' })
            .option('games', { type: 'number', default: DEFAULT_CONSISTENCY_GAMES, describe: 'Number of games' }),
        async (args) => {
          const ctx = await openContext(args, io);
          const name = requirePlayer(ctx.dataset, args.playerId);
          const report = ctx.dataset.app.trendAnalyzer.getConsistencyScore(args.playerId, args.games);
          if (Object.keys(report).length === 0) {
            ctx.print([`Not enough games to measure consistency for ${name}.`]);
            return;
          }
          ctx.print(formatConsistency(name, report));
        }
      )
      .command(
        'project',
        'Average-based projection for the next game',
        (y) =>
          y
            .option('player-id', { type: 'string', demandOption: true, describe: 'Player ID' })
            .option('games', { type: 'number', default: DEFAULT_PROJECTION_GAMES, describe: 'Number of games' })
            .option('opponent', { type: 'string', describe: 'Opponent team (display only)' }),
        async (args) => {
          const ctx = await openContext(args, io);
          const name = requirePlayer(ctx.dataset, args.playerId);
          const projection = ctx.dataset.app.trendAnalyzer.projectNextGame(
            args.playerId,
            args.games,
            args.opponent
          );
          ctx.print(projection ? formatProjection(name, projection) : [`No games to project from for ${name}.`]);
        }
      )
      .command(
        'compare',
        'Compare recent averages of two players',
        (y) =>
          y
            .option('player-a', { type: 'string', demandOption: true, describe: 'First player ID' })
            .option('player-b', { type: 'string', demandOption: true, describe: 'Second player ID' })
            .option('games', { type: 'number', default: DEFAULT_COMPARISON_GAMES, describe: 'Number of games' }),
        async (args) => {
          const ctx = await openContext(args, io);
          const nameA = requirePlayer(ctx.dataset, args.playerA);
          const nameB = requirePlayer(ctx.dataset, args.playerB);
          const comparison = ctx.dataset.app.trendAnalyzer.comparePlayers(
            args.playerA,
            args.playerB,
            args.games
          );
          ctx.print(
            comparison
              ? formatComparison(nameA, nameB, comparison)
              : [`Both players need at least one game to compare.`]
          );
        }
      )
      .demandCommand(1, 'Choose an analyze subcommand')
  );
}
