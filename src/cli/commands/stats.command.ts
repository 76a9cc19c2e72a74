import { Argv } from 'yargs';
import { DEFAULT_RECENT_GAMES } from '../../modules/stats/stat-tracker.service';
import { CliIO, GlobalArgs, openContext, requirePlayer } from '../cli-context';
import { formatRecentGames, formatSeasonSummary } from '../formatters';

export function registerStatsCommands(cli: Argv<GlobalArgs>, io: CliIO): Argv<GlobalArgs> {
  return cli.command('stats', 'Player box scores', (stats) =>
    stats
      .command(
        'show',
        'Show a player\'s most recent games',
        (y) =>
          y
            .option('player-id', { type: 'string', demandOption: true, describe: 'Player ID' })
            .option('games', { type: 'number', default: DEFAULT_RECENT_GAMES, describe: 'Number of games' }),
        async (args) => {
          const ctx = await openContext(args, io);
          const name = requirePlayer(ctx.dataset, args.playerId);
          const games = ctx.dataset.app.statTracker.getLastNGames(args.playerId, args.games);
          ctx.print(formatRecentGames(name, games));
        }
      )
      .command(
        'season',
        'Show season totals and averages',
        (y) =>
          y
            .option('player-id', { type: 'string', demandOption: true, describe: 'Player ID' })
            .option('season', { type: 'string', describe: 'Season label, e.g. 2024-25' }),
        async (args) => {
          const ctx = await openContext(args, io);
          const name = requirePlayer(ctx.dataset, args.playerId);
          const season = args.season ?? ctx.dataset.season ?? ctx.env.DEFAULT_SEASON;
          const summary = ctx.dataset.app.statTracker.calculateSeasonStats(args.playerId, season);
          ctx.print(summary ? formatSeasonSummary(name, summary) : [`No stats found for ${name}.`]);
        }
      )
      .demandCommand(1, 'Choose a stats subcommand')
  );
}
