import { Argv } from 'yargs';
import { DEFAULT_UPCOMING_DAYS } from '../../modules/schedule/schedule-manager.service';
import { parseUtcDateTime } from '../../shared/utils/date.utils';
import { ScheduleErrors } from '../../utils/exceptions';
import { CliIO, GlobalArgs, openContext } from '../cli-context';
import { formatBackToBacks, formatGameDetail, formatUpcomingGames } from '../formatters';

export function registerScheduleCommands(cli: Argv<GlobalArgs>, io: CliIO): Argv<GlobalArgs> {
  return cli.command('schedule', 'Team schedules', (schedule) =>
    schedule
      .command(
        'upcoming',
        'Games in the next few days',
        (y) =>
          y
            .option('days', { type: 'number', default: DEFAULT_UPCOMING_DAYS, describe: 'Days ahead' })
            .option('team', { type: 'string', describe: 'Only games involving this team' })
            .option('now', { type: 'string', describe: 'Reference time (ISO), defaults to the current time' }),
        async (args) => {
          const ctx = await openContext(args, io);
          let now = ctx.now();
          if (args.now !== undefined) {
            const parsed = parseUtcDateTime(args.now);
            if (!parsed) {
              throw ScheduleErrors.invalidDateTime(args.now);
            }
            now = parsed;
          }

          const games = ctx.dataset.app.scheduleManager.getUpcomingGames({
            daysAhead: args.days,
            team: args.team,
            now,
          });
          ctx.print(formatUpcomingGames(games, args.days, args.team));
        }
      )
      .command(
        'game',
        'Look up one game by id',
        (y) => y.option('game-id', { type: 'string', demandOption: true, describe: 'Game ID' }),
        async (args) => {
          const ctx = await openContext(args, io);
          const game = ctx.dataset.app.scheduleManager.getGame(args.gameId);
          if (!game) {
            throw ScheduleErrors.gameNotFound(args.gameId);
          }
          ctx.print(formatGameDetail(game));
        }
      )
      .command(
        'back-to-backs',
        'Consecutive-day games for a team',
        (y) =>
          y
            .option('team', { type: 'string', demandOption: true, describe: 'Team abbreviation' })
            .option('season', { type: 'string', describe: 'Season label' }),
        async (args) => {
          const ctx = await openContext(args, io);
          const pairs = ctx.dataset.app.scheduleManager.getBackToBackGames(args.team, args.season);
          ctx.print(formatBackToBacks(args.team, pairs));
        }
      )
      .demandCommand(1, 'Choose a schedule subcommand')
  );
}
