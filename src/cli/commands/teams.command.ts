import { Argv } from 'yargs';
import { playerDisplayName } from '../../modules/players/players.model';
import { CliIO, GlobalArgs, openContext, requireTeam } from '../cli-context';
import { formatTeamList, formatTeamRoster } from '../formatters';

export function registerTeamsCommands(cli: Argv<GlobalArgs>, io: CliIO): Argv<GlobalArgs> {
  return cli.command('teams', 'Fantasy teams and their rosters', (teams) =>
    teams
      .command(
        'list',
        'List fantasy teams with their records',
        (y) => y,
        async (args) => {
          const ctx = await openContext(args, io);
          ctx.print(formatTeamList([...ctx.dataset.teams.values()], ctx.dataset.league));
        }
      )
      .command(
        'show',
        'Show one team and its roster',
        (y) => y.option('team-id', { type: 'string', demandOption: true, describe: 'Fantasy team ID' }),
        async (args) => {
          const ctx = await openContext(args, io);
          const team = requireTeam(ctx.dataset, args.teamId);
          const { statTracker } = ctx.dataset.app;
          const names = team.playerIds.map((id) => playerDisplayName(statTracker.getPlayer(id), id));
          ctx.print(formatTeamRoster(team, names));
        }
      )
      .demandCommand(1, 'Choose a teams subcommand')
  );
}
