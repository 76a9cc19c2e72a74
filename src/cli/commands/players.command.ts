import { Argv } from 'yargs';
import { CliIO, GlobalArgs, openContext } from '../cli-context';
import { formatPlayerList } from '../formatters';

export function registerPlayersCommands(cli: Argv<GlobalArgs>, io: CliIO): Argv<GlobalArgs> {
  return cli.command('players', 'Player profiles', (players) =>
    players
      .command(
        'list',
        'List every player in the dataset',
        (y) => y,
        async (args) => {
          const ctx = await openContext(args, io);
          ctx.print(formatPlayerList(ctx.dataset.app.statTracker.listPlayers()));
        }
      )
      .demandCommand(1, 'Choose a players subcommand')
  );
}
