import { Argv } from 'yargs';
import { FEATURE_NAMES } from '../../modules/analytics/analytics-preparation.service';
import { CliIO, GlobalArgs, openContext } from '../cli-context';
import { formatModelStatus } from '../formatters';

export function registerAiStatusCommand(cli: Argv<GlobalArgs>, io: CliIO): Argv<GlobalArgs> {
  return cli.command(
    'ai-status',
    'Show the state of model-based projections and the data prepared for them',
    (y) => y.option('player-id', { type: 'string', describe: 'Limit training data to one player' }),
    async (args) => {
      const ctx = await openContext(args, io);
      const { statTracker, analyticsPreparation } = ctx.dataset.app;

      const playerIds = args.playerId
        ? [args.playerId]
        : statTracker.listPlayers().map((player) => player.playerId);
      const training = analyticsPreparation.prepareTrainingData(playerIds);
      let games = 0;
      for (const log of training.values()) {
        games += log.length;
      }

      ctx.print(
        formatModelStatus(analyticsPreparation.projectWithModel(args.playerId), {
          players: training.size,
          games,
          features: FEATURE_NAMES.length,
        })
      );
    }
  );
}
