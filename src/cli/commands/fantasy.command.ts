import { Argv } from 'yargs';
import { z } from 'zod';
import { DEFAULT_RECENT_GAMES } from '../../modules/stats/stat-tracker.service';
import { ScoringCalculator } from '../../modules/scoring/scoring-calculator';
import { CategoryComparator } from '../../modules/scoring/category-comparator';
import { normalizeScoringSettings } from '../../modules/scoring/scoring-settings-normalizer';
import { PointsScoringRules } from '../../modules/scoring/scoring.model';
import { StatRecord } from '../../modules/stats/stats.model';
import { getRosterGames } from '../../modules/teams/teams.service';
import { ValidationException } from '../../utils/exceptions';
import { parseOrThrow } from '../../utils/schema.utils';
import { CliIO, CommandContext, GlobalArgs, openContext, requirePlayer, requireTeam } from '../cli-context';
import { readJsonFile } from '../dataset-loader';
import { formatCategoryMatchup, formatFantasyPoints } from '../formatters';

const scoringFileSchema = z.record(z.unknown());

async function loadScoringFile(filePath: string): Promise<PointsScoringRules> {
  const raw = parseOrThrow(scoringFileSchema, await readJsonFile(filePath), 'scoring file');
  return normalizeScoringSettings(raw);
}

interface MatchupSide {
  name: string;
  games: StatRecord[];
}

/**
 * One side of a category matchup: a single player, or a fantasy team whose
 * rostered players' recent games are pooled.
 */
function resolveSide(
  ctx: CommandContext,
  side: 'a' | 'b',
  playerId: string | undefined,
  teamId: string | undefined,
  numGames: number
): MatchupSide {
  const { statTracker } = ctx.dataset.app;
  if (playerId !== undefined && teamId === undefined) {
    return {
      name: requirePlayer(ctx.dataset, playerId),
      games: statTracker.getLastNGames(playerId, numGames),
    };
  }
  if (teamId !== undefined && playerId === undefined) {
    const team = requireTeam(ctx.dataset, teamId);
    return { name: team.name, games: getRosterGames(statTracker, team, numGames) };
  }
  throw new ValidationException(`Give exactly one of --player-${side} or --team-${side}`);
}

export function registerFantasyCommands(cli: Argv<GlobalArgs>, io: CliIO): Argv<GlobalArgs> {
  return cli.command('fantasy', 'Fantasy scoring', (fantasy) =>
    fantasy
      .command(
        'points',
        'Fantasy points per game for a points league',
        (y) =>
          y
            .option('player-id', { type: 'string', demandOption: true, describe: 'Player ID' })
            .option('games', { type: 'number', default: DEFAULT_RECENT_GAMES, describe: 'Number of games' })
            .option('scoring-file', { type: 'string', describe: 'JSON scoring settings, overrides the dataset' }),
        async (args) => {
          const ctx = await openContext(args, io);
          const name = requirePlayer(ctx.dataset, args.playerId);
          const rules = args.scoringFile
            ? await loadScoringFile(args.scoringFile)
            : ctx.dataset.scoringRules;
          const calculator = new ScoringCalculator(rules);

          const games = ctx.dataset.app.statTracker.getLastNGames(args.playerId, args.games);
          const rows = games.map((game) => ({
            game,
            fantasyPoints: calculator.calculateFantasyPoints(game),
          }));
          ctx.print(formatFantasyPoints(name, rows, calculator.calculateAveragePoints(games)));
        }
      )
      .command(
        'categories',
        'Head-to-head category matchup between two players or two fantasy teams',
        (y) =>
          y
            .option('player-a', { type: 'string', describe: 'First player ID' })
            .option('player-b', { type: 'string', describe: 'Second player ID' })
            .option('team-a', { type: 'string', describe: 'First fantasy team ID' })
            .option('team-b', { type: 'string', describe: 'Second fantasy team ID' })
            .option('games', { type: 'number', default: DEFAULT_RECENT_GAMES, describe: 'Games per player' }),
        async (args) => {
          const ctx = await openContext(args, io);
          const a = resolveSide(ctx, 'a', args.playerA, args.teamA, args.games);
          const b = resolveSide(ctx, 'b', args.playerB, args.teamB, args.games);

          const comparator = new CategoryComparator(ctx.dataset.categorySettings);
          const results = comparator.compareCategoriesDetailed(a.games, b.games);
          ctx.print(
            formatCategoryMatchup(a.name, b.name, results, comparator.compareCategories(a.games, b.games))
          );
        }
      )
      .demandCommand(1, 'Choose a fantasy subcommand')
  );
}
