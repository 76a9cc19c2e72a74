import { Env, loadEnv } from '../config/env.config';
import { logger } from '../config/logger.config';
import { playerDisplayName } from '../modules/players/players.model';
import { Team } from '../modules/teams/teams.model';
import { StatErrors, TeamErrors } from '../utils/exceptions';
import { LoadedDataset, emptyDataset, loadDataset } from './dataset-loader';

/**
 * Where command output goes. Tests pass their own sink.
 */
export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
  now?: () => Date;
}

export interface GlobalArgs {
  data: string | undefined;
}

export interface CommandContext {
  dataset: LoadedDataset;
  env: Env;
  print: (lines: readonly string[]) => void;
  now: () => Date;
}

export function consoleIO(): CliIO {
  return {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    env: process.env,
  };
}

/**
 * Load the dataset named by --data, falling back to FANTASY_DATA_FILE, then to
 * an empty dataset.
 */
export async function openContext(args: GlobalArgs, io: CliIO): Promise<CommandContext> {
  const env = loadEnv(io.env);
  const dataFile = args.data ?? env.FANTASY_DATA_FILE;

  let dataset: LoadedDataset;
  if (dataFile) {
    dataset = await loadDataset(dataFile);
  } else {
    logger.debug('No dataset configured, starting empty');
    dataset = emptyDataset();
  }

  return {
    dataset,
    env,
    print: (lines) => lines.forEach((line) => io.out(line)),
    now: io.now ?? (() => new Date()),
  };
}

/**
 * Display name for a player the dataset knows about, by profile or by stats.
 *
 * @throws NotFoundException when neither exists
 */
export function requirePlayer(dataset: LoadedDataset, playerId: string): string {
  const { statTracker } = dataset.app;
  const player = statTracker.getPlayer(playerId);
  if (!player && statTracker.getAllGameStats(playerId).length === 0) {
    throw StatErrors.playerNotFound(playerId);
  }
  return playerDisplayName(player, playerId);
}

export function requireTeam(dataset: LoadedDataset, teamId: string): Team {
  const team = dataset.teams.get(teamId);
  if (!team) {
    throw TeamErrors.teamNotFound(teamId);
  }
  return team;
}
