#!/usr/bin/env node
import yargs, { Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadProcessEnv } from '../config/env.config';
import { logger } from '../config/logger.config';
import { AppException, ValidationException } from '../utils/exceptions';
import { CliIO, GlobalArgs, consoleIO } from './cli-context';
import { registerPlayersCommands } from './commands/players.command';
import { registerTeamsCommands } from './commands/teams.command';
import { registerStatsCommands } from './commands/stats.command';
import { registerScheduleCommands } from './commands/schedule.command';
import { registerFantasyCommands } from './commands/fantasy.command';
import { registerAnalyzeCommands } from './commands/analyze.command';
import { registerAiStatusCommand } from './commands/ai-status.command';

const registrations = [
  registerPlayersCommands,
  registerTeamsCommands,
  registerStatsCommands,
  registerScheduleCommands,
  registerFantasyCommands,
  registerAnalyzeCommands,
  registerAiStatusCommand,
];

export function buildCli(argv: readonly string[], io: CliIO): Argv<GlobalArgs> {
  const cli: Argv<GlobalArgs> = yargs(argv)
    .scriptName('hoops-ledger')
    .usage('$0 <command> [options]')
    .option('data', {
      type: 'string',
      describe: 'Dataset JSON file (defaults to FANTASY_DATA_FILE)',
    })
    .strict()
    .exitProcess(false)
    .fail((msg, err) => {
      if (err) throw err;
      throw new ValidationException(msg);
    })
    .help();

  return registrations
    .reduce((acc, register) => register(acc, io), cli)
    .demandCommand(1, 'Choose a command');
}

/**
 * Map a failure to a one-line message on stderr and an exit code
 */
export function reportError(error: unknown, io: CliIO): number {
  if (error instanceof AppException) {
    logger.warn(error.message, { errorCode: error.errorCode });
    io.err(`✗ ${error.message}`);
    return error.exitCode;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  logger.error('Unexpected error', { error: err.message, stack: err.stack });
  io.err(`✗ ${err.message}`);
  return 1;
}

/**
 * Run one command line and resolve to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  try {
    await buildCli(argv, io).parseAsync();
    return 0;
  } catch (error) {
    return reportError(error, io);
  }
}

async function main(): Promise<number> {
  const io = consoleIO();
  try {
    const env = loadProcessEnv();
    logger.level = env.LOG_LEVEL;
  } catch (error) {
    return reportError(error, io);
  }
  return runCli(hideBin(process.argv), io);
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error('CLI crashed', { error: String(error) });
      process.exitCode = 1;
    }
  );
}
