/**
 * Dataset loading for the CLI.
 *
 * A dataset is a JSON snapshot of players, game stats, schedules, fantasy
 * teams and league scoring settings. Loading one populates a fresh AppContext; nothing is ever
 * written back.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { logger } from '../config/logger.config';
import { AppContext, createAppContext } from '../container';
import { playerSchema } from '../modules/players/players.schemas';
import { statRecordSchema } from '../modules/stats/stats.schemas';
import { scheduleSchema } from '../modules/schedule/schedule.schemas';
import { categorySettingsSchema, fantasyFormatSchema } from '../modules/scoring/scoring.schemas';
import { normalizeScoringSettings } from '../modules/scoring/scoring-settings-normalizer';
import { PointsScoringRules } from '../modules/scoring/scoring.model';
import { CategorySettings, createCategorySettings } from '../modules/scoring/category.model';
import { FantasyFormat, validateFormatSettings } from '../modules/scoring/league-format';
import { League, Team } from '../modules/teams/teams.model';
import { leagueSchema, parseLeague, parseTeam, teamSchema } from '../modules/teams/teams.schemas';
import { ConfigurationException, DatasetException, ValidationException } from '../utils/exceptions';
import { parseOrThrow } from '../utils/schema.utils';

export const datasetSchema = z.object({
  season: z.string().trim().min(1).optional(),
  format: fantasyFormatSchema.optional(),
  players: z.array(playerSchema).default([]),
  stats: z.array(statRecordSchema).default([]),
  schedules: z.array(scheduleSchema).default([]),
  // Flat snake_case or nested { rules } form, see normalizeScoringSettings
  scoring: z.record(z.unknown()).optional(),
  categories: categorySettingsSchema.optional(),
  league: leagueSchema.optional(),
  teams: z.array(teamSchema).default([]),
});

export type DatasetInput = z.input<typeof datasetSchema>;

export interface LoadedDataset {
  app: AppContext;
  season?: string;
  format?: FantasyFormat;
  scoringRules: PointsScoringRules;
  categorySettings: CategorySettings;
  league?: League;
  /** Keyed by teamId, in dataset order */
  teams: ReadonlyMap<string, Team>;
}

function indexTeams(teams: readonly Team[], league: League | undefined): Map<string, Team> {
  const byId = new Map<string, Team>();
  for (const team of teams) {
    if (byId.has(team.teamId)) {
      throw new ValidationException(`dataset.teams: duplicate teamId ${team.teamId}`);
    }
    byId.set(team.teamId, team);
  }
  if (!league) {
    return byId;
  }

  if (byId.size > league.numTeams) {
    throw new ConfigurationException(
      `League ${league.leagueId} allows ${league.numTeams} teams but the dataset has ${byId.size}`
    );
  }
  for (const team of byId.values()) {
    if (team.leagueId !== league.leagueId) {
      throw new ConfigurationException(
        `Team ${team.teamId} belongs to league ${team.leagueId}, not ${league.leagueId}`
      );
    }
    if (team.playerIds.length > league.rosterSize) {
      throw new ConfigurationException(
        `Team ${team.teamId} rosters ${team.playerIds.length} players, over the limit of ${league.rosterSize}`
      );
    }
  }
  return byId;
}

/**
 * Validate raw dataset JSON and load it into a new context.
 *
 * A league block supplies the format and categories when the top-level
 * `format` and `categories` are absent.
 *
 * @throws ValidationException for malformed entries, unknown categories or duplicate team ids
 * @throws ConfigurationException when the declared format lacks its settings or
 * the teams do not fit the league
 */
export function buildDataset(raw: unknown): LoadedDataset {
  const data = parseOrThrow(datasetSchema, raw, 'dataset');
  const app = createAppContext();

  for (const player of data.players) {
    app.statTracker.addPlayer(Object.freeze(player));
  }
  for (const record of data.stats) {
    app.statTracker.addGameStats(Object.freeze(record));
  }
  for (const schedule of data.schedules) {
    app.scheduleManager.addSchedule({
      ...schedule,
      games: schedule.games.map((game) => Object.freeze(game)),
    });
  }

  const league = data.league ? parseLeague(data.league) : undefined;
  const teams = indexTeams(
    data.teams.map((team) => parseTeam(team)),
    league
  );

  if (data.format && league && data.format !== league.format) {
    throw new ConfigurationException(
      `Dataset format ${data.format} does not match league format ${league.format}`
    );
  }
  const format = data.format ?? league?.format;

  const categoryInput = data.categories ?? { categories: league?.scoringCategories };
  const hasCategories = data.categories !== undefined || league?.scoringCategories !== undefined;
  const scoringRules = normalizeScoringSettings(data.scoring);
  const categorySettings = createCategorySettings(categoryInput);

  if (format) {
    const valid = validateFormatSettings({
      formatType: format,
      pointsRules: data.scoring ? scoringRules : undefined,
      categorySettings: hasCategories ? categorySettings : undefined,
    });
    if (!valid) {
      throw new ConfigurationException(
        `Dataset declares a ${format} league but has no ${format === 'points' ? 'scoring' : 'categories'} settings`
      );
    }
  }

  logger.debug('Loaded dataset', {
    players: data.players.length,
    stats: data.stats.length,
    schedules: data.schedules.length,
    teams: teams.size,
  });

  return {
    app,
    season: data.season ?? league?.season,
    format,
    scoringRules,
    categorySettings,
    league,
    teams,
  };
}

/**
 * Read a JSON file from disk. File-system and JSON errors become DatasetExceptions.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw DatasetException.fromError(error, filePath);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw DatasetException.fromError(error, filePath);
  }
}

export async function loadDataset(filePath: string): Promise<LoadedDataset> {
  return buildDataset(await readJsonFile(filePath));
}

/**
 * A dataset with nothing in it, for runs without --data
 */
export function emptyDataset(): LoadedDataset {
  return buildDataset({});
}
