import * as path from 'path';
import { buildDataset, emptyDataset, loadDataset } from '../../cli/dataset-loader';
import { DEFAULT_POINTS_SCORING_RULES } from '../../modules/scoring/scoring.model';
import { DEFAULT_CATEGORIES } from '../../modules/scoring/category.model';
import { ConfigurationException, DatasetException, ValidationException } from '../../utils/exceptions';

const FIXTURE = path.join(__dirname, '../fixtures/dataset.json');

const LEAGUE = {
  leagueId: 'lg9',
  name: 'Weeknight League',
  season: '2025-26',
  format: 'category',
  numTeams: 2,
  rosterSize: 2,
  scoringCategories: ['pts', 'reb'],
};

function team(teamId: string, playerIds: string[] = [], leagueId = 'lg9') {
  return { teamId, name: `Team ${teamId}`, owner: 'Owner', leagueId, playerIds };
}

describe('dataset loader', () => {
  describe('loadDataset', () => {
    it('populates players, stats and schedules', async () => {
      const dataset = await loadDataset(FIXTURE);
      const { statTracker, scheduleManager } = dataset.app;

      expect(statTracker.listPlayers().map((p) => p.playerId)).toEqual(['ava', 'ben']);
      expect(statTracker.getAllGameStats('ava')).toHaveLength(3);
      expect(statTracker.getAllGameStats('ben')).toHaveLength(2);
      expect(scheduleManager.getGame('g102')?.gameDate.toISOString()).toBe('2024-11-11T01:00:00.000Z');
      expect(dataset.season).toBe('2024-25');
      expect(dataset.format).toBe('points');
    });

    it('normalizes scoring and category settings', async () => {
      const dataset = await loadDataset(FIXTURE);

      expect(dataset.scoringRules.doubleDoubleBonus).toBe(2);
      expect(dataset.scoringRules.pointsPerRebound).toBe(1.2);
      expect(dataset.categorySettings.categories).toEqual(['PTS', 'REB', 'AST', 'TO', 'FG%']);
    });

    it('wraps a missing file in DatasetException', async () => {
      await expect(loadDataset(path.join(__dirname, 'no-such-file.json'))).rejects.toBeInstanceOf(DatasetException);
    });

    it('wraps invalid JSON in DatasetException', async () => {
      // A TypeScript source is not JSON
      await expect(loadDataset(__filename)).rejects.toThrow(/^Failed to load dataset /);
    });
  });

  describe('buildDataset', () => {
    it('uses defaults for an empty object', () => {
      const dataset = emptyDataset();
      expect(dataset.scoringRules).toEqual(DEFAULT_POINTS_SCORING_RULES);
      expect(dataset.categorySettings.categories).toEqual(DEFAULT_CATEGORIES);
      expect(dataset.app.statTracker.listPlayers()).toEqual([]);
      expect(dataset.season).toBeUndefined();
    });

    it('reports the path of a bad stat line', () => {
      expect(() =>
        buildDataset({ stats: [{ playerId: 'p1', gameDate: '2024-11-01', opponent: 'BOS', points: -3 }] })
      ).toThrow(/^Invalid dataset: stats\.0\.points: /);
    });

    it('rejects unknown categories', () => {
      expect(() => buildDataset({ categories: { categories: ['PTS', 'HUSTLE'] } })).toThrow(
        'Unknown stat category: HUSTLE'
      );
    });

    it('rejects a non-numeric scoring weight', () => {
      expect(() => buildDataset({ scoring: { points_per_point: 'many' } })).toThrow(ValidationException);
    });

    it('requires category settings for a category league', () => {
      expect(() => buildDataset({ format: 'category' })).toThrow(ConfigurationException);
      expect(() => buildDataset({ format: 'category' })).toThrow(
        'Dataset declares a category league but has no categories settings'
      );
    });

    it('requires scoring settings for a points league', () => {
      expect(() => buildDataset({ format: 'points' })).toThrow(
        'Dataset declares a points league but has no scoring settings'
      );
    });

    it('accepts a roto league with categories', () => {
      expect(buildDataset({ format: 'roto', categories: { categories: ['PTS'] } }).format).toBe('roto');
    });

    it('rejects an unknown format', () => {
      expect(() => buildDataset({ format: 'dynasty' })).toThrow(ValidationException);
    });
  });

  describe('teams and league', () => {
    it('loads teams from the fixture in dataset order', async () => {
      const dataset = await loadDataset(FIXTURE);

      expect([...dataset.teams.keys()]).toEqual(['t1', 't2']);
      expect(dataset.teams.get('t2')?.playerIds).toEqual(['ben', 'zed']);
      expect(dataset.teams.get('t1')?.ties).toBe(0);
      expect(dataset.league?.rosterSize).toBe(3);
    });

    it('takes format, categories and season from the league', () => {
      const dataset = buildDataset({ league: LEAGUE, teams: [team('a'), team('b')] });

      expect(dataset.format).toBe('category');
      expect(dataset.categorySettings.categories).toEqual(['PTS', 'REB']);
      expect(dataset.season).toBe('2025-26');
      expect(dataset.teams.size).toBe(2);
    });

    it('prefers top-level categories over the league list', () => {
      const dataset = buildDataset({ league: LEAGUE, categories: { categories: ['AST'] } });
      expect(dataset.categorySettings.categories).toEqual(['AST']);
    });

    it('rejects a top-level format that contradicts the league', () => {
      expect(() => buildDataset({ league: LEAGUE, format: 'roto' })).toThrow(
        'Dataset format roto does not match league format category'
      );
    });

    it('requires categories for a category league without its own list', () => {
      expect(() => buildDataset({ league: { ...LEAGUE, scoringCategories: undefined } })).toThrow(
        'Dataset declares a category league but has no categories settings'
      );
    });

    it('rejects duplicate team ids', () => {
      expect(() => buildDataset({ teams: [team('a'), team('a')] })).toThrow(
        'dataset.teams: duplicate teamId a'
      );
    });

    it('rejects a roster larger than the league allows', () => {
      expect(() => buildDataset({ league: LEAGUE, teams: [team('a', ['p1', 'p2', 'p3'])] })).toThrow(
        'Team a rosters 3 players, over the limit of 2'
      );
    });

    it('rejects a team from another league', () => {
      expect(() => buildDataset({ league: LEAGUE, teams: [team('a', [], 'lg1')] })).toThrow(
        'Team a belongs to league lg1, not lg9'
      );
    });

    it('rejects more teams than the league holds', () => {
      expect(() => buildDataset({ league: LEAGUE, teams: [team('a'), team('b'), team('c')] })).toThrow(
        ConfigurationException
      );
    });

    it('accepts teams without a league', () => {
      const dataset = buildDataset({ teams: [team('a', ['p1'], 'anywhere')] });
      expect(dataset.league).toBeUndefined();
      expect(dataset.teams.get('a')?.leagueId).toBe('anywhere');
    });
  });
});
