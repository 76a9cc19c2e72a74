import { ScheduleManager } from '../../../modules/schedule/schedule-manager.service';
import { ValidationException } from '../../../utils/exceptions';
import { makeGame } from '../../helpers/factories';

describe('ScheduleManager', () => {
  let manager: ScheduleManager;

  beforeEach(() => {
    manager = new ScheduleManager();
  });

  describe('storage', () => {
    it('creates a season schedule on the first added game', () => {
      manager.addGame('2024-25', makeGame({ gameId: 'g1' }));

      const schedule = manager.getSchedule('2024-25');
      expect(schedule?.scheduleId).toBe('schedule_2024-25');
      expect(schedule?.games).toHaveLength(1);
      expect(manager.getGame('g1')?.homeTeam).toBe('HOM');
    });

    it('does not share the caller\'s games array', () => {
      const games = [makeGame({ gameId: 'g1' })];
      manager.addSchedule({ scheduleId: 's', season: '2024-25', games });
      games.push(makeGame({ gameId: 'g2' }));

      expect(manager.getSchedule('2024-25')?.games).toHaveLength(1);
    });

    it('lists known seasons', () => {
      manager.addGame('2023-24', makeGame({ gameId: 'a' }));
      manager.addGame('2024-25', makeGame({ gameId: 'b' }));
      expect(manager.listSeasons()).toEqual(['2023-24', '2024-25']);
    });

    it('returns undefined for unknown ids', () => {
      expect(manager.getGame('nope')).toBeUndefined();
      expect(manager.getSchedule('1999-00')).toBeUndefined();
    });
  });

  describe('getGamesForDate', () => {
    beforeEach(() => {
      manager.addGame('2024-25', makeGame({ gameId: 'late', gameDate: new Date('2024-11-01T23:30:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'early', gameDate: new Date('2024-11-01T17:00:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'next', gameDate: new Date('2024-11-02T00:30:00Z') }));
    });

    it('returns the UTC day\'s games, earliest first', () => {
      expect(manager.getGamesForDate('2024-11-01').map((g) => g.gameId)).toEqual(['early', 'late']);
    });

    it('rejects a malformed date', () => {
      expect(() => manager.getGamesForDate('11/01/2024')).toThrow(ValidationException);
    });
  });

  describe('getGamesForTeam', () => {
    it('matches home and away games in date order', () => {
      manager.addGame('2024-25', makeGame({ gameId: 'g2', homeTeam: 'BOS', awayTeam: 'NYK', gameDate: new Date('2024-11-03T00:00:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'g1', homeTeam: 'MIA', awayTeam: 'BOS', gameDate: new Date('2024-11-01T00:00:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'g3', homeTeam: 'MIA', awayTeam: 'NYK', gameDate: new Date('2024-11-02T00:00:00Z') }));

      expect(manager.getGamesForTeam('BOS').map((g) => g.gameId)).toEqual(['g1', 'g2']);
    });

    it('limits to one season when it exists', () => {
      manager.addGame('2023-24', makeGame({ gameId: 'old', homeTeam: 'BOS' }));
      manager.addGame('2024-25', makeGame({ gameId: 'new', homeTeam: 'BOS' }));

      expect(manager.getGamesForTeam('BOS', '2024-25').map((g) => g.gameId)).toEqual(['new']);
      expect(manager.getGamesForTeam('BOS', '1999-00')).toHaveLength(2);
    });
  });

  describe('getUpcomingGames', () => {
    const now = new Date('2024-11-01T12:00:00Z');

    beforeEach(() => {
      manager.addGame('2024-25', makeGame({ gameId: 'past', gameDate: new Date('2024-11-01T11:00:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'soon', gameDate: new Date('2024-11-02T00:00:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'edge', gameDate: new Date('2024-11-08T12:00:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'far', gameDate: new Date('2024-11-08T12:01:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'done', gameDate: new Date('2024-11-03T00:00:00Z'), status: 'final' }));
      manager.addGame('2024-25', makeGame({ gameId: 'other', homeTeam: 'XYZ', awayTeam: 'QRS', gameDate: new Date('2024-11-04T00:00:00Z') }));
    });

    it('returns scheduled games inside the window, inclusive', () => {
      expect(manager.getUpcomingGames({ now }).map((g) => g.gameId)).toEqual(['soon', 'other', 'edge']);
    });

    it('filters by team', () => {
      expect(manager.getUpcomingGames({ now, team: 'XYZ' }).map((g) => g.gameId)).toEqual(['other']);
    });

    it('honors a shorter window', () => {
      expect(manager.getUpcomingGames({ now, daysAhead: 1 }).map((g) => g.gameId)).toEqual(['soon']);
    });
  });

  describe('getGameCountByTeam', () => {
    it('counts home and away appearances inside the range', () => {
      manager.addGame('2024-25', makeGame({ gameId: 'a', homeTeam: 'BOS', awayTeam: 'NYK', gameDate: new Date('2024-11-01T00:00:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'b', homeTeam: 'NYK', awayTeam: 'MIA', gameDate: new Date('2024-11-02T00:00:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'c', homeTeam: 'BOS', awayTeam: 'MIA', gameDate: new Date('2024-12-01T00:00:00Z') }));

      const counts = manager.getGameCountByTeam(new Date('2024-11-01T00:00:00Z'), new Date('2024-11-30T00:00:00Z'));
      expect(Object.fromEntries(counts)).toEqual({ BOS: 1, NYK: 2, MIA: 1 });
    });
  });

  describe('getBackToBackGames', () => {
    it('pairs games on consecutive UTC days', () => {
      manager.addGame('2024-25', makeGame({ gameId: 'g1', homeTeam: 'BOS', gameDate: new Date('2024-11-01T23:30:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'g2', awayTeam: 'BOS', gameDate: new Date('2024-11-02T00:30:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'g3', homeTeam: 'BOS', gameDate: new Date('2024-11-04T19:00:00Z') }));
      manager.addGame('2024-25', makeGame({ gameId: 'g4', homeTeam: 'BOS', gameDate: new Date('2024-11-05T19:00:00Z') }));

      const pairs = manager.getBackToBackGames('BOS');
      expect(pairs.map(([a, b]) => [a.gameId, b.gameId])).toEqual([
        ['g1', 'g2'],
        ['g3', 'g4'],
      ]);
    });

    it('returns nothing for a team without games', () => {
      expect(manager.getBackToBackGames('NONE')).toEqual([]);
    });
  });
});
