import { parseGame, parseSchedule } from '../../../modules/schedule/schedule.schemas';
import { ValidationException } from '../../../utils/exceptions';

describe('schedule schemas', () => {
  const rawGame = { gameId: 'g1', gameDate: '2024-11-01T19:30', homeTeam: 'BOS', awayTeam: 'NYK' };

  it('reads a game time without an offset as UTC', () => {
    expect(parseGame(rawGame).gameDate.toISOString()).toBe('2024-11-01T19:30:00.000Z');
  });

  it('defaults the status to scheduled', () => {
    expect(parseGame(rawGame).status).toBe('scheduled');
  });

  it('accepts a Date instance', () => {
    const when = new Date('2024-11-01T00:00:00Z');
    expect(parseGame({ ...rawGame, gameDate: when }).gameDate.getTime()).toBe(when.getTime());
  });

  it('rejects an unparseable game time', () => {
    expect(() => parseGame({ ...rawGame, gameDate: 'tomorrow night' })).toThrow(
      'Invalid game: gameDate: gameDate must be an ISO date-time such as 2025-10-26T19:30'
    );
  });

  it('rejects an unknown status', () => {
    expect(() => parseGame({ ...rawGame, status: 'postponed' })).toThrow(ValidationException);
  });

  it('parses a schedule with frozen games', () => {
    const schedule = parseSchedule({ scheduleId: 's1', season: '2024-25', games: [rawGame] });
    expect(schedule.games).toHaveLength(1);
    expect(Object.isFrozen(schedule.games[0])).toBe(true);
  });

  it('defaults a schedule to no games', () => {
    expect(parseSchedule({ scheduleId: 's1', season: '2024-25' }).games).toEqual([]);
  });
});
