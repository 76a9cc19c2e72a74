import { getRosterGames } from '../../../modules/teams/teams.service';
import { parseTeam } from '../../../modules/teams/teams.schemas';
import { StatTracker } from '../../../modules/stats/stat-tracker.service';
import { makeGameLog } from '../../helpers/factories';

describe('getRosterGames', () => {
  let tracker: StatTracker;

  beforeEach(() => {
    tracker = new StatTracker();
    for (const game of [...makeGameLog('a', [1, 2, 3]), ...makeGameLog('b', [10, 20])]) {
      tracker.addGameStats(game);
    }
  });

  function team(playerIds: string[]) {
    return parseTeam({ teamId: 't1', name: 'Roster', owner: 'Lee', leagueId: 'lg1', playerIds });
  }

  it('pools every rostered player in roster order, newest first per player', () => {
    expect(getRosterGames(tracker, team(['b', 'a'])).map((g) => g.points)).toEqual([20, 10, 3, 2, 1]);
  });

  it('limits each player to the last numGames games', () => {
    expect(getRosterGames(tracker, team(['a', 'b']), 1).map((g) => g.points)).toEqual([3, 20]);
  });

  it('skips rostered players without games', () => {
    expect(getRosterGames(tracker, team(['ghost', 'b'])).map((g) => g.playerId)).toEqual(['b', 'b']);
  });

  it('is empty for an empty roster', () => {
    expect(getRosterGames(tracker, team([]))).toEqual([]);
  });
});
