import { AnalyticsPreparationService, FEATURE_NAMES } from '../../../modules/analytics/analytics-preparation.service';
import { StatTracker } from '../../../modules/stats/stat-tracker.service';
import { makeStats } from '../../helpers/factories';

describe('AnalyticsPreparationService', () => {
  let tracker: StatTracker;
  let service: AnalyticsPreparationService;

  beforeEach(() => {
    tracker = new StatTracker();
    service = new AnalyticsPreparationService(tracker);
  });

  it('groups full game logs by player', () => {
    tracker.addGameStats(makeStats({ playerId: 'a', points: 1 }));
    tracker.addGameStats(makeStats({ playerId: 'a', points: 2 }));

    const data = service.prepareTrainingData(['a', 'missing']);
    expect([...data.keys()]).toEqual(['a', 'missing']);
    expect(data.get('a')?.map((g) => g.points)).toEqual([1, 2]);
    expect(data.get('missing')).toEqual([]);
  });

  it('hands out copies that later recordings do not change', () => {
    tracker.addGameStats(makeStats({ playerId: 'a', points: 1 }));
    const data = service.prepareTrainingData(['a']);

    tracker.addGameStats(makeStats({ playerId: 'a', points: 2 }));

    expect(data.get('a')?.map((g) => g.points)).toEqual([1]);
    expect(data.get('a')).not.toBe(tracker.getAllGameStats('a'));
  });

  it('builds feature vectors in a fixed order', () => {
    const vector = service.getFeatureVector(
      makeStats({ minutesPlayed: 30.5, points: 21, rebounds: 7, freeThrowsAttempted: 6 })
    );
    expect(vector).toHaveLength(FEATURE_NAMES.length);
    expect(vector[0]).toBe(30.5);
    expect(vector[1]).toBe(21);
    expect(vector[2]).toBe(7);
    expect(vector[FEATURE_NAMES.length - 1]).toBe(6);
  });

  it('reports model projections as not implemented', () => {
    expect(service.projectWithModel('a')).toEqual({
      status: 'not_implemented',
      message: 'Model-based projections are not available yet. Use the average-based projection instead.',
    });
  });
});
