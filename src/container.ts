import { StatTracker } from './modules/stats/stat-tracker.service';
import { ScheduleManager } from './modules/schedule/schedule-manager.service';
import { TrendAnalyzer } from './modules/analytics/trend-analyzer.service';
import { AnalyticsPreparationService } from './modules/analytics/analytics-preparation.service';

type Factory<T> = (container: Container) => T;

/**
 * Typed service keys. Each key carries the type of the instance it resolves to.
 */
export interface ServiceKey<T> {
  readonly name: string;
  /** Phantom field; never set at runtime */
  readonly __type?: T;
}

function serviceKey<T>(name: string): ServiceKey<T> {
  return { name };
}

export class Container {
  private factories = new Map<string, Factory<unknown>>();
  private instances = new Map<string, unknown>();

  register<T>(key: ServiceKey<T>, factory: Factory<T>): void {
    this.factories.set(key.name, factory);
  }

  resolve<T>(key: ServiceKey<T>): T {
    // Return cached instance if exists
    const cached = this.instances.get(key.name);
    if (cached !== undefined) {
      return cached as T;
    }

    // Create new instance
    const factory = this.factories.get(key.name);
    if (!factory) {
      throw new Error(`No factory registered for key: ${key.name}`);
    }

    const instance = factory(this) as T;
    this.instances.set(key.name, instance);
    return instance;
  }

  // For testing: clear all instances
  clearInstances(): void {
    this.instances.clear();
  }

  // For testing: override with mock
  override<T>(key: ServiceKey<T>, instance: T): void {
    this.instances.set(key.name, instance);
  }
}

export const KEYS = {
  // Stores
  STAT_TRACKER: serviceKey<StatTracker>('statTracker'),
  SCHEDULE_MANAGER: serviceKey<ScheduleManager>('scheduleManager'),

  // Analytics
  TREND_ANALYZER: serviceKey<TrendAnalyzer>('trendAnalyzer'),
  ANALYTICS_PREPARATION: serviceKey<AnalyticsPreparationService>('analyticsPreparation'),
};

export interface AppContext {
  readonly container: Container;
  readonly statTracker: StatTracker;
  readonly scheduleManager: ScheduleManager;
  readonly trendAnalyzer: TrendAnalyzer;
  readonly analyticsPreparation: AnalyticsPreparationService;
}

/**
 * Build a fresh, fully wired context. There is no shared module-level
 * instance: every caller owns the context it creates.
 */
export function createAppContext(): AppContext {
  const container = new Container();

  container.register(KEYS.STAT_TRACKER, () => new StatTracker());
  container.register(KEYS.SCHEDULE_MANAGER, () => new ScheduleManager());
  container.register(KEYS.TREND_ANALYZER, (c) => new TrendAnalyzer(c.resolve(KEYS.STAT_TRACKER)));
  container.register(
    KEYS.ANALYTICS_PREPARATION,
    (c) => new AnalyticsPreparationService(c.resolve(KEYS.STAT_TRACKER))
  );

  return {
    container,
    statTracker: container.resolve(KEYS.STAT_TRACKER),
    scheduleManager: container.resolve(KEYS.SCHEDULE_MANAGER),
    trendAnalyzer: container.resolve(KEYS.TREND_ANALYZER),
    analyticsPreparation: container.resolve(KEYS.ANALYTICS_PREPARATION),
  };
}
