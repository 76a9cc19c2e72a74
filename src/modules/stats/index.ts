export { StatRecord, SeasonSummary, CountingStatKey } from './stats.model';
export { statRecordSchema, StatRecordInput, parseStatRecord } from './stats.schemas';
export { StatTracker, DEFAULT_RECENT_GAMES } from './stat-tracker.service';
