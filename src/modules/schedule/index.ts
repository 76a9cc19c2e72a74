export { Game, GameStatus, Schedule, involvesTeam, compareByGameDate } from './schedule.model';
export {
  gameSchema,
  scheduleSchema,
  GameInput,
  ScheduleInput,
  parseGame,
  parseSchedule,
} from './schedule.schemas';
export { ScheduleManager, UpcomingGamesOptions, DEFAULT_UPCOMING_DAYS } from './schedule-manager.service';
