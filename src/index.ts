/**
 * Library entry point. The CLI lives in ./cli/main.
 */

export * from './modules/players';
export * from './modules/stats';
export * from './modules/scoring';
export * from './modules/analytics';
export * from './modules/schedule';
export * from './modules/teams';
export * from './domain';
export { Container, KEYS, ServiceKey, AppContext, createAppContext } from './container';
export {
  AppException,
  ValidationException,
  NotFoundException,
  ConfigurationException,
  DatasetException,
  ErrorCode,
  ErrorCodeType,
  StatErrors,
  ScheduleErrors,
  TeamErrors,
} from './utils/exceptions';
export { parseOrThrow } from './utils/schema.utils';
export { buildDataset, loadDataset, datasetSchema, DatasetInput, LoadedDataset } from './cli/dataset-loader';
