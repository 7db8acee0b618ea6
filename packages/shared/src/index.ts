export {
  AppError,
  ConnectionFailedError,
  PoolExhaustedError,
  SessionStateError,
  SerializationRetriesExhaustedError,
  InvalidEmailConfigError,
  MessengerError,
} from './errors';
export {
  logger,
  log,
  setLogLevel,
  getLogLevel,
  isLogLevel,
  serializeError,
} from './observability/logger';
export type { Logger, LogLevel, LogEntry } from './observability/logger';
export * from './config';
export * from './utils';
