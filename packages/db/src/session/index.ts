export { Session } from './session';
export type { SessionOptions } from './session';
export { SessionRegistry } from './registry';
export type { ScopeOptions } from './registry';
export { Outbox, OutboxPublisher } from './outbox';
export type { DeadLetter, OutboxPublisherOptions } from './outbox';
export {
  runSerialized,
  serialized,
  isSerializationFailure,
  exponentialBackoffMs,
  SERIALIZATION_FAILURE,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BACKOFF_RATE,
} from './serialized';
export type { SerializedOptions } from './serialized';
export { PgConnectionSource, PgSessionConnection } from './pg-connection-source';
export { DEFAULT_ISOLATION_LEVEL } from './types';
export type {
  TransactionState,
  IsolationLevel,
  OutboxEntry,
  MessageBus,
  SessionConnection,
  ConnectionSource,
} from './types';
