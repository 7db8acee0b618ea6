export { createDbClient, getDbClient, closeDbClient } from './client';
export type { Database, DbClient } from './client';
export {
  checkConnection,
  isMissingRoleError,
  DB_USER_WARNING,
  DEFAULT_HEALTH_CHECK_TIMEOUT_SECONDS,
} from './health';
export type { CheckConnectionOptions } from './health';
export { PoolGuard } from './pool-guard';
export type { PoolGuardOptions, PoolGuardStats } from './pool-guard';
export { PgNotifyBus } from './bus/pg-notify-bus';
export type { NotifyClient } from './bus/pg-notify-bus';
export * from './session';
export { sql } from 'drizzle-orm';
