import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { getPlatformConfig, logger } from '@fieldwork/shared';
import type { PlatformConfig } from '@fieldwork/shared';
import { PoolGuard } from './pool-guard';

export type Database = PostgresJsDatabase;

export interface DbClient {
  /** Shared pool; bounded by `poolSize`. */
  sql: postgres.Sql;
  db: Database;
  guard: PoolGuard;
}

type ConnectionConfig = Pick<
  PlatformConfig,
  'databaseUrl' | 'poolSize' | 'connectTimeoutSeconds' | 'queueTimeoutMs'
>;

export function createDbClient(config: ConnectionConfig): DbClient {
  const sql = postgres(config.databaseUrl, {
    max: config.poolSize,
    idle_timeout: 20,
    max_lifetime: 300,
    connect_timeout: config.connectTimeoutSeconds,
    onnotice: (notice) => {
      logger.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
    },
  });
  return {
    sql,
    db: drizzle(sql),
    guard: new PoolGuard({ limit: config.poolSize, queueTimeoutMs: config.queueTimeoutMs }),
  };
}

// One pool per process
let _client: DbClient | null = null;

export function getDbClient(): DbClient {
  if (!_client) {
    _client = createDbClient(getPlatformConfig());
  }
  return _client;
}

export async function closeDbClient(): Promise<void> {
  const client = _client;
  _client = null;
  if (client) {
    await client.sql.end({ timeout: 5 });
  }
}
