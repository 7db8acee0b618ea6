import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import type postgres from 'postgres';
import type { PoolGuard } from '../pool-guard';
import type { ConnectionSource, SessionConnection } from './types';

/**
 * A reserved postgres.js connection. Queries issued through `sql` or `db`
 * run inside the session's transaction.
 */
export class PgSessionConnection implements SessionConnection {
  readonly db: PostgresJsDatabase;
  private released = false;

  constructor(
    readonly sql: postgres.ReservedSql,
    private readonly onRelease: () => void,
  ) {
    this.db = drizzle(sql);
  }

  async execute(statement: string): Promise<void> {
    await this.sql.unsafe(statement);
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    try {
      this.sql.release();
    } finally {
      this.onRelease();
    }
  }
}

/** Borrows a dedicated connection per session, bounded by the pool guard. */
export class PgConnectionSource implements ConnectionSource<PgSessionConnection> {
  constructor(
    private readonly sql: postgres.Sql,
    private readonly guard: PoolGuard,
  ) {}

  async reserve(): Promise<PgSessionConnection> {
    await this.guard.acquire();
    try {
      const reserved = await this.sql.reserve();
      return new PgSessionConnection(reserved, () => this.guard.release());
    } catch (err) {
      this.guard.release();
      throw err;
    }
  }
}
