import { SessionStateError, generateUlid, logger, serializeError } from '@fieldwork/shared';
import { Outbox } from './outbox';
import type { OutboxPublisher } from './outbox';
import { DEFAULT_ISOLATION_LEVEL } from './types';
import type {
  ConnectionSource,
  IsolationLevel,
  OutboxEntry,
  SessionConnection,
  TransactionState,
} from './types';

export interface SessionOptions<TConn extends SessionConnection> {
  source: ConnectionSource<TConn>;
  publisher: OutboxPublisher;
}

/**
 * A unit of work bound to one logical transaction at a time.
 *
 * The transaction begins lazily on the first `connection()` call. Lifecycle
 * callbacks are explicit: begin and any rollback (full or to a savepoint)
 * clear the outbox. A successful commit returns the connection to the pool,
 * then hands the outbox to the publisher.
 */
export class Session<TConn extends SessionConnection = SessionConnection> {
  readonly id = generateUlid();
  private _state: TransactionState = 'inactive';
  private _isolationLevel: IsolationLevel = DEFAULT_ISOLATION_LEVEL;
  private conn: TConn | null = null;
  private closed = false;
  private savepointCounter = 0;
  private readonly outbox = new Outbox();

  constructor(private readonly options: SessionOptions<TConn>) {}

  get state(): TransactionState {
    return this._state;
  }

  get isolationLevel(): IsolationLevel {
    return this._isolationLevel;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Messages that the next successful commit would publish. */
  get pendingMessages(): OutboxEntry[] {
    return this.outbox.entries();
  }

  /** Applies to the next transaction this session begins. */
  setIsolationLevel(level: IsolationLevel): void {
    this.assertOpen();
    if (this._state === 'active') {
      throw new SessionStateError(
        `Cannot change isolation level to ${level} while a transaction is active`,
      );
    }
    this._isolationLevel = level;
  }

  async connection(): Promise<TConn> {
    this.assertOpen();
    if (!this.conn) {
      this.conn = await this.options.source.reserve();
    }
    if (this._state !== 'active') {
      await this.begin(this.conn);
    }
    return this.conn;
  }

  queueMessage(channel: string, message: unknown): void {
    this.assertOpen();
    const payload = typeof message === 'string' ? message : JSON.stringify(message);
    if (payload === undefined) {
      throw new TypeError(`Message for channel ${channel} is not serializable`);
    }
    logger.debug(`Enqueueing message to ${channel}`, { sessionId: this.id, channel, payload });
    this.outbox.queue(channel, payload);
  }

  /**
   * Runs `work` inside a savepoint. A failure rolls back to the savepoint and
   * discards everything queued so far, while the outer transaction stays open.
   */
  async savepoint<T>(work: () => Promise<T>): Promise<T> {
    const conn = await this.connection();
    const name = `sp_${++this.savepointCounter}`;
    await conn.execute(`SAVEPOINT ${name}`);

    let result: T;
    try {
      result = await work();
    } catch (err) {
      logger.error('Exception inside savepoint, rolling back to it', {
        sessionId: this.id,
        savepoint: name,
        error: serializeError(err),
      });
      this.outbox.reset();
      try {
        await conn.execute(`ROLLBACK TO SAVEPOINT ${name}`);
      } catch (rollbackErr) {
        logger.error('Rollback to savepoint failed', {
          sessionId: this.id,
          savepoint: name,
          error: serializeError(rollbackErr),
        });
      }
      throw err;
    }

    await conn.execute(`RELEASE SAVEPOINT ${name}`);
    return result;
  }

  async commit(): Promise<void> {
    this.assertOpen();
    if (this._state === 'active' && this.conn) {
      try {
        await this.conn.execute('COMMIT');
      } catch (err) {
        // Postgres ends the transaction when COMMIT fails
        this._state = 'rolled_back';
        this.outbox.reset();
        throw err;
      }
      this._state = 'committed';
      // The bus may draw on the same pool: hand the connection back first
      await this.releaseConnection();
    }
    this._state = 'committed';

    const entries = this.outbox.entries();
    this.outbox.reset();
    if (entries.length > 0) {
      await this.options.publisher.flush(entries, this.id);
    }
  }

  async rollback(): Promise<void> {
    this.assertOpen();
    this.outbox.reset();
    if (this._state === 'active' && this.conn) {
      try {
        await this.conn.execute('ROLLBACK');
      } finally {
        this._state = 'rolled_back';
      }
    }
  }

  /**
   * Discards any open transaction and returns the connection to the pool.
   * Idempotent; failures are logged, never thrown.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.outbox.reset();

    const conn = this.conn;
    const wasActive = this._state === 'active';
    this._state = 'inactive';
    this._isolationLevel = DEFAULT_ISOLATION_LEVEL;
    if (!conn) return;

    try {
      if (wasActive) {
        await conn.execute('ROLLBACK');
      }
    } catch (err) {
      logger.error('Rollback while closing session failed', {
        sessionId: this.id,
        error: serializeError(err),
      });
    } finally {
      await this.releaseConnection();
    }
  }

  private async releaseConnection(): Promise<void> {
    const conn = this.conn;
    this.conn = null;
    if (!conn) return;
    try {
      await conn.release();
    } catch (err) {
      logger.error('Releasing session connection failed', {
        sessionId: this.id,
        error: serializeError(err),
      });
    }
  }

  private async begin(conn: TConn): Promise<void> {
    await conn.execute(`BEGIN ISOLATION LEVEL ${this._isolationLevel.toUpperCase()}`);
    this._state = 'active';
    this.outbox.reset();
    logger.debug('Transaction began', { sessionId: this.id, isolationLevel: this._isolationLevel });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new SessionStateError(`Session ${this.id} is closed`);
    }
  }
}
