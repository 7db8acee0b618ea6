import { AsyncLocalStorage } from 'node:async_hooks';
import { SessionStateError, logger, serializeError } from '@fieldwork/shared';
import { Session } from './session';
import type { OutboxPublisher } from './outbox';
import type { ConnectionSource, SessionConnection } from './types';

export interface ScopeOptions {
  /** Commit when `work` resolves. Defaults to false: callers commit explicitly. */
  commit?: boolean;
}

/**
 * Creates sessions and binds each one to the async context that runs its
 * unit of work, so concurrent requests never share a session.
 */
export class SessionRegistry<TConn extends SessionConnection = SessionConnection> {
  private readonly store = new AsyncLocalStorage<Session<TConn>>();

  constructor(
    private readonly source: ConnectionSource<TConn>,
    private readonly publisher: OutboxPublisher,
  ) {}

  /** A fresh, unbound session. The caller owns `close()`. */
  open(): Session<TConn> {
    return new Session<TConn>({ source: this.source, publisher: this.publisher });
  }

  current(): Session<TConn> {
    const session = this.store.getStore();
    if (!session) {
      throw new SessionStateError('No session bound to this context. Run inside runScoped().');
    }
    return session;
  }

  currentOrNull(): Session<TConn> | null {
    return this.store.getStore() ?? null;
  }

  /** Runs `fn` with `session` bound as the context's current session. */
  bind<T>(session: Session<TConn>, fn: () => Promise<T>): Promise<T> {
    return this.store.run(session, fn);
  }

  async runScoped<T>(
    work: (session: Session<TConn>) => Promise<T>,
    options: ScopeOptions = {},
  ): Promise<T> {
    const session = this.open();
    try {
      return await this.bind(session, async () => {
        const result = await work(session);
        if (options.commit) {
          await session.commit();
          logger.debug('DB session auto-committed as requested', { sessionId: session.id });
        }
        return result;
      });
    } catch (err) {
      // Logged before rolling back in case the rollback fails too
      logger.error('Exception during scoped transaction, rolling back.', {
        sessionId: session.id,
        error: serializeError(err),
      });
      try {
        await session.rollback();
      } catch (rollbackErr) {
        logger.error('Rollback of scoped transaction failed', {
          sessionId: session.id,
          error: serializeError(rollbackErr),
        });
      }
      throw err;
    } finally {
      await session.close();
      logger.debug('Session complete, db session closed', { sessionId: session.id });
    }
  }

  /**
   * Wraps `fn` so every call runs in its own scoped session, which is passed
   * as the first argument.
   */
  withScopedSession<A extends unknown[], R>(
    fn: (session: Session<TConn>, ...args: A) => Promise<R>,
    options: ScopeOptions = {},
  ): (...args: A) => Promise<R> {
    const label = fn.name || 'anonymous';
    return (...args: A) =>
      this.runScoped((session) => {
        logger.debug(`Running worker ${label} in scoped DB session`, { sessionId: session.id });
        return fn(session, ...args);
      }, options);
  }

  /** Queues on the session bound to the current context. */
  queueMessage(channel: string, message: unknown): void {
    this.current().queueMessage(channel, message);
  }
}
