import { logger } from '@fieldwork/shared';
import type { PoolGuard } from '../pool-guard';
import type { MessageBus } from '../session/types';

/** The slice of a postgres.js `Sql` instance the bus talks to. */
export interface NotifyClient {
  notify(channel: string, payload: string): PromiseLike<unknown>;
  listen(
    channel: string,
    onnotify: (payload: string) => void,
  ): PromiseLike<{ unlisten(): Promise<void> }>;
}

/**
 * Pub/sub over Postgres LISTEN/NOTIFY.
 *
 * NOTIFY runs on a pooled connection outside any session, so it is only
 * visible to listeners once issued, which the outbox does after commit.
 */
export class PgNotifyBus implements MessageBus {
  constructor(
    private readonly sql: NotifyClient,
    private readonly guard?: PoolGuard,
  ) {}

  async publish(channel: string, message: string): Promise<void> {
    const notify = async () => {
      await this.sql.notify(channel, message);
    };
    if (this.guard) {
      await this.guard.run(`bus.publish:${channel}`, notify);
    } else {
      await notify();
    }
  }

  async subscribe(channel: string, handler: (message: string) => void): Promise<() => Promise<void>> {
    // postgres.js holds a dedicated connection for all listeners
    const meta = await this.sql.listen(channel, handler);
    logger.debug(`Listening on ${channel}`, { channel });
    return () => meta.unlisten();
  }
}
