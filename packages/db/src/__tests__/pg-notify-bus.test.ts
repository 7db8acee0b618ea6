import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PgNotifyBus } from '../bus/pg-notify-bus';
import type { NotifyClient } from '../bus/pg-notify-bus';
import { PoolGuard } from '../pool-guard';

function fakeClient() {
  const listeners = new Map<string, (payload: string) => void>();
  const unlisten = vi.fn(async () => {});
  const client: NotifyClient = {
    notify: vi.fn(async (channel: string, payload: string) => {
      listeners.get(channel)?.(payload);
    }),
    listen: vi.fn(async (channel: string, onnotify: (payload: string) => void) => {
      listeners.set(channel, onnotify);
      return { unlisten };
    }),
  };
  return { client, unlisten };
}

beforeEach(() => {
  vi.spyOn(process.stdout, 'write').mockReturnValue(true);
});

describe('PgNotifyBus', () => {
  it('publishes with NOTIFY on the channel', async () => {
    const { client } = fakeClient();
    const bus = new PgNotifyBus(client);

    await bus.publish('chat', 'hello');

    expect(client.notify).toHaveBeenCalledWith('chat', 'hello');
  });

  it('delivers notifications to LISTEN subscribers and unlistens', async () => {
    const { client, unlisten } = fakeClient();
    const bus = new PgNotifyBus(client);
    const received: string[] = [];

    const stop = await bus.subscribe('chat', (message) => received.push(message));
    await bus.publish('chat', 'hello');
    await stop();

    expect(received).toEqual(['hello']);
    expect(unlisten).toHaveBeenCalledTimes(1);
  });

  it('takes a pool guard slot for each publish', async () => {
    const { client } = fakeClient();
    const guard = new PoolGuard({ limit: 1, queueTimeoutMs: 0 });
    const run = vi.spyOn(guard, 'run');
    const bus = new PgNotifyBus(client, guard);

    await bus.publish('chat', 'hello');

    expect(run).toHaveBeenCalledWith('bus.publish:chat', expect.any(Function));
    expect(guard.stats().active).toBe(0);
  });
});
