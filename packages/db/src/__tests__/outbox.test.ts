import { describe, it, expect, vi } from 'vitest';
import { Outbox, OutboxPublisher } from '../session/outbox';
import type { MessageBus } from '../session/types';

function flakyBus(failures: Record<string, number>) {
  const published: Array<[string, string]> = [];
  const bus: MessageBus = {
    publish: vi.fn(async (channel: string, message: string) => {
      const remaining = failures[message] ?? 0;
      if (remaining > 0) {
        failures[message] = remaining - 1;
        throw new Error(`broker refused ${message}`);
      }
      published.push([channel, message]);
    }),
    subscribe: vi.fn(async () => async () => {}),
  };
  return { bus, published };
}

describe('Outbox', () => {
  it('keeps insertion order and snapshots entries', () => {
    const outbox = new Outbox();
    outbox.queue('a', '1');
    outbox.queue('b', '2');

    const snapshot = outbox.entries();
    outbox.queue('c', '3');

    expect(snapshot).toEqual([
      { channel: 'a', message: '1' },
      { channel: 'b', message: '2' },
    ]);
    expect(outbox.size).toBe(3);
  });

  it('reset empties the buffer', () => {
    const outbox = new Outbox();
    outbox.queue('a', '1');
    outbox.reset();

    expect(outbox.size).toBe(0);
    expect(outbox.entries()).toEqual([]);
  });
});

describe('OutboxPublisher', () => {
  it('retries a failed publish with growing delays', async () => {
    const { bus, published } = flakyBus({ hello: 2 });
    const sleep = vi.fn().mockResolvedValue(undefined);
    const publisher = new OutboxPublisher(bus, { sleep });

    await publisher.flush([{ channel: 'chat', message: 'hello' }]);

    expect(published).toEqual([['chat', 'hello']]);
    expect(bus.publish).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [400]]);
    expect(publisher.getDeadLetters()).toEqual([]);
  });

  it('parks a message in dead letters after the last attempt without throwing', async () => {
    const { bus, published } = flakyBus({ hello: 5 });
    const publisher = new OutboxPublisher(bus, { sleep: vi.fn().mockResolvedValue(undefined) });

    await expect(
      publisher.flush([
        { channel: 'chat', message: 'hello' },
        { channel: 'chat', message: 'world' },
      ]),
    ).resolves.toBeUndefined();

    expect(published).toEqual([['chat', 'world']]);
    const deadLetters = publisher.getDeadLetters();
    expect(deadLetters).toHaveLength(1);
    expect(deadLetters[0]?.entry).toEqual({ channel: 'chat', message: 'hello' });
    expect(deadLetters[0]?.attempts).toBe(3);
    expect(deadLetters[0]?.error.message).toBe('broker refused hello');

    publisher.clearDeadLetters();
    expect(publisher.getDeadLetters()).toEqual([]);
  });

  it('honours a custom attempt budget', async () => {
    const { bus } = flakyBus({ hello: 1 });
    const publisher = new OutboxPublisher(bus, { maxAttempts: 1 });

    await publisher.flush([{ channel: 'chat', message: 'hello' }]);

    expect(bus.publish).toHaveBeenCalledTimes(1);
    expect(publisher.getDeadLetters()).toHaveLength(1);
  });
});
