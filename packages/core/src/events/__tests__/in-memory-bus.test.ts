import { describe, it, expect, vi } from 'vitest';
import { InMemoryMessageBus } from '../in-memory-bus';

describe('InMemoryMessageBus', () => {
  it('records publications in order', async () => {
    const bus = new InMemoryMessageBus();

    await bus.publish('chat', 'hello');
    await bus.publish('status', 'ready');

    expect(bus.published).toEqual([
      { channel: 'chat', message: 'hello' },
      { channel: 'status', message: 'ready' },
    ]);
  });

  it('delivers to exact-channel subscribers only', async () => {
    const bus = new InMemoryMessageBus();
    const chat = vi.fn();
    const other = vi.fn();
    await bus.subscribe('chat', chat);
    await bus.subscribe('other', other);

    await bus.publish('chat', 'hello');

    expect(chat).toHaveBeenCalledWith('hello');
    expect(other).not.toHaveBeenCalled();
  });

  it('matches prefix patterns', async () => {
    const bus = new InMemoryMessageBus();
    const handler = vi.fn();
    await bus.subscribePattern('experiment.*', handler);

    await bus.publish('experiment.node.created', 'n1');
    await bus.publish('experimental', 'ignored');

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith('n1');
  });

  it('stops delivering after unsubscribe', async () => {
    const bus = new InMemoryMessageBus();
    const handler = vi.fn();
    const unsubscribe = await bus.subscribe('chat', handler);

    await unsubscribe();
    await bus.publish('chat', 'hello');

    expect(handler).not.toHaveBeenCalled();
  });

  it('keeps delivering when one subscriber throws', async () => {
    const bus = new InMemoryMessageBus();
    const stderr = vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    const healthy = vi.fn();
    await bus.subscribe('chat', () => {
      throw new Error('subscriber broke');
    });
    await bus.subscribe('chat', healthy);

    await expect(bus.publish('chat', 'hello')).resolves.toBeUndefined();

    expect(healthy).toHaveBeenCalledWith('hello');
    stderr.mockRestore();
  });

  it('clear forgets recorded publications', async () => {
    const bus = new InMemoryMessageBus();
    await bus.publish('chat', 'hello');

    bus.clear();

    expect(bus.published).toEqual([]);
  });
});
