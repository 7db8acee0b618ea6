import { logger, serializeError } from '@fieldwork/shared';
import type { MessageBus, OutboxEntry } from '@fieldwork/db';

export type MessageHandler = (message: string) => void;

/**
 * Process-local bus. Records every publication and delivers it to matching
 * subscribers; a subscriber that throws is logged and skipped.
 */
export class InMemoryMessageBus implements MessageBus {
  private handlers = new Map<string, Set<MessageHandler>>();
  private patternHandlers = new Map<string, Set<MessageHandler>>();
  private log: OutboxEntry[] = [];

  async publish(channel: string, message: string): Promise<void> {
    this.log.push({ channel, message });
    for (const handler of this.getMatchingHandlers(channel)) {
      try {
        handler(message);
      } catch (error) {
        logger.error(`Subscriber on ${channel} failed`, { channel, error: serializeError(error) });
      }
    }
  }

  async subscribe(channel: string, handler: MessageHandler): Promise<() => Promise<void>> {
    return this.register(this.handlers, channel, handler);
  }

  /** `experiment.*` matches `experiment.started`, `experiment.node.created`, ... */
  async subscribePattern(pattern: string, handler: MessageHandler): Promise<() => Promise<void>> {
    return this.register(this.patternHandlers, pattern, handler);
  }

  get published(): OutboxEntry[] {
    return [...this.log];
  }

  clear(): void {
    this.log = [];
  }

  private register(
    registry: Map<string, Set<MessageHandler>>,
    key: string,
    handler: MessageHandler,
  ): () => Promise<void> {
    const existing = registry.get(key) ?? new Set<MessageHandler>();
    existing.add(handler);
    registry.set(key, existing);
    return async () => {
      existing.delete(handler);
      if (existing.size === 0) registry.delete(key);
    };
  }

  private getMatchingHandlers(channel: string): MessageHandler[] {
    const result: MessageHandler[] = [...(this.handlers.get(channel) ?? [])];
    for (const [pattern, handlers] of this.patternHandlers) {
      if (this.matchPattern(pattern, channel)) {
        result.push(...handlers);
      }
    }
    return result;
  }

  private matchPattern(pattern: string, channel: string): boolean {
    if (pattern.endsWith('.*')) {
      const prefix = pattern.slice(0, -2);
      return channel.startsWith(prefix + '.');
    }
    return pattern === channel;
  }
}
