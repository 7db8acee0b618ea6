import { logger, serializeError } from '@fieldwork/shared';
import type { MessageBus, OutboxEntry } from './types';

/** Ordered buffer of messages awaiting the owning transaction's commit. */
export class Outbox {
  private items: OutboxEntry[] = [];

  queue(channel: string, message: string): void {
    this.items.push({ channel, message });
  }

  reset(): void {
    this.items = [];
  }

  /** Snapshot in insertion order. */
  entries(): OutboxEntry[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}

export interface DeadLetter {
  entry: OutboxEntry;
  error: Error;
  attempts: number;
  failedAt: string;
}

export interface OutboxPublisherOptions {
  maxAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_PUBLISH_ATTEMPTS = 3;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Drains a committed session's outbox to the bus.
 *
 * The transaction is already durable when this runs, so a failing publish
 * can't be undone by rollback: each entry is retried a few times, then parked
 * in the dead-letter list and logged. `flush` never throws.
 */
export class OutboxPublisher {
  private deadLetters: DeadLetter[] = [];
  private readonly maxAttempts: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly bus: MessageBus,
    options: OutboxPublisherOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_PUBLISH_ATTEMPTS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async flush(entries: OutboxEntry[], sessionId?: string): Promise<void> {
    for (const entry of entries) {
      logger.debug(`Publishing message to ${entry.channel}`, {
        sessionId,
        channel: entry.channel,
        payload: entry.message,
      });
      await this.publishWithRetry(entry, sessionId);
    }
  }

  getDeadLetters(): DeadLetter[] {
    return [...this.deadLetters];
  }

  clearDeadLetters(): void {
    this.deadLetters = [];
  }

  private async publishWithRetry(entry: OutboxEntry, sessionId?: string): Promise<void> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await this.bus.publish(entry.channel, entry.message);
        return;
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (attempt < this.maxAttempts) {
          logger.warn(`Publish to ${entry.channel} failed (attempt ${attempt}/${this.maxAttempts})`, {
            sessionId,
            channel: entry.channel,
            attempt,
            error: serializeError(err),
          });
          await this.sleep(attempt * attempt * 100);
        } else {
          this.deadLetters.push({
            entry,
            error: err,
            attempts: attempt,
            failedAt: new Date().toISOString(),
          });
          logger.error(`Message to ${entry.channel} moved to dead letters after commit`, {
            sessionId,
            channel: entry.channel,
            attempt,
            error: serializeError(err),
          });
        }
      }
    }
  }
}
