/**
 * Serializable retry driver.
 *
 * Under SERIALIZABLE isolation Postgres aborts a transaction whose reads were
 * invalidated by a concurrent commit (SQLSTATE 40001). Such a transaction is
 * safe to run again from scratch, so the driver retries it with a randomized
 * exponential backoff until it commits or the attempt budget runs out.
 */

import { SerializationRetriesExhaustedError, logger, serializeError } from '@fieldwork/shared';
import type { Session } from './session';
import type { SessionRegistry } from './registry';
import type { SessionConnection } from './types';

export const SERIALIZATION_FAILURE = '40001';
export const DEFAULT_MAX_ATTEMPTS = 100;
/** Rate of the backoff's exponential distribution, per second (mean 2s). */
export const DEFAULT_BACKOFF_RATE = 0.5;

export interface SerializedOptions {
  maxAttempts?: number;
  backoffRate?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** True when `err`, or an error in its `cause` chain, is a serialization failure. */
export function isSerializationFailure(err: unknown): boolean {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ('code' in current && current.code === SERIALIZATION_FAILURE) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

/** Draws a delay in milliseconds from an exponential distribution with `rate` per second. */
export function exponentialBackoffMs(
  rate: number = DEFAULT_BACKOFF_RATE,
  random: () => number = Math.random,
): number {
  return (-Math.log1p(-random()) / rate) * 1000;
}

export async function runSerialized<TConn extends SessionConnection, T>(
  registry: SessionRegistry<TConn>,
  work: (session: Session<TConn>) => Promise<T>,
  options: SerializedOptions = {},
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    // Every attempt starts clean: no state leaks from a rejected one
    const session = registry.open();
    try {
      session.setIsolationLevel('serializable');
      const result = await registry.bind(session, () => work(session));
      await session.commit();
      return result;
    } catch (err) {
      try {
        await session.rollback();
      } catch (rollbackErr) {
        logger.error('Rollback of serialized transaction failed', {
          sessionId: session.id,
          attempt,
          error: serializeError(rollbackErr),
        });
      }

      if (!isSerializationFailure(err)) {
        throw err;
      }
      if (attempt >= maxAttempts) {
        logger.error('Serialized transaction retries exhausted', {
          sessionId: session.id,
          attempt,
          error: serializeError(err),
        });
        throw new SerializationRetriesExhaustedError(attempt, err);
      }
      logger.debug('Serialization conflict, retrying transaction', {
        sessionId: session.id,
        attempt,
      });
    } finally {
      await session.close();
    }

    // Only reached after a rejected attempt
    await sleep(exponentialBackoffMs(options.backoffRate, options.random));
  }
}

/** Wraps `fn` so each call runs through `runSerialized`. */
export function serialized<TConn extends SessionConnection, A extends unknown[], R>(
  registry: SessionRegistry<TConn>,
  fn: (session: Session<TConn>, ...args: A) => Promise<R>,
  options: SerializedOptions = {},
): (...args: A) => Promise<R> {
  return (...args: A) => runSerialized(registry, (session) => fn(session, ...args), options);
}
