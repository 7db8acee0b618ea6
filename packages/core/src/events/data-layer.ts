import {
  OutboxPublisher,
  PgConnectionSource,
  PgNotifyBus,
  SessionRegistry,
  closeDbClient,
  getDbClient,
  runSerialized as runSerializedWith,
} from '@fieldwork/db';
import type {
  MessageBus,
  ScopeOptions,
  SerializedOptions,
  Session,
  SessionConnection,
} from '@fieldwork/db';
import { logger } from '@fieldwork/shared';

export type AppSession = Session<SessionConnection>;

let messageBus: MessageBus | null = null;
let sessionRegistry: SessionRegistry<SessionConnection> | null = null;

export function getMessageBus(): MessageBus {
  if (!messageBus) {
    const { sql, guard } = getDbClient();
    messageBus = new PgNotifyBus(sql, guard);
  }
  return messageBus;
}

export function setMessageBus(bus: MessageBus | null): void {
  messageBus = bus;
}

export function getSessionRegistry(): SessionRegistry<SessionConnection> {
  if (!sessionRegistry) {
    const { sql, guard } = getDbClient();
    sessionRegistry = new SessionRegistry<SessionConnection>(
      new PgConnectionSource(sql, guard),
      new OutboxPublisher(getMessageBus()),
    );
  }
  return sessionRegistry;
}

export function setSessionRegistry(registry: SessionRegistry<SessionConnection> | null): void {
  sessionRegistry = registry;
}

export function runScoped<T>(
  work: (session: AppSession) => Promise<T>,
  options?: ScopeOptions,
): Promise<T> {
  return getSessionRegistry().runScoped(work, options);
}

export function withScopedSession<A extends unknown[], R>(
  fn: (session: AppSession, ...args: A) => Promise<R>,
  options?: ScopeOptions,
): (...args: A) => Promise<R> {
  return (...args: A) => getSessionRegistry().withScopedSession(fn, options)(...args);
}

export function runSerialized<T>(
  work: (session: AppSession) => Promise<T>,
  options?: SerializedOptions,
): Promise<T> {
  return runSerializedWith(getSessionRegistry(), work, options);
}

export function serialized<A extends unknown[], R>(
  fn: (session: AppSession, ...args: A) => Promise<R>,
  options?: SerializedOptions,
): (...args: A) => Promise<R> {
  return (...args: A) => runSerialized((session) => fn(session, ...args), options);
}

/** Queues on the session bound to the current async context. */
export function queueMessage(channel: string, message: unknown): void {
  getSessionRegistry().queueMessage(channel, message);
}

export async function shutdownDataLayer(): Promise<void> {
  sessionRegistry = null;
  messageBus = null;
  await closeDbClient();
  logger.info('Data layer shut down');
}
