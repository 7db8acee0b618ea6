/**
 * Lifecycle of the transaction a session currently carries.
 *
 * `inactive` until the first `connection()` call begins one; `committed` and
 * `rolled_back` are terminal for that transaction, and the next
 * `connection()` begins a fresh one.
 */
export type TransactionState = 'inactive' | 'active' | 'committed' | 'rolled_back';

export type IsolationLevel = 'read committed' | 'repeatable read' | 'serializable';

export const DEFAULT_ISOLATION_LEVEL: IsolationLevel = 'read committed';

export interface OutboxEntry {
  channel: string;
  message: string;
}

/**
 * A pub/sub broker. `publish` is only ever invoked after the owning
 * transaction has committed.
 */
export interface MessageBus {
  publish(channel: string, message: string): Promise<void>;
  subscribe(channel: string, handler: (message: string) => void): Promise<() => Promise<void>>;
}

/**
 * One borrowed physical connection. `execute` runs transaction-control
 * statements (BEGIN, COMMIT, SAVEPOINT ...) on it.
 */
export interface SessionConnection {
  execute(statement: string): Promise<void>;
  release(): Promise<void>;
}

export interface ConnectionSource<TConn extends SessionConnection = SessionConnection> {
  reserve(): Promise<TConn>;
}
