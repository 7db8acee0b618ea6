import type { ConnectionSource, MessageBus, OutboxEntry, SessionConnection } from '../../session/types';

/** Mimics a driver error carrying a SQLSTATE. */
export class FakePgError extends Error {
  constructor(
    public code: string,
    message = `postgres error ${code}`,
  ) {
    super(message);
    this.name = 'PostgresError';
  }
}

export const serializationFailure = () =>
  new FakePgError('40001', 'could not serialize access due to read/write dependencies among transactions');

interface PlannedFailure {
  statement: string;
  error: Error;
  remaining: number;
}

export class FakeConnection implements SessionConnection {
  released = false;

  constructor(
    readonly id: number,
    private readonly source: FakeConnectionSource,
  ) {}

  async execute(statement: string): Promise<void> {
    this.source.statements.push(statement);
    this.source.throwIfPlanned(statement);
  }

  async release(): Promise<void> {
    this.released = true;
    this.source.active--;
  }
}

/** In-process stand-in for the pooled Postgres connection source. */
export class FakeConnectionSource implements ConnectionSource<FakeConnection> {
  readonly statements: string[] = [];
  readonly connections: FakeConnection[] = [];
  active = 0;
  private failures: PlannedFailure[] = [];

  async reserve(): Promise<FakeConnection> {
    const conn = new FakeConnection(this.connections.length + 1, this);
    this.connections.push(conn);
    this.active++;
    return conn;
  }

  /** Makes the next `times` executions of `statement` throw `error`. */
  failNext(statement: string, error: Error, times = 1): void {
    this.failures.push({ statement, error, remaining: times });
  }

  count(statement: string): number {
    return this.statements.filter((s) => s === statement).length;
  }

  throwIfPlanned(statement: string): void {
    const planned = this.failures.find((f) => f.statement === statement && f.remaining > 0);
    if (planned) {
      planned.remaining--;
      throw planned.error;
    }
  }
}

export class RecordingBus implements MessageBus {
  readonly published: OutboxEntry[] = [];
  onPublish?: (entry: OutboxEntry) => void;

  async publish(channel: string, message: string): Promise<void> {
    const entry = { channel, message };
    this.onPublish?.(entry);
    this.published.push(entry);
  }

  async subscribe(): Promise<() => Promise<void>> {
    return async () => {};
  }
}
