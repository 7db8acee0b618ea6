export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

export class ConnectionFailedError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CONNECTION_FAILED', message, 503, { cause });
    this.name = 'ConnectionFailedError';
  }
}

export class PoolExhaustedError extends AppError {
  constructor(message: string) {
    super('POOL_EXHAUSTED', message, 503);
    this.name = 'PoolExhaustedError';
  }
}

export class SessionStateError extends AppError {
  constructor(message: string) {
    super('SESSION_STATE', message, 500);
    this.name = 'SessionStateError';
  }
}

export class SerializationRetriesExhaustedError extends AppError {
  constructor(
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(
      'SERIALIZATION_RETRIES_EXHAUSTED',
      `Could not commit serialized transaction after ${attempts} attempts.`,
      503,
      { cause },
    );
    this.name = 'SerializationRetriesExhaustedError';
  }
}

export class InvalidEmailConfigError extends AppError {
  constructor(problems: string) {
    super('INVALID_EMAIL_CONFIG', problems, 500);
    this.name = 'InvalidEmailConfigError';
  }
}

/** A message could not be relayed. */
export class MessengerError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('MESSENGER_ERROR', message, 502, { cause });
    this.name = 'MessengerError';
  }
}
