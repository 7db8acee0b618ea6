import postgres from 'postgres';
import { ConnectionFailedError, getPlatformConfig, logger, serializeError } from '@fieldwork/shared';

export const DEFAULT_HEALTH_CHECK_TIMEOUT_SECONDS = 10;

export const DB_USER_WARNING = `
*********************************************************
*********************************************************


Fieldwork requires a database user named "fieldwork".

Run:

    createuser -P fieldwork --createdb

Consult the developer guide for more information.


*********************************************************
*********************************************************

`;

// 28P01 invalid_password, 28000 invalid_authorization_specification
const AUTH_FAILURE_CODES = new Set(['28P01', '28000']);

/** True when the failure points at a missing role or a rejected password. */
export function isMissingRoleError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err ? err.code : undefined;
  if (typeof code === 'string' && AUTH_FAILURE_CODES.has(code)) return true;
  const msg = err.message.toLowerCase();
  return msg.includes('password authentication failed for user') || /role ".*" does not exist/.test(msg);
}

export interface CheckConnectionOptions {
  url?: string;
  timeoutSeconds?: number;
  /** Operator-facing stream for remediation hints. */
  stderr?: { write(chunk: string): unknown };
}

/**
 * Opens and immediately closes a dedicated connection to the configured
 * store. Startup/readiness probe only; never called inside a retry loop.
 */
export async function checkConnection(options: CheckConnectionOptions = {}): Promise<void> {
  const url = options.url ?? getPlatformConfig().databaseUrl;
  const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_HEALTH_CHECK_TIMEOUT_SECONDS;
  const stderr = options.stderr ?? process.stderr;

  const sql = postgres(url, { max: 1, connect_timeout: timeoutSeconds, idle_timeout: 1 });
  try {
    await sql`select 1`;
  } catch (err) {
    logger.error('Database connection check failed', { error: serializeError(err) });
    if (isMissingRoleError(err)) {
      stderr.write(DB_USER_WARNING);
    }
    throw new ConnectionFailedError(
      `Could not connect to the database: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  } finally {
    await sql.end({ timeout: timeoutSeconds });
  }
}
