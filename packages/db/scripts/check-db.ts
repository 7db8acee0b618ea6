import dotenv from 'dotenv';
import { getPlatformConfig, logger, serializeError } from '@fieldwork/shared';
import { sql } from 'drizzle-orm';
import { closeDbClient, getDbClient } from '../src/client';
import { checkConnection } from '../src/health';

// Run from the repository root: `npm run db:check`
dotenv.config({ path: '.env.local' });
dotenv.config({ path: '.env' });

async function main() {
  const { databaseUrl, connectTimeoutSeconds } = getPlatformConfig();
  const masked = databaseUrl.replace(/:[^:@]+@/, ':***@');
  logger.info(`Checking database connection: ${masked}`);

  await checkConnection({ url: databaseUrl, timeoutSeconds: connectTimeoutSeconds });

  // Same path the application takes: the pooled client
  const { db, guard } = getDbClient();
  const [row] = await guard.run('check-db.version', () =>
    db.execute<{ version: string }>(sql`select version() as version`),
  );
  logger.info('Database connection OK.', { serverVersion: row?.version });
}

main()
  .catch((err: unknown) => {
    logger.error('Database connection check failed', { error: serializeError(err) });
    process.exitCode = 1;
  })
  .finally(() => closeDbClient());
