/**
 * Migration CLI Script
 * Layer: Entry Point (CLI)
 *
 * `npm run migrate` — brings the warehouse schema up to date (creates
 * health_life_expectancy if it is missing). Run once before the first
 * transform, and in CI before the transform job.
 */
import path from 'node:path';

import { logger } from '@core/logger';
import { destroyDbConnections, getDbConnection } from '@infrastructure/database/connection';

async function main(): Promise<void> {
  const db = getDbConnection();
  const [batch, applied]: [number, string[]] = await db.migrate.latest({
    directory: path.resolve(__dirname, '../infrastructure/database/migrations'),
    loadExtensions: ['.ts'],
  });
  logger.info({ batch, applied }, applied.length > 0 ? 'Migrations applied' : 'Schema up to date');
}

main()
  .catch((err: unknown) => {
    logger.error({ err }, 'Migration failed');
    process.exitCode = 1;
  })
  .finally(() =>
    destroyDbConnections().catch((err: unknown) => {
      logger.warn({ err }, 'Failed to close database connections');
    }),
  );
