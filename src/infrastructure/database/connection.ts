/**
 * Database Connections — Singletons
 * Layer: Infrastructure
 * Pattern: Singleton
 *
 * The transform talks to the warehouse two ways:
 *
 *   - Knex, for everything that is plain SQL: migrations and reading the
 *     target table's declared columns from information_schema.
 *   - A raw pg Pool, for COPY ... FROM STDIN. The copy protocol needs the
 *     driver's client object to hand a writable stream to, which Knex does not
 *     expose with types.
 *
 * Both are created lazily, once per process, from the same DATABASE_URL. One
 * run only ever needs a single connection at a time, so the pools stay small.
 *
 * `destroyDbConnections()` is called when the run ends (success, failure or
 * signal) so the process can exit without dangling sockets.
 */
import { config } from '@core/config';
import { logger } from '@core/logger';
import knex, { Knex } from 'knex';
import { Pool } from 'pg';

let knexInstance: Knex | null = null;
let poolInstance: Pool | null = null;

function sslOption(): false | { rejectUnauthorized: boolean } {
  return config.database.ssl ? { rejectUnauthorized: false } : false;
}

export function getDbConnection(): Knex {
  if (!knexInstance) {
    knexInstance = knex({
      client: 'pg',
      connection: {
        connectionString: config.database.url,
        ssl: sslOption(),
      },
      pool: {
        min: config.database.pool.min,
        max: config.database.pool.max,
      },
      acquireConnectionTimeout: 10_000,
    });
    logger.debug('Knex connection pool initialized');
  }
  return knexInstance;
}

export function getPgPool(): Pool {
  if (!poolInstance) {
    poolInstance = new Pool({
      connectionString: config.database.url,
      ssl: sslOption(),
      max: config.database.pool.max,
      connectionTimeoutMillis: 10_000,
    });
    poolInstance.on('error', (err) => {
      logger.error({ err }, 'Idle warehouse connection failed');
    });
    logger.debug('pg copy pool initialized');
  }
  return poolInstance;
}

/** Tears down both pools (end of run / test cleanup). */
export async function destroyDbConnections(): Promise<void> {
  const closing: Promise<void>[] = [];
  if (knexInstance) {
    closing.push(knexInstance.destroy());
    knexInstance = null;
  }
  if (poolInstance) {
    closing.push(poolInstance.end());
    poolInstance = null;
  }
  if (closing.length > 0) {
    await Promise.all(closing);
    logger.debug('Database connections destroyed');
  }
}
