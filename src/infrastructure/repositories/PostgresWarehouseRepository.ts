/**
 * PostgreSQL Warehouse Repository — Bulk Copy Implementation
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IWarehouseRepository)
 *
 * getTableColumns() reads information_schema through Knex, ordered by
 * ordinal_position, so the loader can compare the declared order with ours.
 *
 * copyCsv() is the throughput path. One pooled pg client, one transaction:
 *
 *   BEGIN → COPY "schema"."table" (cols) FROM STDIN (FORMAT csv) ← CSV stream
 *         → server row count == expected? → COMMIT
 *
 * Anything else — a stream error, a rejected row, a count mismatch — goes to
 * ROLLBACK, so a batch is either fully committed or not there at all. The
 * client is always released; if the rollback itself failed, it is released
 * with the error so pg destroys it instead of returning a dirty connection to
 * the pool.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type {
  CopyRequest,
  IWarehouseRepository,
  TableRef,
} from '@domain/interfaces/IWarehouseRepository';
import { LoadError } from '@shared/errors/AppError';
import type { Knex } from 'knex';
import { pipeline } from 'node:stream/promises';
import type { Pool } from 'pg';
import { from as copyFrom } from 'pg-copy-streams';
import { inject, injectable } from 'tsyringe';

@injectable()
export class PostgresWarehouseRepository implements IWarehouseRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.PgPool) private pool: Pool,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async getTableColumns(target: TableRef): Promise<string[]> {
    const rows: { column_name: string }[] = await this.db('information_schema.columns')
      .select('column_name')
      .where({ table_schema: target.schema, table_name: target.table })
      .orderBy('ordinal_position');
    return rows.map((r) => r.column_name);
  }

  async copyCsv(request: CopyRequest): Promise<number> {
    const { target, columns, source, expectedRows } = request;
    const sql =
      `COPY ${quoteIdent(target.schema)}.${quoteIdent(target.table)} ` +
      `(${columns.map(quoteIdent).join(', ')}) FROM STDIN WITH (FORMAT csv)`;

    const client = await this.pool.connect();
    let releaseError: Error | undefined;
    try {
      await client.query('BEGIN');
      const sink = client.query(copyFrom(sql));
      await pipeline(source, sink);

      if (sink.rowCount !== expectedRows) {
        throw new LoadError(`COPY wrote ${sink.rowCount} rows, expected ${expectedRows}`, {
          rowCount: sink.rowCount,
          expectedRows,
        });
      }

      await client.query('COMMIT');
      this.log.debug({ table: target.table, rows: sink.rowCount }, 'COPY committed');
      return sink.rowCount;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        releaseError = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
        this.log.error({ err: rollbackErr }, 'ROLLBACK failed; discarding connection');
      }
      throw err;
    } finally {
      client.release(releaseError);
    }
  }
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
