/**
 * Bulk Loader — CanonicalRecord[] → COPY
 * Layer: ETL
 *
 * I don’t insert row by row. The whole batch is serialized into a CSV stream
 * (csv-stringify) and handed to the warehouse repository, which pipes it into
 * COPY ... FROM STDIN inside a single transaction.
 *
 * Before any serialization I read the target table’s declared columns and
 * compare them, position by position, with CANONICAL_COLUMNS. Any difference
 * is a SchemaMismatchError — we never rely on COPY’s column list to paper
 * over a table that has drifted.
 *
 * Cell formats: numbers via String() (no rounding), ingested_at as UTC
 * "YYYY-MM-DD HH:MM:SS.mmm" for the `timestamp without time zone` column.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { CanonicalRecord, CanonicalRow } from '@domain/entities/CanonicalRecord';
import type { IWarehouseRepository } from '@domain/interfaces/IWarehouseRepository';
import { CANONICAL_COLUMNS } from '@shared/constants';
import {
  AppError,
  EmptyResultError,
  LoadError,
  SchemaMismatchError,
} from '@shared/errors/AppError';
import type { WarehouseSettings } from '@shared/types';
import { stringify } from 'csv-stringify';
import type { Readable } from 'node:stream';
import { inject, injectable } from 'tsyringe';

CANONICAL_COLUMNS satisfies readonly (keyof CanonicalRow)[];

@injectable()
export class BulkLoader {
  constructor(
    @inject(TOKENS.WarehouseRepository) private repo: IWarehouseRepository,
    @inject(TOKENS.WarehouseSettings) private settings: WarehouseSettings,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  /** Returns the number of rows committed. */
  async load(records: readonly CanonicalRecord[]): Promise<number> {
    if (records.length === 0) {
      throw new EmptyResultError('Refusing to load an empty batch');
    }

    const target = { schema: this.settings.schema, table: this.settings.table };
    const startMs = Date.now();

    try {
      const actual = await this.repo.getTableColumns(target);
      assertColumnsMatch(actual);

      const rowsWritten = await this.repo.copyCsv({
        target,
        columns: CANONICAL_COLUMNS,
        source: serializeForCopy(records),
        expectedRows: records.length,
      });

      const elapsedMs = Date.now() - startMs;
      this.log.info(
        {
          table: `${target.schema}.${target.table}`,
          rows: rowsWritten,
          elapsedMs,
          rowsPerSecond: Math.round(rowsWritten / Math.max(elapsedMs / 1000, 0.01)),
        },
        'PostgreSQL COPY complete',
      );
      return rowsWritten;
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new LoadError(
        `Bulk copy into ${target.schema}.${target.table} failed: ${err instanceof Error ? err.message : String(err)}`,
        { table: target.table, rows: records.length },
        { cause: err },
      );
    }
  }
}

export function assertColumnsMatch(actual: readonly string[]): void {
  const matches =
    actual.length === CANONICAL_COLUMNS.length &&
    CANONICAL_COLUMNS.every((column, i) => actual[i] === column);
  if (!matches) {
    throw new SchemaMismatchError(CANONICAL_COLUMNS, actual);
  }
}

export function toCanonicalRow(record: CanonicalRecord): CanonicalRow {
  return {
    country_name: record.countryName,
    country_code: record.countryCode,
    year: record.year,
    sex: record.sexCategory,
    life_expectancy: record.lifeExpectancy,
    ingested_at: record.ingestedAt,
  };
}

/** CSV body (no header) with cells in CANONICAL_COLUMNS order. */
export function serializeForCopy(records: readonly CanonicalRecord[]): Readable {
  const rows = records.map((record) => {
    const row = toCanonicalRow(record);
    return CANONICAL_COLUMNS.map((column) => formatCell(row[column]));
  });
  return stringify(rows);
}

function formatCell(value: string | number | Date): string {
  if (value instanceof Date) {
    return value.toISOString().replace('T', ' ').replace('Z', '');
  }
  return String(value);
}
