/**
 * Warehouse Repository Interface — The Data Access Contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * The loader only ever needs two things from the warehouse: the declared
 * column list of the target table (to refuse a misaligned load) and a way to
 * stream a CSV body into it atomically. PostgresWarehouseRepository does the
 * second with COPY ... FROM STDIN inside one transaction.
 */
import type { Readable } from 'node:stream';

export interface TableRef {
  schema: string;
  table: string;
}

export interface CopyRequest {
  target: TableRef;
  columns: readonly string[];
  /** CSV body, no header. */
  source: Readable;
  /** Row count the server must report before we commit. */
  expectedRows: number;
}

export interface IWarehouseRepository {
  /** Column names in declared (ordinal) order; empty when the table does not exist. */
  getTableColumns(target: TableRef): Promise<string[]>;

  /** Copy the CSV body and commit, or roll back and throw. Returns the rows written. */
  copyCsv(request: CopyRequest): Promise<number>;
}
