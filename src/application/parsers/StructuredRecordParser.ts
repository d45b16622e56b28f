/**
 * Structured Record Parser — WHO OData JSON → ParsedTable
 * Layer: Application
 * Pattern: Adapter Pattern (implements IRecordParser)
 *
 * The GHO API answers with an OData envelope `{ "@odata.context": ..., "value": [ ... ] }`;
 * older dumps are a bare array of the same objects. I accept both, and
 * nothing else. An envelope whose sequence is empty is a FormatError rather
 * than an empty table: the API never legitimately returns zero facts.
 *
 * Columns are the union of keys across all objects, so a field that only
 * some rows carry still counts as resolved (the other rows read it as null).
 */
import type { ParsedTable } from '@domain/entities/ParsedRecord';
import type { IRecordParser } from '@domain/interfaces/IRecordParser';
import { FormatError } from '@shared/errors/AppError';

import { assertStructuralColumns, type SourceRow, toParsedRecord } from './recordFields';

export class StructuredRecordParser implements IRecordParser {
  readonly format = 'structured' as const;

  parse(bytes: Buffer): ParsedTable {
    const rows = extractRows(decodeJson(bytes));

    const columns = new Set<string>();
    for (const row of rows) {
      for (const key of Object.keys(row)) columns.add(key);
    }
    assertStructuralColumns(columns);

    return {
      format: this.format,
      records: rows.map((row, i) => toParsedRecord(row, i + 1)),
    };
  }
}

function decodeJson(bytes: Buffer): unknown {
  try {
    return JSON.parse(bytes.toString('utf-8').replace(/^\uFEFF/, ''));
  } catch (err) {
    throw new FormatError(
      `JSON payload could not be parsed: ${err instanceof Error ? err.message : String(err)}`,
      {},
      { cause: err },
    );
  }
}

function extractRows(payload: unknown): SourceRow[] {
  const sequence = Array.isArray(payload)
    ? payload
    : isObject(payload) && Array.isArray(payload.value)
      ? payload.value
      : null;

  if (sequence === null) {
    throw new FormatError("JSON payload is neither an array nor an object with a 'value' array");
  }
  if (sequence.length === 0) {
    throw new FormatError("JSON has no 'value' array or it is empty");
  }

  return sequence.map((item: unknown, i) => {
    if (!isObject(item)) {
      throw new FormatError('JSON record is not an object', { row: i + 1 });
    }
    return item;
  });
}

function isObject(value: unknown): value is SourceRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
