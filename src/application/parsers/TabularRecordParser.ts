/**
 * Tabular Record Parser — WHO CSV → ParsedTable
 * Layer: Application
 * Pattern: Adapter Pattern (implements IRecordParser)
 *
 * I read delimited text with a header row through csv-parse. Rows come back
 * as string arrays so I can check the header against the mandatory columns
 * before touching any data; absent optional columns (SpatialDim or
 * SpatialDimCode) simply read as empty cells and the shared fallback fills
 * them. A header with no data rows is a valid, empty table — the filter
 * stage decides whether that is fatal.
 */
import type { ParsedTable } from '@domain/entities/ParsedRecord';
import type { IRecordParser } from '@domain/interfaces/IRecordParser';
import { FormatError } from '@shared/errors/AppError';
import { parse } from 'csv-parse/sync';

import { assertStructuralColumns, type SourceRow, toParsedRecord } from './recordFields';

export class TabularRecordParser implements IRecordParser {
  readonly format = 'tabular' as const;

  parse(bytes: Buffer): ParsedTable {
    const [header, ...body] = this.readRows(bytes);
    if (!header || header.every((cell) => cell === '')) {
      throw new FormatError('CSV payload has no header row');
    }

    assertStructuralColumns(new Set(header));

    const records = body.map((cells, i) => {
      const row: SourceRow = {};
      header.forEach((column, c) => {
        row[column] = cells[c];
      });
      // +2: 1-based, and the header occupies line 1
      return toParsedRecord(row, i + 2);
    });

    return { format: this.format, records };
  }

  private readRows(bytes: Buffer): string[][] {
    let rows: unknown;
    try {
      rows = parse(bytes, {
        bom: true,
        skip_empty_lines: true,
        trim: true,
      });
    } catch (err) {
      throw new FormatError(
        `CSV payload could not be parsed: ${err instanceof Error ? err.message : String(err)}`,
        {},
        { cause: err },
      );
    }
    if (!Array.isArray(rows) || !rows.every(isStringRow)) {
      throw new FormatError('CSV payload did not produce rows of text cells');
    }
    return rows;
  }
}

function isStringRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((cell) => typeof cell === 'string');
}
