/**
 * Record Field Resolution — Shared by Both Parsers
 * Layer: Application
 *
 * The CSV and JSON parsers disagree on almost everything except the field
 * names, so the mapping from a loose source row to a ParsedRecord lives here
 * once. Both parsers call `assertStructuralColumns()` on the set of columns
 * they saw, then `toParsedRecord()` per row.
 *
 * Numeric cells are only read here (see SourceCell); casting them is the
 * normalizer's job.
 *
 * Region fallback: the OData JSON carries the ISO-3 code in SpatialDim and has
 * no SpatialDimCode; some CSV exports carry only SpatialDimCode. Whichever
 * one is present fills the other.
 */
import type { ParsedRecord, SourceCell } from '@domain/entities/ParsedRecord';
import { MISSING_VALUE_TOKENS, SOURCE_FIELDS } from '@shared/constants';
import { FormatError } from '@shared/errors/AppError';

export type SourceRow = Record<string, unknown>;

export function assertStructuralColumns(columns: ReadonlySet<string>): void {
  const missing: string[] = [];
  if (!columns.has(SOURCE_FIELDS.REGION_NAME) && !columns.has(SOURCE_FIELDS.REGION_CODE)) {
    missing.push(`${SOURCE_FIELDS.REGION_NAME}|${SOURCE_FIELDS.REGION_CODE}`);
  }
  for (const field of [SOURCE_FIELDS.TIME_DIM, SOURCE_FIELDS.CATEGORY, SOURCE_FIELDS.VALUE]) {
    if (!columns.has(field)) missing.push(field);
  }
  if (missing.length > 0) {
    throw new FormatError(`Missing mandatory columns: ${missing.join(', ')}`, { missing });
  }
}

/** `rowNumber` is 1-based and only used in error details. */
export function toParsedRecord(row: SourceRow, rowNumber: number): ParsedRecord {
  const name = asText(row[SOURCE_FIELDS.REGION_NAME]);
  const code = asText(row[SOURCE_FIELDS.REGION_CODE]);
  const regionName = name || code;
  const regionCode = code || name;
  if (!regionName) {
    throw new FormatError('Row has no region identifier', { row: rowNumber });
  }

  return {
    regionName,
    regionCode,
    timeDim: asCell(row[SOURCE_FIELDS.TIME_DIM]),
    category: asText(row[SOURCE_FIELDS.CATEGORY]),
    value: asCell(row[SOURCE_FIELDS.VALUE]),
  };
}

function asText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Missing tokens read as null, numeric text as a number. Anything else keeps
 * its text; the normalizer rejects it if the row survives the filter.
 */
function asCell(value: unknown): SourceCell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  const text = typeof value === 'string' ? value.trim() : JSON.stringify(value);
  if (MISSING_VALUE_TOKENS.has(text)) return null;
  const numeric = Number(text);
  return Number.isFinite(numeric) ? numeric : text;
}
