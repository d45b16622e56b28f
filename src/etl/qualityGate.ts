/**
 * Quality Gate
 * Layer: ETL
 *
 * Two hard checks over the filtered table, both run to completion so the
 * error can say how bad things are:
 *
 *   1. Completeness — every record has a value. Count = records with null.
 *   2. Uniqueness  — (regionCode, timeDim, category) never repeats.
 *      Count = records whose key was already seen earlier in the table, so
 *      three rows sharing a key count as 2 duplicates.
 *
 * Missing values win when both fail. The gate never corrects anything; the
 * caller must not load after a QualityError.
 */
import type { ParsedRecord } from '@domain/entities/ParsedRecord';
import { QualityError } from '@shared/errors/AppError';

export interface QualityReport {
  rows: number;
  missingValues: number;
  duplicateRows: number;
}

export function inspectQuality(records: readonly ParsedRecord[]): QualityReport {
  let missingValues = 0;
  let duplicateRows = 0;
  const seen = new Set<string>();

  for (const record of records) {
    if (record.value === null) missingValues++;

    const key = naturalKey(record);
    if (seen.has(key)) duplicateRows++;
    else seen.add(key);
  }

  return { rows: records.length, missingValues, duplicateRows };
}

/** Throws QualityError on failure; returns the report when the batch is clean. */
export function validate(records: readonly ParsedRecord[]): QualityReport {
  const report = inspectQuality(records);
  const { missingValues, duplicateRows } = report;

  if (missingValues > 0) {
    throw new QualityError('MissingValues', missingValues, { report });
  }
  if (duplicateRows > 0) {
    throw new QualityError('DuplicateRows', duplicateRows, { report });
  }
  return report;
}

function naturalKey(record: ParsedRecord): string {
  return JSON.stringify([record.regionCode, record.timeDim, record.category]);
}
