/**
 * Normalizer — ParsedRecord → CanonicalRecord
 * Layer: ETL
 *
 * Two steps that sit on either side of the quality gate:
 *
 *   filterBothSexes()  keeps only the aggregate category (both token spellings),
 *                      in source order, then applies the optional MAX_ROWS cap.
 *                      An empty result is fatal — we never load nothing.
 *
 *   toCanonical()      renames and casts, and stamps every record with the one
 *                      `ingestedAt` the caller captured at run start. TimeDim
 *                      must be an integer and NumericValue a number; text the
 *                      parser could not convert is a FormatError here.
 *
 * The filter is idempotent: running it on its own output returns the same rows.
 */
import type { CanonicalRecord, SexCategory } from '@domain/entities/CanonicalRecord';
import type { ParsedRecord, SourceCell } from '@domain/entities/ParsedRecord';
import {
  BOTH_SEXES_TOKENS,
  SEX_CATEGORIES,
  SEX_CATEGORY_TOKENS,
  SOURCE_FIELDS,
} from '@shared/constants';
import { EmptyResultError, FormatError, QualityError } from '@shared/errors/AppError';

export function resolveSexCategory(token: string): SexCategory | null {
  return SEX_CATEGORIES.find((category) => SEX_CATEGORY_TOKENS[category].includes(token)) ?? null;
}

export function filterBothSexes(
  records: readonly ParsedRecord[],
  maxRows?: number,
): ParsedRecord[] {
  const kept = records.filter((record) => BOTH_SEXES_TOKENS.includes(record.category));
  if (kept.length === 0) {
    throw new EmptyResultError(
      `No rows left after filtering for both sexes (Dim1 in ${BOTH_SEXES_TOKENS.join(', ')})`,
      { inputRows: records.length, tokens: [...BOTH_SEXES_TOKENS] },
    );
  }
  return maxRows !== undefined ? kept.slice(0, maxRows) : kept;
}

export function toCanonical(records: readonly ParsedRecord[], ingestedAt: Date): CanonicalRecord[] {
  return records.map((record, i) => {
    const row = i + 1;
    if (record.value === null) {
      throw new QualityError('MissingValues', 1, { row });
    }
    const sexCategory = resolveSexCategory(record.category);
    if (sexCategory === null) {
      throw new FormatError(`Unrecognised category token: ${record.category}`, { row });
    }
    return {
      countryName: record.regionName,
      countryCode: record.regionCode,
      year: toYear(record.timeDim, row),
      sexCategory,
      lifeExpectancy: toLifeExpectancy(record.value, row),
      ingestedAt,
    };
  });
}

function toYear(cell: SourceCell, row: number): number {
  if (typeof cell === 'number' && Number.isInteger(cell)) return cell;
  throw new FormatError(`${SOURCE_FIELDS.TIME_DIM} is not an integer`, { row, value: cell });
}

function toLifeExpectancy(cell: number | string, row: number): number {
  if (typeof cell === 'number') return cell;
  throw new FormatError(`${SOURCE_FIELDS.VALUE} is not a finite number`, { row, value: cell });
}
