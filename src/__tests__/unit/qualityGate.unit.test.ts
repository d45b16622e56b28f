/**
 * Unit Tests — Quality Gate
 *
 * Completeness and uniqueness over the filtered table. Counts must be exact
 * because they end up in the failure report.
 */
import { inspectQuality, validate } from '@etl/qualityGate';
import { QualityError } from '@shared/errors/AppError';

import { parsedRecord } from '../helpers/fixtures';

function captureQualityError(fn: () => unknown): QualityError {
  try {
    fn();
  } catch (err) {
    if (err instanceof QualityError) return err;
    throw err;
  }
  throw new Error('expected a QualityError');
}

describe('inspectQuality', () => {
  it('should report a clean table', () => {
    const records = [parsedRecord(), parsedRecord({ regionCode: 'KEN', regionName: 'KEN' })];

    expect(inspectQuality(records)).toEqual({ rows: 2, missingValues: 0, duplicateRows: 0 });
  });

  it('should count every null value', () => {
    const records = [
      parsedRecord({ value: null }),
      parsedRecord({ timeDim: 2021, value: null }),
      parsedRecord({ timeDim: 2022 }),
    ];

    expect(inspectQuality(records).missingValues).toBe(2);
  });

  it('should count repeats after the first occurrence of a key', () => {
    const records = [
      parsedRecord({ value: 69.3 }),
      parsedRecord({ value: 70.1 }),
      parsedRecord({ value: 70.4 }),
      parsedRecord({ regionCode: 'KEN' }),
    ];

    expect(inspectQuality(records).duplicateRows).toBe(2);
  });

  it('should treat a different year or category as a different key', () => {
    const records = [
      parsedRecord(),
      parsedRecord({ timeDim: 2021 }),
      parsedRecord({ category: 'SEX_BTSX' }),
    ];

    expect(inspectQuality(records).duplicateRows).toBe(0);
  });

  it('should report an empty table as clean', () => {
    expect(inspectQuality([])).toEqual({ rows: 0, missingValues: 0, duplicateRows: 0 });
  });
});

describe('validate', () => {
  it('should return the report when the batch passes', () => {
    expect(validate([parsedRecord()])).toEqual({ rows: 1, missingValues: 0, duplicateRows: 0 });
  });

  it('should fail with MissingValues and the null count', () => {
    const error = captureQualityError(() =>
      validate([parsedRecord({ value: null }), parsedRecord({ regionCode: 'KEN' })]),
    );

    expect(error.kind).toBe('MissingValues');
    expect(error.count).toBe(1);
    expect(error.message).toBe('Null values found in life expectancy: 1');
  });

  it('should fail with DuplicateRows and the duplicate count', () => {
    const error = captureQualityError(() =>
      validate([parsedRecord({ value: 69.3 }), parsedRecord({ value: 70.1 })]),
    );

    expect(error.kind).toBe('DuplicateRows');
    expect(error.count).toBe(1);
    expect(error.details.report).toEqual({ rows: 2, missingValues: 0, duplicateRows: 1 });
  });

  it('should report missing values first when both checks fail', () => {
    const error = captureQualityError(() =>
      validate([parsedRecord({ value: null }), parsedRecord({ value: null })]),
    );

    expect(error.kind).toBe('MissingValues');
    expect(error.count).toBe(2);
  });
});
