/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Shared raw payloads and records so tests don't repeat them. Payloads are
 * small hand-written snapshots in the two shapes the staging bucket holds:
 * the OData JSON envelope and the CSV export. Values are made up.
 */
import type { CanonicalRecord } from '@domain/entities/CanonicalRecord';
import type { ParsedRecord } from '@domain/entities/ParsedRecord';
import type { StagedObject } from '@domain/entities/RawBatch';

/** Fixed run start time; becomes every row's ingested_at. */
export const RUN_TS = new Date('2024-05-01T12:00:00.000Z');

/** The serialized form of RUN_TS in the COPY body. */
export const RUN_TS_CELL = '2024-05-01 12:00:00.000';

export const scenarioAJson =
  '{"value":[{"SpatialDim":"RWA","TimeDim":2020,"Dim1":"SEX_BTSX","NumericValue":69.3}]}';

export const scenarioBCsv = 'SpatialDimCode,TimeDim,Dim1,NumericValue\nRWA,2020,Both sexes,69.3\n';

export const missingValueCsv = [
  'SpatialDimCode,TimeDim,Dim1,NumericValue',
  'RWA,2020,Both sexes,',
  'KEN,2020,Both sexes,66.7',
].join('\n');

export const duplicateRowsCsv = [
  'SpatialDimCode,TimeDim,Dim1,NumericValue',
  'RWA,2020,Both sexes,69.3',
  'RWA,2020,Both sexes,70.1',
].join('\n');

export const sexDisaggregatedJson = JSON.stringify({
  value: [
    { SpatialDim: 'RWA', TimeDim: 2020, Dim1: 'SEX_MLE', NumericValue: 67.1 },
    { SpatialDim: 'RWA', TimeDim: 2020, Dim1: 'SEX_FMLE', NumericValue: 71.4 },
  ],
});

/** A realistic OData envelope: extra keys, mixed categories, one null value. */
export const odataEnvelope = JSON.stringify({
  '@odata.context': 'https://example.test/api/$metadata#WHOSIS_000001',
  value: [
    {
      Id: 1,
      IndicatorCode: 'WHOSIS_000001',
      SpatialDimType: 'COUNTRY',
      SpatialDim: 'KEN',
      TimeDim: 2019,
      Dim1: 'SEX_BTSX',
      NumericValue: 66.1,
    },
    {
      Id: 2,
      IndicatorCode: 'WHOSIS_000001',
      SpatialDimType: 'COUNTRY',
      SpatialDim: 'KEN',
      TimeDim: 2019,
      Dim1: 'SEX_FMLE',
      NumericValue: 68.9,
    },
    {
      Id: 3,
      IndicatorCode: 'WHOSIS_000001',
      SpatialDimType: 'COUNTRY',
      SpatialDim: 'UGA',
      TimeDim: 2019,
      Dim1: 'SEX_BTSX',
      NumericValue: null,
    },
  ],
});

export function parsedRecord(overrides: Partial<ParsedRecord> = {}): ParsedRecord {
  return {
    regionName: 'RWA',
    regionCode: 'RWA',
    timeDim: 2020,
    category: 'Both sexes',
    value: 69.3,
    ...overrides,
  };
}

export function canonicalRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    countryName: 'RWA',
    countryCode: 'RWA',
    year: 2020,
    sexCategory: 'both',
    lifeExpectancy: 69.3,
    ingestedAt: RUN_TS,
    ...overrides,
  };
}

export function stagedObject(name: string, lastModified: string): StagedObject {
  return { name, lastModified: new Date(lastModified) };
}
