/** Field names used by the WHO GHO exports (CSV header and OData JSON keys). */
export const SOURCE_FIELDS = {
  REGION_NAME: 'SpatialDim',
  REGION_CODE: 'SpatialDimCode',
  TIME_DIM: 'TimeDim',
  CATEGORY: 'Dim1',
  VALUE: 'NumericValue',
} as const;

export const SEX_CATEGORIES = ['both', 'male', 'female'] as const;

export type SexCategory = (typeof SEX_CATEGORIES)[number];

/**
 * Category equivalence sets. The CSV export spells categories out, the OData
 * JSON uses coded tokens. Add new source tokens here explicitly.
 */
export const SEX_CATEGORY_TOKENS: Record<SexCategory, readonly string[]> = {
  both: ['Both sexes', 'SEX_BTSX'],
  male: ['Male', 'SEX_MLE'],
  female: ['Female', 'SEX_FMLE'],
};

/** Only the aggregate category is loaded. */
export const BOTH_SEXES_TOKENS = SEX_CATEGORY_TOKENS.both;

/**
 * Cell texts read as "no value" in the numeric columns (TimeDim, NumericValue):
 * the usual NA spellings of spreadsheet and dataframe exports. Matched after
 * trimming, case-sensitively.
 */
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

/** Warehouse column list, in the table's declared order. */
export const CANONICAL_COLUMNS = [
  'country_name',
  'country_code',
  'year',
  'sex',
  'life_expectancy',
  'ingested_at',
] as const;

/** Bytes inspected by the format sniffer. */
export const SNIFF_BYTES = 50;
