/**
 * Parsed Record — The Format-Neutral Row
 * Layer: Domain
 *
 * Both parsers (CSV and OData JSON) produce exactly this shape, so nothing
 * downstream needs to know which one ran. All five fields are always present.
 *
 * The two numeric fields are read, not cast: a cell that converts becomes a
 * number, a missing one becomes null, and anything else stays as its text.
 * Casting to year and life expectancy happens in the normalizer, after the
 * both-sexes filter, so a malformed row that is filtered out never fails a run.
 */
import type { SourceFormat } from './RawBatch';

export type SourceCell = number | string | null;

export interface ParsedRecord {
  regionName: string;
  regionCode: string;
  timeDim: SourceCell;
  category: string;
  value: SourceCell;
}

export interface ParsedTable {
  format: SourceFormat;
  records: ParsedRecord[];
}
