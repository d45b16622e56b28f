import type { ParsedTable } from '@domain/entities/ParsedRecord';
import type { SourceFormat } from '@domain/entities/RawBatch';

/**
 * Record Parser Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * Like a travel power adapter: each implementation takes one plug shape
 * (CSV text, OData JSON) and hands back the same socket — a ParsedTable whose
 * records all carry the five semantic fields. The pipeline never branches on
 * format after this point.
 *
 *   - TabularRecordParser    → format 'tabular'
 *   - StructuredRecordParser → format 'structured'
 *
 * Implementations throw FormatError when the payload is unparseable or the
 * mandatory columns cannot be resolved.
 */
export interface IRecordParser {
  readonly format: SourceFormat;
  parse(bytes: Buffer): ParsedTable;
}
