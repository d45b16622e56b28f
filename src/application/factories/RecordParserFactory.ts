/**
 * Record Parser Factory
 * Layer: Application
 * Pattern: Factory Pattern
 *
 * I map the sniffed SourceFormat to its parser: 'tabular' → TabularRecordParser,
 * 'structured' → StructuredRecordParser. The switch is exhaustive over the
 * union, so adding a format without a parser fails to compile.
 */
import { StructuredRecordParser } from '@application/parsers/StructuredRecordParser';
import { TabularRecordParser } from '@application/parsers/TabularRecordParser';
import type { SourceFormat } from '@domain/entities/RawBatch';
import type { IRecordParser } from '@domain/interfaces/IRecordParser';
import { FormatError } from '@shared/errors/AppError';
import { injectable } from 'tsyringe';

@injectable()
export class RecordParserFactory {
  create(format: SourceFormat): IRecordParser {
    switch (format) {
      case 'tabular':
        return new TabularRecordParser();
      case 'structured':
        return new StructuredRecordParser();
      default: {
        const unknownFormat: never = format;
        throw new FormatError(`Unknown source format: ${String(unknownFormat)}`);
      }
    }
  }
}
