/**
 * Format Sniffer
 * Layer: ETL
 *
 * A peek, not a parse: look at the first few bytes and guess. A leading `{`
 * means the OData JSON envelope, anything else is treated as CSV. A payload
 * that lies about itself is caught by the parser, not here.
 */
import type { SourceFormat } from '@domain/entities/RawBatch';
import { SNIFF_BYTES } from '@shared/constants';

export function detectFormat(bytes: Buffer): SourceFormat {
  // trimStart() also drops a UTF-8 BOM (U+FEFF)
  const peek = bytes.subarray(0, SNIFF_BYTES).toString('utf-8').trimStart();
  return peek.startsWith('{') ? 'structured' : 'tabular';
}
