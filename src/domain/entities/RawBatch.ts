/**
 * Raw Batch — One Fetched Snapshot
 * Layer: Domain
 *
 * The bytes of the latest staged object plus the format the sniffer detected.
 * A batch is created by the fetch step, handed to exactly one parser, then
 * dropped; nothing mutates it in between.
 */
export type SourceFormat = 'tabular' | 'structured';

export interface RawBatch {
  readonly objectName: string;
  readonly bytes: Buffer;
  readonly format: SourceFormat;
}

/** One entry of a staging-store listing. */
export interface StagedObject {
  name: string;
  lastModified: Date;
}
