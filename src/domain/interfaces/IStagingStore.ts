/**
 * Staging Store Interface
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * What the transform needs from the object store the raw snapshots land in,
 * and nothing more. S3StagingStore fulfils it against S3/MinIO; tests use a
 * jest mock. Implementations throw StoreError on any listing or fetch failure.
 */
import type { StagedObject } from '@domain/entities/RawBatch';

export interface IStagingStore {
  /** Every object under the prefix (all pages). */
  list(prefix: string): Promise<StagedObject[]>;

  /** The full bytes of one object. */
  fetch(name: string): Promise<Buffer>;
}
