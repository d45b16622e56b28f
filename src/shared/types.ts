/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * I keep the run-level shapes here so no single layer owns them: the stage
 * names of the orchestration state machine, the settings slices the container
 * hands out, and TransformResult, which is what a successful run returns to
 * the entry script.
 */
import type { SourceFormat } from '@domain/entities/RawBatch';

/** States of one transform run, in the order they are entered. */
export const TRANSFORM_STAGES = [
  'fetching',
  'detecting',
  'parsing',
  'filtering',
  'validating',
  'normalizing',
  'loading',
  'done',
] as const;

export type TransformStage = (typeof TRANSFORM_STAGES)[number];

export interface StagingSettings {
  bucket: string;
}

export interface WarehouseSettings {
  schema: string;
  table: string;
}

export interface TransformSettings {
  datasetPrefix: string;
  /** Dev knob: keep only the first N rows after filtering. */
  maxRows?: number;
}

export interface TransformResult {
  objectName: string;
  format: SourceFormat;
  parsedRows: number;
  filteredRows: number;
  rowsWritten: number;
  ingestedAt: Date;
  durationMs: number;
  stageDurationsMs: Partial<Record<TransformStage, number>>;
}
