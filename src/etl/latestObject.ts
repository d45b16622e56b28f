import type { StagedObject } from '@domain/entities/RawBatch';
import { StoreError } from '@shared/errors/AppError';

/**
 * Picks the snapshot to transform: greatest lastModified, ties broken by the
 * lexicographically greatest name (plain code-unit comparison). Ingestion keys
 * are `<prefix>/ingestion_date=YYYY-MM-DD/...`, so the later date wins a tie.
 * Listing order from the store is never relied on.
 */
export function selectLatestObject(objects: readonly StagedObject[], prefix = ''): StagedObject {
  let latest: StagedObject | undefined;
  for (const candidate of objects) {
    if (!latest || compareObjects(candidate, latest) > 0) latest = candidate;
  }
  if (!latest) {
    throw new StoreError(`No objects found under prefix '${prefix}'`, { prefix });
  }
  return latest;
}

function compareObjects(a: StagedObject, b: StagedObject): number {
  const byTime = a.lastModified.getTime() - b.lastModified.getTime();
  if (byTime !== 0) return byTime;
  if (a.name === b.name) return 0;
  return a.name > b.name ? 1 : -1;
}
