/**
 * S3 Staging Store — Raw Snapshot Access
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IStagingStore)
 *
 * I list the dataset prefix page by page (ListObjectsV2 caps a page at 1000
 * keys) and download one object's bytes. Folder-marker keys ending in "/" are
 * skipped. Every SDK failure comes out as a StoreError carrying the bucket and
 * key, so the run report names the object rather than an SDK stack.
 */
import {
  GetObjectCommand,
  ListObjectsV2Command,
  type ListObjectsV2CommandOutput,
  S3Client,
} from '@aws-sdk/client-s3';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { StagedObject } from '@domain/entities/RawBatch';
import type { IStagingStore } from '@domain/interfaces/IStagingStore';
import { AppError, StoreError } from '@shared/errors/AppError';
import type { StagingSettings } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class S3StagingStore implements IStagingStore {
  constructor(
    @inject(TOKENS.S3Client) private client: S3Client,
    @inject(TOKENS.StagingSettings) private settings: StagingSettings,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async list(prefix: string): Promise<StagedObject[]> {
    const { bucket } = this.settings;
    const objects: StagedObject[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const page: ListObjectsV2CommandOutput = await this.client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken,
          }),
        );
        for (const entry of page.Contents ?? []) {
          if (!entry.Key || entry.Key.endsWith('/')) continue;
          objects.push({ name: entry.Key, lastModified: entry.LastModified ?? new Date(0) });
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (err) {
      throw wrap(err, `Failed to list objects in ${bucket}/${prefix}`, { bucket, prefix });
    }

    this.log.debug({ bucket, prefix, count: objects.length }, 'Listed staging objects');
    return objects;
  }

  async fetch(name: string): Promise<Buffer> {
    const { bucket } = this.settings;
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: name }));
      if (!response.Body) {
        throw new StoreError(`Object ${bucket}/${name} has no body`, { bucket, key: name });
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (err) {
      throw wrap(err, `Failed to fetch ${bucket}/${name}`, { bucket, key: name });
    }
  }
}

function wrap(err: unknown, message: string, details: Record<string, unknown>): AppError {
  if (err instanceof AppError) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new StoreError(`${message}: ${reason}`, details, { cause: err });
}
