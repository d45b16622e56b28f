/**
 * S3 Client Factory
 * Layer: Infrastructure
 *
 * Builds the AWS SDK v3 client for the staging store. Locally that is MinIO,
 * which wants path-style addressing and any region; in the cloud the same
 * settings point at real S3. Without explicit keys the SDK's default
 * credential chain applies.
 */
import { S3Client } from '@aws-sdk/client-s3';
import type { AppConfig } from '@core/config';

export function createS3Client(settings: AppConfig['staging']): S3Client {
  const { endpoint, region, forcePathStyle, accessKeyId, secretAccessKey } = settings;
  return new S3Client({
    endpoint,
    region,
    forcePathStyle,
    credentials:
      accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
  });
}
