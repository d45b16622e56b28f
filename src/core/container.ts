/**
 * Dependency Injection Container — The Central "Phone Book"
 * Layer: Core
 *
 * The single place where every dependency of a transform run is wired. Each
 * token maps to a concrete implementation, so when TransformService says "I
 * need the StagingStore", the container hands back the S3StagingStore.
 *
 * How tsyringe works:
 *   - `reflect-metadata` must be imported first — it lets the @inject and
 *     @injectable decorators record constructor parameter metadata.
 *   - `useValue` registers a pre-built singleton (logger, pools, settings).
 *   - `useClass` constructs the class on resolve, injecting its own
 *     dependencies.
 *
 * No class ever does `new PostgresWarehouseRepository(...)` by hand outside
 * of tests.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { RecordParserFactory } from '@application/factories/RecordParserFactory';
import { TransformService } from '@application/services/TransformService';
import { BulkLoader } from '@etl/bulkLoader';
import { getDbConnection, getPgPool } from '@infrastructure/database/connection';
import { PostgresWarehouseRepository } from '@infrastructure/repositories/PostgresWarehouseRepository';
import { createS3Client } from '@infrastructure/storage/s3Client';
import { S3StagingStore } from '@infrastructure/storage/S3StagingStore';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.Knex, { useValue: getDbConnection() });
container.register(TOKENS.PgPool, { useValue: getPgPool() });
container.register(TOKENS.S3Client, { useValue: createS3Client(config.staging) });

container.register(TOKENS.StagingSettings, { useValue: { bucket: config.staging.bucket } });
container.register(TOKENS.WarehouseSettings, { useValue: config.warehouse });
container.register(TOKENS.TransformSettings, { useValue: config.transform });

container.register(TOKENS.StagingStore, { useClass: S3StagingStore });
container.register(TOKENS.WarehouseRepository, { useClass: PostgresWarehouseRepository });
container.register(TOKENS.RecordParserFactory, { useClass: RecordParserFactory });
container.register(TOKENS.BulkLoader, { useClass: BulkLoader });
container.register(TOKENS.TransformService, { useClass: TransformService });

export { container };
