/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency in the tsyringe container gets a Symbol badge.
 * When the TransformService says "I need the StagingStore", it holds up
 * TOKENS.StagingStore and the container hands back whatever was registered
 * (S3StagingStore in production, a jest mock in tests).
 *
 * Grouped by architectural layer so you can scan what exists at each level.
 */
export const TOKENS = {
  // Infrastructure — clients and pools
  Knex: Symbol.for('Knex'),
  PgPool: Symbol.for('PgPool'),
  S3Client: Symbol.for('S3Client'),
  Logger: Symbol.for('Logger'),

  // Settings — slices of config handed to the classes that need them
  StagingSettings: Symbol.for('StagingSettings'),
  WarehouseSettings: Symbol.for('WarehouseSettings'),
  TransformSettings: Symbol.for('TransformSettings'),

  // Repositories / stores — data-access contracts
  StagingStore: Symbol.for('StagingStore'),
  WarehouseRepository: Symbol.for('WarehouseRepository'),

  // Pipeline
  RecordParserFactory: Symbol.for('RecordParserFactory'),
  BulkLoader: Symbol.for('BulkLoader'),
  TransformService: Symbol.for('TransformService'),
} as const;
