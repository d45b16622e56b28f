/**
 * Transform Service — The Run Orchestrator
 * Layer: Application
 * Pattern: Facade Pattern
 *
 * Calling `run()` hides the whole transform stage behind one method:
 *
 *   fetching → detecting → parsing → filtering → validating → normalizing → loading → done
 *
 * Each stage fully consumes the previous stage's output before the next one
 * starts; only fetching and loading do I/O. The first error moves the run to
 * its absorbing failed state: it is rethrown as a TransformRunError naming
 * the stage and carrying the typed reason. Nothing is retried here — that is
 * the scheduler's job — and because loading is the last stage, a failure
 * anywhere upstream means the warehouse was never touched.
 *
 * `startedAt` is captured once and becomes every row's ingested_at, so a
 * batch is internally consistent and tests can pin it.
 *
 * Constraint: two runs must not load the same table concurrently; the copy
 * assumes it is the only writer. Nothing here enforces that.
 */
import { RecordParserFactory } from '@application/factories/RecordParserFactory';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { RawBatch } from '@domain/entities/RawBatch';
import type { IStagingStore } from '@domain/interfaces/IStagingStore';
import { BulkLoader } from '@etl/bulkLoader';
import { detectFormat } from '@etl/formatSniffer';
import { selectLatestObject } from '@etl/latestObject';
import { filterBothSexes, toCanonical } from '@etl/normalizer';
import { validate } from '@etl/qualityGate';
import { TransformRunError } from '@shared/errors/AppError';
import type { TransformResult, TransformSettings, TransformStage } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class TransformService {
  constructor(
    @inject(TOKENS.StagingStore) private store: IStagingStore,
    @inject(TOKENS.RecordParserFactory) private parserFactory: RecordParserFactory,
    @inject(TOKENS.BulkLoader) private loader: BulkLoader,
    @inject(TOKENS.TransformSettings) private settings: TransformSettings,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async run(startedAt: Date = new Date()): Promise<TransformResult> {
    const { datasetPrefix, maxRows } = this.settings;
    const stageDurationsMs: TransformResult['stageDurationsMs'] = {};
    let stage: TransformStage = 'fetching';
    let stageStart = Date.now();

    const enter = (next: TransformStage): void => {
      const now = Date.now();
      stageDurationsMs[stage] = now - stageStart;
      stage = next;
      stageStart = now;
    };

    this.log.info(
      { datasetPrefix, maxRows, ingestedAt: startedAt.toISOString() },
      'Starting transformation run',
    );

    try {
      const objects = await this.store.list(datasetPrefix);
      const latest = selectLatestObject(objects, datasetPrefix);
      const bytes = await this.store.fetch(latest.name);
      this.log.info(
        { objects: objects.length, objectName: latest.name, bytes: bytes.length },
        'Fetched latest raw object',
      );

      enter('detecting');
      const batch: RawBatch = { objectName: latest.name, bytes, format: detectFormat(bytes) };
      this.log.info({ format: batch.format }, 'Detected source format');

      enter('parsing');
      const parsed = this.parserFactory.create(batch.format).parse(batch.bytes);
      this.log.info({ rows: parsed.records.length }, 'Parsed raw batch');

      enter('filtering');
      const filtered = filterBothSexes(parsed.records, maxRows);
      this.log.info({ rows: filtered.length, maxRows }, 'Filtered to both sexes');

      enter('validating');
      validate(filtered);
      this.log.info({ rows: filtered.length }, 'Data quality checks passed');

      enter('normalizing');
      const canonical = toCanonical(filtered, startedAt);

      enter('loading');
      const rowsWritten = await this.loader.load(canonical);

      enter('done');
      const result: TransformResult = {
        objectName: batch.objectName,
        format: batch.format,
        parsedRows: parsed.records.length,
        filteredRows: filtered.length,
        rowsWritten,
        ingestedAt: startedAt,
        durationMs: Object.values(stageDurationsMs).reduce((sum, ms) => sum + ms, 0),
        stageDurationsMs,
      };
      this.log.info(result, 'Transformation completed successfully');
      return result;
    } catch (err) {
      const failure = new TransformRunError(stage, err);
      this.log.error(
        { stage, code: failure.reason.code, details: failure.reason.details },
        failure.message,
      );
      throw failure;
    }
  }
}
