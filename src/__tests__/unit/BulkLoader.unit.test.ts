/**
 * Unit Tests — BulkLoader
 *
 * The warehouse repository is mocked; its copyCsv() drains the CSV stream
 * it is handed so I can assert the exact bytes COPY would receive. The
 * schema check must stop the load before any bytes are produced.
 */
import type { CopyRequest } from '@domain/interfaces/IWarehouseRepository';
import { assertColumnsMatch, BulkLoader, serializeForCopy } from '@etl/bulkLoader';
import { CANONICAL_COLUMNS } from '@shared/constants';
import {
  EmptyResultError,
  LoadError,
  SchemaMismatchError,
} from '@shared/errors/AppError';

import { canonicalRecord, RUN_TS_CELL } from '../helpers/fixtures';
import {
  createMockWarehouseRepository,
  type MockWarehouseRepository,
  readStream,
  silentLogger,
} from '../helpers/mocks';

const TABLE_COLUMNS = [...CANONICAL_COLUMNS];

describe('BulkLoader', () => {
  let repo: MockWarehouseRepository;
  let loader: BulkLoader;
  let copied: string[];

  beforeEach(() => {
    repo = createMockWarehouseRepository();
    loader = new BulkLoader(repo, { schema: 'public', table: 'health_life_expectancy' }, silentLogger);
    copied = [];

    repo.getTableColumns.mockResolvedValue(TABLE_COLUMNS);
    repo.copyCsv.mockImplementation(async (request: CopyRequest) => {
      copied.push(await readStream(request.source));
      return request.expectedRows;
    });
  });

  describe('load()', () => {
    it('should copy one CSV line per record in canonical column order', async () => {
      const rows = await loader.load([canonicalRecord()]);

      expect(rows).toBe(1);
      expect(copied).toEqual([`RWA,RWA,2020,both,69.3,${RUN_TS_CELL}\n`]);
    });

    it('should target the configured table with the canonical columns', async () => {
      await loader.load([canonicalRecord(), canonicalRecord({ countryCode: 'KEN' })]);

      expect(repo.getTableColumns).toHaveBeenCalledWith({
        schema: 'public',
        table: 'health_life_expectancy',
      });
      expect(repo.copyCsv).toHaveBeenCalledWith(
        expect.objectContaining({
          target: { schema: 'public', table: 'health_life_expectancy' },
          columns: CANONICAL_COLUMNS,
          expectedRows: 2,
        }),
      );
    });

    it('should refuse an empty batch without touching the warehouse', async () => {
      await expect(loader.load([])).rejects.toThrow(EmptyResultError);
      expect(repo.getTableColumns).not.toHaveBeenCalled();
    });

    it('should fail with SchemaMismatchError when the table columns are reordered', async () => {
      repo.getTableColumns.mockResolvedValue([
        'country_code',
        'country_name',
        'year',
        'sex',
        'life_expectancy',
        'ingested_at',
      ]);

      await expect(loader.load([canonicalRecord()])).rejects.toThrow(SchemaMismatchError);
      expect(repo.copyCsv).not.toHaveBeenCalled();
    });

    it('should fail with SchemaMismatchError when the table does not exist', async () => {
      repo.getTableColumns.mockResolvedValue([]);

      await expect(loader.load([canonicalRecord()])).rejects.toMatchObject({
        code: 'SCHEMA_MISMATCH',
        details: { expected: TABLE_COLUMNS, actual: [] },
      });
      expect(repo.copyCsv).not.toHaveBeenCalled();
    });

    it('should wrap a driver failure in LoadError', async () => {
      const cause = new Error('connection terminated unexpectedly');
      repo.copyCsv.mockRejectedValue(cause);

      const error: unknown = await loader.load([canonicalRecord()]).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LoadError);
      if (error instanceof LoadError) {
        expect(error.message).toBe(
          'Bulk copy into public.health_life_expectancy failed: connection terminated unexpectedly',
        );
        expect(error.details).toEqual({ table: 'health_life_expectancy', rows: 1 });
        expect(error.cause).toBe(cause);
      }
    });

    it('should pass a LoadError from the repository through unchanged', async () => {
      const original = new LoadError('COPY wrote 0 rows, expected 1');
      repo.copyCsv.mockRejectedValue(original);

      await expect(loader.load([canonicalRecord()])).rejects.toBe(original);
    });
  });
});

describe('assertColumnsMatch', () => {
  it('should accept the canonical sequence', () => {
    expect(() => assertColumnsMatch(TABLE_COLUMNS)).not.toThrow();
  });

  it('should reject an extra trailing column', () => {
    expect(() => assertColumnsMatch([...TABLE_COLUMNS, 'source_file'])).toThrow(
      SchemaMismatchError,
    );
  });
});

describe('serializeForCopy', () => {
  it('should quote cells that contain the delimiter', async () => {
    const body = await readStream(
      serializeForCopy([canonicalRecord({ countryName: 'Korea, Republic of', countryCode: 'KOR' })]),
    );

    expect(body).toBe(`"Korea, Republic of",KOR,2020,both,69.3,${RUN_TS_CELL}\n`);
  });

  it('should write values without rounding', async () => {
    const body = await readStream(serializeForCopy([canonicalRecord({ lifeExpectancy: 72.123456 })]));

    expect(body).toBe(`RWA,RWA,2020,both,72.123456,${RUN_TS_CELL}\n`);
  });
});
