/**
 * Unit Tests — Run Lifecycle
 *
 * Exit codes of the transform script. The logger is a jest-spied silent
 * pino instance so I can see which line, if any, a failure produced.
 */
import { LoadError, TransformRunError } from '@shared/errors/AppError';

import { HANDLED_SIGNALS, runToCompletion, SIGNAL_EXIT_CODES } from '../../scripts/runLifecycle';
import { silentLogger } from '../helpers/mocks';

describe('SIGNAL_EXIT_CODES', () => {
  it('should exit 128 + signal number for each handled signal', () => {
    expect(SIGNAL_EXIT_CODES.SIGINT).toBe(130);
    expect(SIGNAL_EXIT_CODES.SIGTERM).toBe(143);
    expect(HANDLED_SIGNALS).toEqual(['SIGINT', 'SIGTERM']);
  });
});

describe('runToCompletion', () => {
  let errorSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(silentLogger, 'error');
    warnSpy = jest.spyOn(silentLogger, 'warn');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return 0 and tear down after a successful run', async () => {
    const teardown = jest.fn().mockResolvedValue(undefined);

    const code = await runToCompletion(async () => undefined, teardown, silentLogger);

    expect(code).toBe(0);
    expect(teardown).toHaveBeenCalledTimes(1);
  });

  it('should keep exit code 0 when teardown fails after a successful run', async () => {
    const teardown = jest.fn().mockRejectedValue(new Error('pool already ended'));

    const code = await runToCompletion(async () => undefined, teardown, silentLogger);

    expect(code).toBe(0);
    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Failed to close database connections',
    );
  });

  it('should return 1 for a failed run without logging it again', async () => {
    const teardown = jest.fn().mockResolvedValue(undefined);
    const failure = new TransformRunError('loading', new LoadError('copy failed'));

    const code = await runToCompletion(() => Promise.reject(failure), teardown, silentLogger);

    expect(code).toBe(1);
    expect(errorSpy).not.toHaveBeenCalled();
    expect(teardown).toHaveBeenCalledTimes(1);
  });

  it('should return 1 and log an unexpected crash', async () => {
    const teardown = jest.fn().mockResolvedValue(undefined);

    const code = await runToCompletion(
      () => Promise.reject(new Error('container misconfigured')),
      teardown,
      silentLogger,
    );

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Transform run crashed',
    );
  });

  it('should still return 1 when both the run and teardown fail', async () => {
    const failure = new TransformRunError('fetching', new LoadError('x'));
    const teardown = jest.fn().mockRejectedValue(new Error('pool already ended'));

    const code = await runToCompletion(() => Promise.reject(failure), teardown, silentLogger);

    expect(code).toBe(1);
  });
});
