/**
 * Run Lifecycle — Exit Codes and Teardown
 * Layer: Entry Point (CLI)
 *
 * The transform script's process plumbing, kept out of the script so it can
 * be tested without a container or a database:
 *
 *   - an interrupted run exits 128 + signal number (SIGINT 130, SIGTERM 143);
 *   - a failed run exits 1, a successful one 0;
 *   - closing connections afterwards never changes that outcome. A run that
 *     committed is not reported as failed because a pool would not close.
 */
import type { Logger } from '@core/logger';
import { TransformRunError } from '@shared/errors/AppError';

export const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
} as const;

export type HandledSignal = keyof typeof SIGNAL_EXIT_CODES;

export const HANDLED_SIGNALS: readonly HandledSignal[] = ['SIGINT', 'SIGTERM'];

/** Runs `task`, then `teardown` whatever happened; resolves to the exit code. */
export async function runToCompletion(
  task: () => Promise<void>,
  teardown: () => Promise<void>,
  log: Logger,
): Promise<number> {
  let exitCode = 0;
  try {
    await task();
  } catch (err) {
    // TransformService has already logged the failed stage
    if (!(err instanceof TransformRunError)) {
      log.error({ err }, 'Transform run crashed');
    }
    exitCode = 1;
  }

  try {
    await teardown();
  } catch (err) {
    log.warn({ err }, 'Failed to close database connections');
  }
  return exitCode;
}
