/**
 * Transform CLI Script — Run the Transform Stage Once
 * Layer: Entry Point (CLI)
 *
 * I’m what the scheduler invokes: `npm run transform`, no arguments. All
 * settings come from the environment (see core/config.ts). I resolve the
 * TransformService from the container, run it once, log the summary and
 * exit 0; on failure I log the failed stage with its structured details and
 * exit 1. Retrying is the scheduler’s business.
 *
 * On SIGINT/SIGTERM I exit (130/143) without committing: the COPY transaction
 * is still open, and the server rolls it back when the connection drops.
 */
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { TransformService } from '@application/services/TransformService';
import { destroyDbConnections } from '@infrastructure/database/connection';

import { HANDLED_SIGNALS, runToCompletion, SIGNAL_EXIT_CODES } from './runLifecycle';

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

async function main(): Promise<void> {
  const service = container.resolve<TransformService>(TOKENS.TransformService);
  const result = await service.run();
  logger.info(
    {
      objectName: result.objectName,
      rowsWritten: result.rowsWritten,
      duration: formatDuration(result.durationMs),
    },
    'Transform run finished',
  );
}

for (const signal of HANDLED_SIGNALS) {
  process.once(signal, () => {
    logger.warn({ signal }, 'Interrupted before commit; exiting without loading');
    process.exit(SIGNAL_EXIT_CODES[signal]);
  });
}

runToCompletion(main, destroyDbConnections, logger).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ err }, 'Transform teardown crashed');
    process.exitCode = 1;
  },
);
