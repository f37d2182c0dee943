/**
 * Long-running worker: loads settings from the environment, starts the
 * scheduler and shuts down cleanly on SIGTERM/SIGINT.
 */

import 'dotenv/config';

import { createStructuredLogger } from './utils/logger';
import { createPipeline } from './index';
import { loadSettings } from './pipeline/settings';
import { errorMessage } from './pipeline/types';

const log = createStructuredLogger('[Worker]');

async function main(): Promise<void> {
  const settings = loadSettings();
  const pipeline = await createPipeline(settings);
  pipeline.scheduler.start(settings.scheduler.intervalMs);

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    log.structured('info', { event: 'shutdown', signal });
    pipeline
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.structured('error', { event: 'shutdown_failed', message: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  log.structured('error', { event: 'startup_failed', message: errorMessage(error) });
  process.exit(1);
});
