import dotenv from 'dotenv';
import { loadConfig } from '../config';
import { createEngine } from '../engine';
import { describeError } from '../errors';
import { log } from '../utils/logger';

dotenv.config();

// Cron entry point: one full pass over active providers. Individual provider
// failures are recorded in the log and summary; only a fatal error exits 1.
async function runWorker() {
  const config = loadConfig();
  const engine = createEngine(config);
  const controller = new AbortController();

  const requestStop = (signal: NodeJS.Signals) => {
    log({ stage: 'worker_stop_requested', level: 'warn', signal });
    controller.abort();
  };
  process.once('SIGINT', requestStop);
  process.once('SIGTERM', requestStop);

  log({ stage: 'worker_start', db: config.databasePath });
  try {
    const summary = await engine.runner.runScheduled({ signal: controller.signal });
    log({ stage: 'worker_complete', ...summary });
  } finally {
    await engine.limiter.stop({ dropWaitingJobs: false });
    engine.store.close();
  }
}

runWorker()
  .then(() => process.exit(0))
  .catch((err) => {
    log({ stage: 'worker_fatal', level: 'error', error: describeError(err) });
    process.exit(1);
  });
