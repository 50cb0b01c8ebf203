/**
 * Scheduled jobs run by node-cron in the scheduler role.
 */

import type { RefreshScheduler } from '@keyward/api';

import { logger } from './logger.js';
import { incCronRun } from './metrics.js';

export async function runSweepJob(scheduler: RefreshScheduler): Promise<void> {
  logger.info('[cron] Running metadata sweep');
  try {
    const summary = await scheduler.sweep();
    incCronRun('sweep', summary.failed > 0 ? 'error' : 'success');
    logger.info(
      `[cron] Sweep complete: checked=${summary.checked} refreshed=${summary.refreshed} ` +
        `skipped_fresh=${summary.skippedFresh} skipped_invalid=${summary.skippedInvalid} failed=${summary.failed}`,
    );
  } catch (err) {
    incCronRun('sweep', 'error');
    logger.error('[cron] Sweep failed:', err);
  }
}

