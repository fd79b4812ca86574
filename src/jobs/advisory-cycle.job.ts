/**
 * Advisory Cycle Job
 *
 * Runs one cycle on ADVISOR_CRON and sends the report to Telegram.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { errorMessage } from '../common/errors.js';
import type { EngineConfig } from '../config/engine.config.js';
import { runAdvisoryCycle, type AdvisoryCycleDeps } from '../modules/advisor/index.js';
import { sendAdvisoryReport, type NotifyLogger } from '../modules/notify/index.js';

let task: ScheduledTask | null = null;
let running = false;

/** One cycle plus delivery; never throws. Overlapping ticks are skipped. */
export async function runScheduledCycle(
  deps: AdvisoryCycleDeps,
  engineConfig: EngineConfig,
  logger: NotifyLogger
): Promise<void> {
  if (running) {
    console.log('[AdvisorJob] Previous cycle still running, skipping tick');
    return;
  }
  running = true;
  try {
    const { report } = await runAdvisoryCycle(deps, engineConfig, new Date());
    const sent = await sendAdvisoryReport(report, logger);
    if (sent && !sent.ok) console.error(`[AdvisorJob] Telegram delivery failed: ${sent.error}`);
  } catch (err) {
    console.error('[AdvisorJob] Cycle failed:', errorMessage(err));
  } finally {
    running = false;
  }
}

export function startAdvisoryCycleJob(
  expression: string,
  deps: AdvisoryCycleDeps,
  engineConfig: EngineConfig,
  logger: NotifyLogger
): void {
  if (task) return;
  if (!cron.validate(expression)) {
    console.error(`[AdvisorJob] Invalid cron expression "${expression}", job not started`);
    return;
  }

  task = cron.schedule(expression, async () => {
    await runScheduledCycle(deps, engineConfig, logger);
  });
  console.log(`[AdvisorJob] Scheduled: ${expression}`);
}

export function stopAdvisoryCycleJob(): void {
  if (!task) return;
  task.stop();
  task = null;
  console.log('[AdvisorJob] Stopped');
}
