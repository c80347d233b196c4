import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import { ConfigurationError } from "./errors";
import type { PublishCycleResult } from "./pipeline/publisher";

export type PublishScheduler = {
  readonly stop: () => void;
};

export type PublishSchedulerOptions = {
  readonly cronExpression: string;
  readonly timezone?: string;
};

/**
 * Creates and starts a scheduler that runs a publish cycle on every cron tick.
 *
 * A tick that fires while the previous cycle is still running is skipped.
 * Cycle failures (store or network) are logged; the next tick is the retry.
 *
 * @param options - Cron expression and optional timezone
 * @param runCycle - Runs one publish cycle (dependency injection for testability)
 * @param logger - Logger instance for recording cycle events
 * @returns A PublishScheduler with a stop() method to halt the scheduled cycles
 */
export function createPublishScheduler(
  options: PublishSchedulerOptions,
  runCycle: () => Promise<PublishCycleResult>,
  logger: Logger,
): PublishScheduler {
  if (!cron.validate(options.cronExpression)) {
    throw new ConfigurationError(`invalid cron expression: ${options.cronExpression}`);
  }

  let inFlight = false;

  const task: ScheduledTask = cron.schedule(
    options.cronExpression,
    async () => {
      if (inFlight) {
        logger.warn("previous publish cycle still running, skipping tick");
        return;
      }
      inFlight = true;

      try {
        const result = await runCycle();
        logger.info({ status: result.status }, "publish cycle complete");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ error: message }, "publish cycle failed");
      } finally {
        inFlight = false;
      }
    },
    options.timezone ? { timezone: options.timezone } : undefined,
  );

  return {
    stop: () => {
      task.stop();
    },
  };
}
