import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import { ConfigError, errorMessage } from "./errors";

export type RunScheduler = {
  readonly stop: () => void;
  // Starts a run now unless one is already in progress.
  readonly trigger: () => Promise<void>;
  // Resolves once no run is in progress.
  readonly idle: () => Promise<void>;
};

/**
 * Creates and starts a scheduler that triggers a run on the given cron
 * schedule. A tick that arrives while the previous run is still going is
 * skipped, so runs never overlap. Once stopped, no new run is started.
 *
 * @param schedule - cron expression, e.g. "0 * * * *"
 * @param run - one complete pass over all feeds
 * @param logger - Logger instance for recording run events
 * @throws ConfigError when `schedule` is not a valid cron expression
 */
export function createRunScheduler(
  schedule: string,
  run: () => Promise<unknown>,
  logger: Logger,
): RunScheduler {
  if (!cron.validate(schedule)) {
    throw new ConfigError(`invalid cron schedule "${schedule}"`, schedule);
  }

  let current: Promise<void> | null = null;
  let stopped = false;

  const execute = async (): Promise<void> => {
    if (stopped) return;
    if (current) {
      logger.warn({ schedule }, "previous run still in progress, skipping tick");
      return;
    }

    current = (async () => {
      logger.info("scheduled run starting");
      try {
        await run();
        logger.info("scheduled run complete");
      } catch (err) {
        logger.error({ error: errorMessage(err) }, "scheduled run failed");
      }
    })().finally(() => {
      current = null;
    });
    await current;
  };

  const task: ScheduledTask = cron.schedule(schedule, execute);

  return {
    stop: () => {
      stopped = true;
      task.stop();
    },
    trigger: execute,
    idle: () => current ?? Promise.resolve(),
  };
}
