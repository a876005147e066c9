import cron from "node-cron";
import { logger } from "./logger";

export interface ScheduleOptions {
  cronPattern: string | null;
  intervalMinutes: number;
  timezone: string;
}

export interface ScheduleHandle {
  readonly description: string;
  stop(): void;
}

/**
 * Calls `tick` on the cron pattern when one is given, otherwise every
 * `intervalMinutes` from now. The first tick is the caller's job.
 */
export function startSchedule(options: ScheduleOptions, tick: () => void): ScheduleHandle {
  if (options.cronPattern !== null) {
    const task = cron.schedule(options.cronPattern, tick, { timezone: options.timezone });
    const description = `cron "${options.cronPattern}" (${options.timezone})`;
    logger.info(`Scheduler ready with ${description}`);
    return {
      description,
      stop: () => task.stop(),
    };
  }

  const timer = setInterval(tick, options.intervalMinutes * 60_000);
  const description = `every ${options.intervalMinutes} minutes`;
  logger.info(`Scheduler ready, running ${description}`);
  return {
    description,
    stop: () => clearInterval(timer),
  };
}
