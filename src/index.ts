#!/usr/bin/env node
import path from "path";
import { AppConfig, loadConfig } from "./config";
import { USAGE, parseCliArgs } from "./cli";
import { RosterClient } from "./rosterClient";
import { RosterParser } from "./rosterParser";
import { WatchMatcher } from "./watchMatcher";
import { SeenStore } from "./seenStore";
import { ErrorEscalationPolicy } from "./escalationPolicy";
import { createNotifier } from "./notifier";
import { WatchCycle } from "./watchCycle";
import { startSchedule } from "./scheduler";
import { errorMessage } from "./errors";
import { logger, setLogLevel } from "./logger";

const VERSION = "0.2.0";

function readOptions(): { debug: boolean; once: boolean } {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    logger.error(`${errorMessage(error)}\n${USAGE}`);
    process.exit(1);
  }
}

function readConfig(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    logger.error(`ERROR: ${errorMessage(error)}`);
    process.exit(1);
  }
}

async function bootstrap(): Promise<void> {
  const options = readOptions();
  if (options.debug) {
    setLogLevel("debug");
  }

  logger.info(`Roster watch v${VERSION} starting...`);
  if (options.debug) {
    logger.info("Debug mode enabled");
  }

  const config = readConfig();
  logger.info(`Watching for names: ${config.watchNames.join(", ")}`);

  const notifier = createNotifier(config.notifier);
  if (notifier.name === "log") {
    logger.warn("WARNING: No notification sink configured. Messages will be written to the log.");
  } else {
    logger.info(`Notification sink: ${notifier.name}`);
  }

  if (config.cronPattern !== null) {
    logger.info(`Schedule: cron "${config.cronPattern}" (overrides POLL_INTERVAL_MINUTES)`);
  } else {
    logger.info(`Poll interval: ${config.pollIntervalMinutes} minutes`);
  }
  logger.info(`Data file: ${config.storagePath}`);

  const client = new RosterClient({
    searchUrl: config.searchUrl,
    userAgent: config.userAgent,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  const store = new SeenStore(config.storagePath);
  await store.load();

  const cycle = new WatchCycle({
    source: client,
    parser: new RosterParser(),
    matcher: new WatchMatcher(config.watchNames),
    store,
    escalation: new ErrorEscalationPolicy(notifier, {
      intervalHours: config.errorReportIntervalHours,
    }),
    notifier,
    ...(options.debug ? { debugDumpDir: path.dirname(config.storagePath) } : {}),
  });

  if (options.once) {
    await cycle.run();
    await client.close();
    return;
  }

  let running = false;
  const runCycle = async (): Promise<void> => {
    if (running) {
      logger.warn("Previous check cycle still running, skipping this tick");
      return;
    }
    running = true;
    try {
      await cycle.run();
    } catch (error) {
      logger.error(`Check cycle failed: ${errorMessage(error)}`, error);
    } finally {
      running = false;
    }
  };

  await runCycle();

  const schedule = startSchedule(
    {
      cronPattern: config.cronPattern,
      intervalMinutes: config.pollIntervalMinutes,
      timezone: config.timezone,
    },
    () => void runCycle()
  );

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}. Shutting down scheduler...`);
    schedule.stop();
    void client
      .close()
      .catch((error: unknown) => logger.error(`Failed to close HTTP agent: ${errorMessage(error)}`))
      .finally(() => process.exit(0));
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap().catch((error: unknown) => {
  logger.error(`Fatal error: ${errorMessage(error)}`, error);
  process.exit(1);
});
