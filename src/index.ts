#!/usr/bin/env node
import cron from "node-cron";
import { processNewEmails, PipelineDeps } from "./scheduler";
import { DedupeStore } from "./services/dedupe.service";
import { GmailMailSource } from "./services/gmail.service";
import { createLlmExtractor } from "./services/llm.service";
import { NotionApplicationSink } from "./services/notion.service";
import { SheetsApplicationSink } from "./services/sheets.service";
import { ApplicationSink, RunStats } from "./types";
import { AppConfig, loadConfig } from "./utils/config";
import { LockTimeoutError, withLock } from "./utils/lock";
import { configureLogger, logger } from "./utils/logger";

async function createSink(config: AppConfig): Promise<ApplicationSink> {
  if (config.sink.kind === "sheets") {
    return SheetsApplicationSink.fromConfig(config.gmail, config.sink);
  }

  const notion = new NotionApplicationSink(
    config.sink.token,
    config.sink.databaseId
  );
  if (!(await notion.verifyDatabase())) {
    throw new Error(
      "Notion database verification failed. Please check your database schema."
    );
  }
  return notion;
}

/**
 * One locked pass over the inbox. Returns null when another instance holds
 * the lock.
 */
async function runLocked(
  config: AppConfig,
  deps: PipelineDeps
): Promise<RunStats | null> {
  try {
    return await withLock(config.lock.file, config.lock.timeoutMs, () => {
      logger.info("Acquired lock, starting pipeline");
      return processNewEmails(deps);
    });
  } catch (error) {
    if (error instanceof LockTimeoutError) {
      logger.warn("Could not acquire lock - another instance is running");
      return null;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error("Configuration error", error);
    return 1;
  }
  configureLogger(config.log);

  logger.info("Job Tracker starting up...");

  const sink = await createSink(config);
  const store = new DedupeStore(config.dbPath);
  const deps: PipelineDeps = {
    mailSource: GmailMailSource.fromConfig(config.gmail),
    sink,
    store,
    llm: createLlmExtractor(config.llm),
    confidenceThreshold: config.confidenceThreshold,
    deleteAfterSync: config.gmail.deleteAfterSync,
  };

  const schedule = config.cron.schedule;
  if (!schedule) {
    try {
      const stats = await runLocked(config, deps);
      return stats && stats.errors > 0 ? 1 : 0;
    } finally {
      store.close();
    }
  }

  if (!cron.validate(schedule)) {
    store.close();
    throw new Error(`Invalid CRON_SCHEDULE: ${schedule}`);
  }

  // Run once immediately
  logger.info("Running initial email scan...");
  await runLocked(config, deps);

  let running = false;
  logger.info(`Scheduling cron: ${schedule}`);
  cron.schedule(schedule, async () => {
    if (running) {
      logger.warn("Previous run still in progress, skipping this tick");
      return;
    }
    running = true;
    logger.info("Cron triggered - checking for new emails...");
    try {
      await runLocked(config, deps);
    } catch (error) {
      logger.error("Cron run failed", error);
    } finally {
      running = false;
    }
  });

  logger.info("Job Tracker is running. Press Ctrl+C to stop.");
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error("Fatal error", error);
    process.exitCode = 1;
  });
