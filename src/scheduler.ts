import { DedupeStore } from "./services/dedupe.service";
import { parseEmail, ParseOptions, toEmailContext } from "./services/parser.service";
import { ApplicationSink, JobApplication, MailSource, RawEmail, RunStats } from "./types";
import { logger } from "./utils/logger";

export interface PipelineDeps {
  mailSource: MailSource;
  sink: ApplicationSink;
  store: Pick<DedupeStore, "isProcessed" | "isDuplicate" | "markProcessed">;
  llm: ParseOptions["llm"];
  confidenceThreshold: number;
  deleteAfterSync: boolean;
  now?: () => Date;
}

export const emptyStats = (): RunStats => ({
  fetched: 0,
  skipped: 0,
  parsed: 0,
  filtered: 0,
  duplicates: 0,
  lowConfidence: 0,
  added: 0,
  deleted: 0,
  errors: 0,
});

/**
 * Decide what happens to one email. Returns the application when it should
 * be written to the sink.
 */
async function handleEmail(
  email: RawEmail,
  deps: PipelineDeps,
  stats: RunStats
): Promise<JobApplication | null> {
  const { store } = deps;

  if (store.isProcessed(email.id)) {
    logger.debug(`Skipping already processed email: ${email.id}`);
    stats.skipped++;
    return null;
  }

  const result = await parseEmail(toEmailContext(email), {
    llm: deps.llm,
    now: deps.now,
  });

  if (result.status === "filtered") {
    stats.filtered++;
    return null;
  }
  if (result.status === "unresolved") {
    logger.debug(`Could not parse email: ${email.id}`);
    stats.errors++;
    return null;
  }

  const app = result.application;
  stats.parsed++;

  if (app.confidence < deps.confidenceThreshold) {
    logger.info(
      `Skipping low confidence (${app.confidence}) application: ${app.company} - ${app.position}`
    );
    stats.lowConfidence++;
    store.markProcessed(email.id, app);
    return null;
  }

  if (store.isDuplicate(app.company, app.position, app.dateApplied)) {
    logger.info(`Skipping duplicate application: ${app.company} - ${app.position}`);
    stats.duplicates++;
    store.markProcessed(email.id, app);
    return null;
  }

  store.markProcessed(email.id, app);
  return app;
}

export async function processNewEmails(deps: PipelineDeps): Promise<RunStats> {
  const stats = emptyStats();
  logger.info("Starting job application tracker pipeline");

  let emails: RawEmail[];
  try {
    emails = await deps.mailSource.fetchRecentEmails();
  } catch (error) {
    logger.error("Failed to fetch emails from Gmail", error);
    throw error;
  }
  stats.fetched = emails.length;

  const toAdd: JobApplication[] = [];
  for (const email of emails) {
    try {
      const app = await handleEmail(email, deps, stats);
      if (app) toAdd.push(app);
    } catch (error) {
      logger.error(`Error processing email ${email.id}`, error);
      stats.errors++;
    }
  }

  if (toAdd.length > 0) {
    try {
      stats.added = await deps.sink.appendApplications(toAdd);
      logger.info(`Added ${stats.added} applications`);
    } catch (error) {
      logger.error("Failed to write applications", error);
      throw error;
    }

    if (deps.deleteAfterSync) {
      for (const app of toAdd) {
        try {
          await deps.mailSource.trashEmail(app.sourceMessageId);
          stats.deleted++;
        } catch (error) {
          logger.error(`Failed to delete email ${app.sourceMessageId}`, error);
        }
      }
    }
  }

  logger.info(
    `Pipeline complete: ${stats.fetched} fetched, ${stats.skipped} skipped, ${stats.added} added, ${stats.deleted} deleted, ${stats.errors} errors`
  );
  return stats;
}
