import type Database from "better-sqlite3";
import type { IngestSummary } from "../contracts";
import { createHttpArticleFetcher } from "../ingest/article";
import { runIngestion, type IngestDeps } from "../ingest/coordinator";
import { createRssFeedFetcher } from "../ingest/feeds";
import { loadSources } from "../ingest/sources";
import type { BotConfig } from "./config";

export interface ScheduledIngestResult {
  success: boolean;
  summary?: IngestSummary;
  error?: string;
}

/**
 * Runs one ingestion pass. Never throws: failures come back as
 * `{ success: false, error }` so the bot keeps running.
 */
export async function runScheduledIngest(
  db: Database.Database,
  config: BotConfig,
  deps?: IngestDeps
): Promise<ScheduledIngestResult> {
  try {
    const http = { timeoutMs: config.fetchTimeoutMs };
    const summary = await runIngestion(
      db,
      deps ?? { feeds: createRssFeedFetcher(http), articles: createHttpArticleFetcher(http) },
      { sources: loadSources(config.sourcesPath), maxItemsPerSource: config.maxItemsPerSource }
    );
    return { success: true, summary };
  } catch (err) {
    return { success: false, error: (err as Error).message };
  }
}

/**
 * Periodically runs ingestion. A tick that starts while the previous run is
 * still going is skipped. Returns the interval handle so it can be cleared
 * on shutdown.
 */
export function startIngestScheduler(
  db: Database.Database,
  config: BotConfig,
  run: () => Promise<ScheduledIngestResult> = () => runScheduledIngest(db, config)
): ReturnType<typeof setInterval> {
  let running = false;

  return setInterval(() => {
    if (running) {
      console.log("[scheduler] Previous ingestion still running, skipping tick.");
      return;
    }
    running = true;
    void run()
      .then((result) => {
        if (result.success) {
          const total = Object.values(result.summary ?? {}).reduce((a, b) => a + b, 0);
          console.log(`[scheduler] Ingestion done: ${total} new item(s).`);
        } else {
          console.error(`[scheduler] Ingestion failed: ${result.error}`);
        }
      })
      .catch((err: unknown) => {
        console.error(`[scheduler] Ingestion crashed: ${(err as Error).message}`);
      })
      .finally(() => {
        running = false;
      });
  }, config.ingestIntervalMinutes * 60 * 1000);
}
