import type Database from "better-sqlite3";
import type { Domain } from "./contracts";
import { loadConfig, loadEnvFile, type AppConfig } from "./config";
import { formatDraft, formatDraftLine, formatIngestSummary } from "./cli/format";
import { parseArgs, USAGE, UsageError, type ParsedArgs } from "./cli/parseArgs";
import { ensureSchema, getDraftById, listDrafts, openDatabase } from "./db";
import { createHttpArticleFetcher } from "./ingest/article";
import { runIngestion } from "./ingest/coordinator";
import { createRssFeedFetcher } from "./ingest/feeds";
import { loadSources } from "./ingest/sources";
import { DraftNotFoundError } from "./lib/errors";
import { createVariants, editDraft, generatePrimaryDraft, transitionDraft } from "./services/drafts";
import { adaptPendingNews, pruneNews, recategorizeNews } from "./services/maintenance";
import { renderDraftSlides } from "./social/slideRenderer";

// --- Commands ---

async function runIngest(
  db: Database.Database,
  config: AppConfig,
  args: Extract<ParsedArgs, { command: "ingest" }>
): Promise<void> {
  const http = { timeoutMs: config.fetchTimeoutMs };
  const summary = await runIngestion(
    db,
    { feeds: createRssFeedFetcher(http), articles: createHttpArticleFetcher(http) },
    {
      sources: loadSources(config.sourcesPath),
      maxItemsPerSource: args.limit ?? config.maxItemsPerSource,
      domain: args.domain,
    }
  );
  console.log(formatIngestSummary(summary));
  if (args.adapt) {
    runAdapt(db, args.domain);
  }
}

function runAdapt(db: Database.Database, domain: Domain | undefined): void {
  const result = adaptPendingNews(db, domain);
  for (const { id, summary } of result.adapted) {
    console.log(`  #${id}`);
    for (const line of summary.split("\n")) console.log(`    ${line}`);
  }
}

async function runCommand(
  db: Database.Database,
  config: AppConfig,
  args: Exclude<ParsedArgs, { command: "help" }>
): Promise<void> {
  switch (args.command) {
    case "ingest":
      await runIngest(db, config, args);
      return;

    case "list": {
      const drafts = listDrafts(db, { domain: args.domain, status: args.status });
      if (drafts.length === 0) {
        console.log("No drafts.");
      }
      for (const draft of drafts) console.log(formatDraftLine(draft));
      return;
    }

    case "generate": {
      const { draft, regenerated } = generatePrimaryDraft(db, args.newsId, {
        tone: args.tone ?? config.defaultTone,
      });
      console.log(`${regenerated ? "Regenerated" : "Created"} draft #${draft.id}`);
      console.log(formatDraft(draft));
      return;
    }

    case "variants": {
      const drafts = createVariants(db, args.newsId, args.count, {
        tone: args.tone ?? config.defaultTone,
      });
      console.log(`Created ${drafts.length} variant(s):`);
      for (const draft of drafts) console.log(formatDraftLine(draft));
      return;
    }

    case "show": {
      const draft = getDraftById(db, args.draftId);
      if (!draft) throw new DraftNotFoundError(args.draftId);
      console.log(formatDraft(draft));
      return;
    }

    case "status": {
      const draft = transitionDraft(db, args.draftId, args.status);
      console.log(`Draft #${draft.id} is now ${draft.status}`);
      return;
    }

    case "render": {
      const draft = getDraftById(db, args.draftId);
      if (!draft) throw new DraftNotFoundError(args.draftId);
      const manifest = await renderDraftSlides(draft, args.outDir);
      console.log(`Done. Rendered ${manifest.slides.length} slide(s) to ${args.outDir}`);
      return;
    }

    case "edit": {
      const draft = editDraft(db, args.draftId, {
        hook: args.hook,
        caption: args.caption,
        cta: args.cta,
        sourceLine: args.sourceLine,
        disclaimer: args.disclaimer,
        tone: args.tone,
        language: args.language,
        hashtags: args.hashtags,
        editorNotes: args.editorNotes,
        slideBodies: args.slideBodies,
      });
      console.log(`Updated draft #${draft.id}`);
      console.log(formatDraft(draft));
      return;
    }

    case "adapt":
      runAdapt(db, args.domain);
      return;

    case "recategorize": {
      const result = recategorizeNews(db, args.domain);
      for (const change of result.changed) {
        console.log(`  #${change.id}: ${change.from ?? "(none)"} -> ${change.to}`);
      }
      return;
    }

    case "prune": {
      const result = pruneNews(db, { domain: args.domain, dryRun: args.dryRun });
      for (const row of result.removed) {
        console.log(`  #${row.id} ${row.title}`);
      }
      return;
    }
  }
}

// --- Main ---

async function main(): Promise<void> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      process.exit(1);
    }
    throw err;
  }

  if (parsed.command === "help") {
    console.log(USAGE);
    return;
  }

  loadEnvFile();
  const config = loadConfig();
  const db = openDatabase(config.dbPath);
  try {
    ensureSchema(db);
    await runCommand(db, config, parsed);
  } finally {
    db.close();
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
