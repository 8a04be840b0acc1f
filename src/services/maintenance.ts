import type Database from "better-sqlite3";
import type { Domain } from "../contracts";
import { deleteNews, listNews, updateNewsCategory, updateNewsSummary, type NewsRow } from "../db";
import { draftSeed } from "../lib/seed";
import { loadClassifier, loadGuardrailConfig } from "../lib/taxonomy";
import { passesGuardrails } from "../pipeline/guardrail";
import { getBrandForDomain } from "../social/registry";
import { buildBrandSummary } from "../social/summary";
import { toDraftSource } from "./drafts";

export interface RecategorizeResult {
  scanned: number;
  changed: Array<{ id: number; from: string | null; to: string }>;
}

/** Re-runs the domain classifier over stored news and updates changed categories. */
export function recategorizeNews(db: Database.Database, domain?: Domain): RecategorizeResult {
  const rows = listNews(db, { domain });
  const changed: RecategorizeResult["changed"] = [];

  db.transaction(() => {
    for (const row of rows) {
      const category = loadClassifier(row.domain).classify(row.title, row.raw_summary);
      if (category !== row.category) {
        updateNewsCategory(db, row.id, category);
        changed.push({ id: row.id, from: row.category, to: category });
      }
    }
  })();

  console.log(`[maintenance] Recategorized ${changed.length} of ${rows.length} items`);
  return { scanned: rows.length, changed };
}

export interface PruneResult {
  scanned: number;
  removed: NewsRow[];
  dryRun: boolean;
}

/** Deletes stored news (and their drafts) that no longer pass the domain guardrail. */
export function pruneNews(
  db: Database.Database,
  options: { domain?: Domain; dryRun?: boolean } = {}
): PruneResult {
  const dryRun = options.dryRun ?? false;
  const rows = listNews(db, { domain: options.domain });
  const removed = rows.filter(
    (row) =>
      !passesGuardrails(row.title, loadGuardrailConfig(row.domain), {
        summary: row.raw_summary,
        url: row.url,
      })
  );

  if (!dryRun) {
    db.transaction(() => {
      for (const row of removed) deleteNews(db, row.id);
    })();
  }

  console.log(
    `[maintenance] ${dryRun ? "Would remove" : "Removed"} ${removed.length} of ${rows.length} items`
  );
  return { scanned: rows.length, removed, dryRun };
}

export interface AdaptResult {
  scanned: number;
  adapted: Array<{ id: number; summary: string }>;
}

/**
 * Stores the brand summary of every news item that has none yet. Items
 * whose brand defines no summary are left as they are.
 */
export function adaptPendingNews(db: Database.Database, domain?: Domain): AdaptResult {
  const rows = listNews(db, { domain, missingSummary: true });
  const adapted: AdaptResult["adapted"] = [];

  db.transaction(() => {
    for (const row of rows) {
      const brand = getBrandForDomain(row.domain);
      const summary = buildBrandSummary(toDraftSource(row), brand, draftSeed(row.url));
      if (summary === null) continue;
      updateNewsSummary(db, row.id, summary);
      adapted.push({ id: row.id, summary });
    }
  })();

  console.log(`[maintenance] Adapted ${adapted.length} of ${rows.length} pending items`);
  return { scanned: rows.length, adapted };
}
