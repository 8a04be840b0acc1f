import type Database from "better-sqlite3";
import type { Draft, DraftStatus, NewsItem, Slide } from "../contracts";
import { isRecord } from "../lib/taxonomy";
import type {
  DraftFieldUpdate,
  DraftFilters,
  DraftRecord,
  DraftRow,
  NewsFilters,
  NewsRow,
} from "./types";

// ============================================================
// News
// ============================================================

/**
 * Inserts a news item unless its url is already stored.
 * Returns true if inserted, false if the url existed.
 */
export function insertNewsIfAbsent(db: Database.Database, item: NewsItem): boolean {
  const result = db
    .prepare(
      `INSERT INTO news (title, source, url, domain, category, raw_summary, published_at, tags, relevance_score)
       VALUES (@title, @source, @url, @domain, @category, @raw_summary, @published_at, @tags, @relevance_score)
       ON CONFLICT(url) DO NOTHING`
    )
    .run({
      title: item.title,
      source: item.source,
      url: item.url,
      domain: item.domain,
      category: item.category,
      raw_summary: item.rawSummary,
      published_at: item.publishedAt.toISOString(),
      tags: item.tags,
      relevance_score: item.relevanceScore,
    });
  return result.changes > 0;
}

export function newsUrlExists(db: Database.Database, url: string): boolean {
  return db.prepare("SELECT 1 FROM news WHERE url = ?").get(url) !== undefined;
}

export function getNewsById(db: Database.Database, id: number): NewsRow | undefined {
  return db.prepare("SELECT * FROM news WHERE id = ?").get(id) as NewsRow | undefined;
}

export function listNews(db: Database.Database, filters?: NewsFilters): NewsRow[] {
  let sql = "SELECT * FROM news";
  const conditions: string[] = [];
  const params: Record<string, string | number> = {};

  if (filters?.domain) {
    conditions.push("domain = @domain");
    params.domain = filters.domain;
  }
  if (filters?.missingSummary) {
    conditions.push("brand_summary IS NULL");
  }
  if (conditions.length > 0) {
    sql += " WHERE " + conditions.join(" AND ");
  }
  sql += " ORDER BY published_at DESC, id DESC";
  if (filters?.limit !== undefined) {
    sql += " LIMIT @limit";
    params.limit = filters.limit;
  }

  return db.prepare(sql).all(params) as NewsRow[];
}

export function updateNewsCategory(db: Database.Database, id: number, category: string): void {
  db.prepare("UPDATE news SET category = ? WHERE id = ?").run(category, id);
}

export function updateNewsSummary(db: Database.Database, id: number, summary: string): void {
  db.prepare("UPDATE news SET brand_summary = ? WHERE id = ?").run(summary, id);
}

export function markNewsUsedInSocial(db: Database.Database, id: number): void {
  db.prepare("UPDATE news SET used_in_social = 1 WHERE id = ?").run(id);
}

/** Deletes a news item and, by cascade, its drafts. */
export function deleteNews(db: Database.Database, id: number): boolean {
  return db.prepare("DELETE FROM news WHERE id = ?").run(id).changes > 0;
}

// ============================================================
// Drafts
// ============================================================

function parseSlides(json: string): Slide[] {
  const value: unknown = JSON.parse(json);
  if (!Array.isArray(value)) return [];
  return value.flatMap((s: unknown) =>
    isRecord(s) && typeof s.title === "string" && typeof s.body === "string"
      ? [{ title: s.title, body: s.body }]
      : []
  );
}

function parseHashtags(json: string): string[] {
  const value: unknown = JSON.parse(json);
  if (!Array.isArray(value)) return [];
  return value.filter((t: unknown): t is string => typeof t === "string");
}

export function toDraftRecord(row: DraftRow): DraftRecord {
  return {
    id: row.id,
    newsId: row.news_id,
    variantOfId: row.variant_of_id,
    brand: row.brand,
    category: row.category,
    seed: row.seed,
    hook: row.hook,
    slides: parseSlides(row.slides),
    caption: row.caption,
    hashtags: parseHashtags(row.hashtags),
    cta: row.cta,
    sourceLine: row.source_line,
    disclaimer: row.disclaimer,
    tone: row.tone,
    language: row.language,
    status: row.status,
    editorNotes: row.editor_notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function draftParams(draft: Draft): Record<string, string | number> {
  return {
    brand: draft.brand,
    category: draft.category,
    seed: draft.seed,
    hook: draft.hook,
    slides: JSON.stringify(draft.slides),
    caption: draft.caption,
    hashtags: JSON.stringify(draft.hashtags),
    cta: draft.cta,
    source_line: draft.sourceLine,
    disclaimer: draft.disclaimer,
    tone: draft.tone,
    language: draft.language,
    status: draft.status,
  };
}

export function getDraftById(db: Database.Database, id: number): DraftRecord | undefined {
  const row = db.prepare("SELECT * FROM drafts WHERE id = ?").get(id) as DraftRow | undefined;
  return row ? toDraftRecord(row) : undefined;
}

export function insertDraft(
  db: Database.Database,
  newsId: number,
  draft: Draft,
  variantOfId: number | null = null
): DraftRecord {
  const result = db
    .prepare(
      `INSERT INTO drafts (news_id, variant_of_id, brand, category, seed, hook, slides, caption,
                           hashtags, cta, source_line, disclaimer, tone, language, status)
       VALUES (@news_id, @variant_of_id, @brand, @category, @seed, @hook, @slides, @caption,
               @hashtags, @cta, @source_line, @disclaimer, @tone, @language, @status)`
    )
    .run({ ...draftParams(draft), news_id: newsId, variant_of_id: variantOfId });

  const stored = getDraftById(db, Number(result.lastInsertRowid));
  if (!stored) {
    throw new Error(`Draft for news ${newsId} was not stored.`);
  }
  return stored;
}

/** The non-variant draft of a news item, if one exists. */
export function getPrimaryDraft(db: Database.Database, newsId: number): DraftRecord | undefined {
  const row = db
    .prepare(
      "SELECT * FROM drafts WHERE news_id = ? AND variant_of_id IS NULL ORDER BY id ASC LIMIT 1"
    )
    .get(newsId) as DraftRow | undefined;
  return row ? toDraftRecord(row) : undefined;
}

/** Overwrites a draft's content in place; status comes from `draft`. */
export function replaceDraftContent(db: Database.Database, id: number, draft: Draft): void {
  db.prepare(
    `UPDATE drafts SET
       brand = @brand, category = @category, seed = @seed, hook = @hook, slides = @slides,
       caption = @caption, hashtags = @hashtags, cta = @cta, source_line = @source_line,
       disclaimer = @disclaimer, tone = @tone, language = @language, status = @status,
       updated_at = CURRENT_TIMESTAMP
     WHERE id = @id`
  ).run({ ...draftParams(draft), id });
}

export function updateDraftStatus(db: Database.Database, id: number, status: DraftStatus): void {
  db.prepare("UPDATE drafts SET status = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?").run(
    status,
    id
  );
}

const EDITABLE_COLUMNS: Readonly<Record<keyof DraftFieldUpdate, string>> = {
  hook: "hook",
  slides: "slides",
  caption: "caption",
  hashtags: "hashtags",
  cta: "cta",
  sourceLine: "source_line",
  disclaimer: "disclaimer",
  tone: "tone",
  language: "language",
  editorNotes: "editor_notes",
};

const EDITABLE_FIELDS: readonly (keyof DraftFieldUpdate)[] = [
  "hook",
  "slides",
  "caption",
  "hashtags",
  "cta",
  "sourceLine",
  "disclaimer",
  "tone",
  "language",
  "editorNotes",
];

function editableValue(fields: DraftFieldUpdate, key: keyof DraftFieldUpdate): string | null {
  switch (key) {
    case "slides":
      return JSON.stringify(fields.slides);
    case "hashtags":
      return JSON.stringify(fields.hashtags);
    default:
      return fields[key] ?? null;
  }
}

/**
 * Updates the given fields of a draft. Returns false when the draft does
 * not exist or `fields` names nothing.
 */
export function updateDraftFields(
  db: Database.Database,
  id: number,
  fields: DraftFieldUpdate
): boolean {
  const keys = EDITABLE_FIELDS.filter((key) => fields[key] !== undefined);
  if (keys.length === 0) return false;

  const params: Record<string, string | number | null> = { id };
  const assignments = keys.map((key) => {
    params[key] = editableValue(fields, key);
    return `${EDITABLE_COLUMNS[key]} = @${key}`;
  });

  const result = db
    .prepare(
      `UPDATE drafts SET ${assignments.join(", ")}, updated_at = CURRENT_TIMESTAMP WHERE id = @id`
    )
    .run(params);
  return result.changes > 0;
}

export function listDrafts(db: Database.Database, filters?: DraftFilters): DraftRecord[] {
  let sql = "SELECT d.* FROM drafts d JOIN news n ON n.id = d.news_id";
  const conditions: string[] = [];
  const params: Record<string, string | number> = {};

  if (filters?.status !== undefined) {
    const statuses: readonly DraftStatus[] =
      typeof filters.status === "string" ? [filters.status] : filters.status;
    const names = statuses.map((status, i) => {
      params[`status${i}`] = status;
      return `@status${i}`;
    });
    conditions.push(names.length > 0 ? `d.status IN (${names.join(", ")})` : "0");
  }
  if (filters?.domain) {
    conditions.push("n.domain = @domain");
    params.domain = filters.domain;
  }
  if (filters?.brand) {
    conditions.push("d.brand = @brand");
    params.brand = filters.brand;
  }
  if (filters?.newsId !== undefined) {
    conditions.push("d.news_id = @news_id");
    params.news_id = filters.newsId;
  }

  if (conditions.length > 0) {
    sql += " WHERE " + conditions.join(" AND ");
  }
  sql += " ORDER BY d.id ASC";

  return (db.prepare(sql).all(params) as DraftRow[]).map(toDraftRecord);
}

export function listVariants(db: Database.Database, primaryId: number): DraftRecord[] {
  return (
    db
      .prepare("SELECT * FROM drafts WHERE variant_of_id = ? ORDER BY id ASC")
      .all(primaryId) as DraftRow[]
  ).map(toDraftRecord);
}
