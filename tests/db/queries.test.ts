import { describe, it, expect, beforeEach } from "vitest";
import Database from "better-sqlite3";
import {
  deleteNews,
  ensureSchema,
  getDraftById,
  getNewsById,
  getPrimaryDraft,
  insertDraft,
  insertNewsIfAbsent,
  listDrafts,
  listNews,
  listVariants,
  markNewsUsedInSocial,
  newsUrlExists,
  replaceDraftContent,
  SCHEMA_VERSION,
  toDraftRecord,
  updateDraftFields,
  updateDraftStatus,
  updateNewsCategory,
  updateNewsSummary,
  type DraftRow,
} from "../../src/db";
import { createTestDb, makeDraft, makeNewsItem } from "../fixtures";

describe("schema", () => {
  it("creates the tables on first run", () => {
    const db = createTestDb();
    const names = (
      db.prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name").all() as {
        name: string;
      }[]
    ).map((t) => t.name);
    expect(names).toContain("news");
    expect(names).toContain("drafts");
    expect(names).toContain("schema_version");
    db.close();
  });

  it("adds the editor notes and brand summary columns", () => {
    const db = createTestDb();
    const columns = (table: string): string[] =>
      (db.prepare(`PRAGMA table_info(${table})`).all() as { name: string }[]).map((c) => c.name);
    expect(columns("drafts")).toContain("editor_notes");
    expect(columns("news")).toContain("brand_summary");
    db.close();
  });

  it("is idempotent", () => {
    const db = new Database(":memory:");
    ensureSchema(db);
    ensureSchema(db);
    const row = db.prepare("SELECT COUNT(*) as n, MAX(version) as v FROM schema_version").get() as {
      n: number;
      v: number;
    };
    expect(row).toEqual({ n: 2, v: SCHEMA_VERSION });
    db.close();
  });
});

describe("news", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    return () => db.close();
  });

  it("inserts once per url", () => {
    expect(insertNewsIfAbsent(db, makeNewsItem())).toBe(true);
    expect(insertNewsIfAbsent(db, makeNewsItem({ title: "Otro titular" }))).toBe(false);
    expect(newsUrlExists(db, "https://example.com/hipotecas")).toBe(true);
    expect(listNews(db)).toHaveLength(1);
    expect(listNews(db)[0].title).toBe("Las hipotecas se encarecen por tercer mes");
  });

  it("stores the publication date as ISO text", () => {
    insertNewsIfAbsent(db, makeNewsItem());
    expect(getNewsById(db, 1)?.published_at).toBe("2025-10-01T08:00:00.000Z");
    expect(getNewsById(db, 1)?.used_in_social).toBe(0);
  });

  it("lists newest first and filters by domain", () => {
    insertNewsIfAbsent(db, makeNewsItem({ url: "https://example.com/1" }));
    insertNewsIfAbsent(
      db,
      makeNewsItem({
        url: "https://example.com/2",
        domain: "tech",
        publishedAt: new Date("2025-10-02T08:00:00.000Z"),
      })
    );
    insertNewsIfAbsent(
      db,
      makeNewsItem({ url: "https://example.com/3", publishedAt: new Date("2025-09-30T08:00:00.000Z") })
    );

    expect(listNews(db).map((n) => n.url)).toEqual([
      "https://example.com/2",
      "https://example.com/1",
      "https://example.com/3",
    ]);
    expect(listNews(db, { domain: "real_estate", limit: 1 }).map((n) => n.url)).toEqual([
      "https://example.com/1",
    ]);
  });

  it("updates category and usage flag", () => {
    insertNewsIfAbsent(db, makeNewsItem());
    updateNewsCategory(db, 1, "PRECIOS_VIVIENDA");
    markNewsUsedInSocial(db, 1);
    const row = getNewsById(db, 1);
    expect(row?.category).toBe("PRECIOS_VIVIENDA");
    expect(row?.used_in_social).toBe(1);
  });

  it("stores the brand summary and filters items still missing one", () => {
    insertNewsIfAbsent(db, makeNewsItem({ url: "https://example.com/1" }));
    insertNewsIfAbsent(db, makeNewsItem({ url: "https://example.com/2" }));
    updateNewsSummary(db, 1, "Uno.\nDos.\nTres.");
    expect(getNewsById(db, 1)?.brand_summary).toBe("Uno.\nDos.\nTres.");
    expect(listNews(db, { missingSummary: true }).map((n) => n.id)).toEqual([2]);
    expect(listNews(db, { domain: "tech", missingSummary: true })).toEqual([]);
  });

  it("cascades deletes to drafts", () => {
    insertNewsIfAbsent(db, makeNewsItem());
    const draft = insertDraft(db, 1, makeDraft());
    expect(deleteNews(db, 1)).toBe(true);
    expect(getDraftById(db, draft.id)).toBeUndefined();
    expect(deleteNews(db, 1)).toBe(false);
  });
});

describe("drafts", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    insertNewsIfAbsent(db, makeNewsItem());
    insertNewsIfAbsent(db, makeNewsItem({ url: "https://example.com/ia", domain: "tech" }));
    return () => db.close();
  });

  it("round-trips slides and hashtags", () => {
    const stored = insertDraft(db, 1, makeDraft());
    expect(stored.newsId).toBe(1);
    expect(stored.variantOfId).toBeNull();
    expect(stored.slides).toEqual(makeDraft().slides);
    expect(stored.hashtags).toEqual(["#inmobiliaria", "#althara"]);
    expect(stored.status).toBe("DRAFT");
  });

  it("separates the primary draft from its variants", () => {
    const primary = insertDraft(db, 1, makeDraft());
    const variant = insertDraft(db, 1, makeDraft({ seed: 49 }), primary.id);
    expect(getPrimaryDraft(db, 1)?.id).toBe(primary.id);
    expect(listVariants(db, primary.id).map((d) => d.id)).toEqual([variant.id]);
    expect(getPrimaryDraft(db, 2)).toBeUndefined();
  });

  it("replaces content in place", () => {
    const primary = insertDraft(db, 1, makeDraft({ status: "NEEDS_REVIEW" }));
    replaceDraftContent(db, primary.id, makeDraft({ hook: "Nuevo gancho.", status: "DRAFT" }));
    const updated = getDraftById(db, primary.id);
    expect(updated?.hook).toBe("Nuevo gancho.");
    expect(updated?.status).toBe("DRAFT");
  });

  it("filters by status, domain, brand and news id", () => {
    const a = insertDraft(db, 1, makeDraft());
    const b = insertDraft(db, 2, makeDraft({ brand: "oxono", category: "AI_ML" }));
    updateDraftStatus(db, b.id, "APPROVED");

    expect(listDrafts(db).map((d) => d.id)).toEqual([a.id, b.id]);
    expect(listDrafts(db, { status: "APPROVED" }).map((d) => d.id)).toEqual([b.id]);
    expect(listDrafts(db, { status: ["DRAFT", "NEEDS_REVIEW"] }).map((d) => d.id)).toEqual([a.id]);
    expect(listDrafts(db, { status: [] })).toEqual([]);
    expect(listDrafts(db, { domain: "tech" }).map((d) => d.id)).toEqual([b.id]);
    expect(listDrafts(db, { brand: "althara" }).map((d) => d.id)).toEqual([a.id]);
    expect(listDrafts(db, { newsId: 2 }).map((d) => d.id)).toEqual([b.id]);
  });

  it("updates only the given fields", () => {
    const stored = insertDraft(db, 1, makeDraft());
    expect(
      updateDraftFields(db, stored.id, {
        hook: "Gancho editado.",
        hashtags: ["#vivienda"],
        sourceLine: "Fuente: Otro",
        editorNotes: "Ok.",
      })
    ).toBe(true);

    const updated = getDraftById(db, stored.id);
    expect(updated?.hook).toBe("Gancho editado.");
    expect(updated?.hashtags).toEqual(["#vivienda"]);
    expect(updated?.sourceLine).toBe("Fuente: Otro");
    expect(updated?.editorNotes).toBe("Ok.");
    expect(updated?.caption).toBe(stored.caption);
    expect(updated?.slides).toEqual(stored.slides);
  });

  it("reports nothing to update", () => {
    const stored = insertDraft(db, 1, makeDraft());
    expect(stored.editorNotes).toBeNull();
    expect(updateDraftFields(db, stored.id, {})).toBe(false);
    expect(updateDraftFields(db, 99, { hook: "x" })).toBe(false);
  });

  it("tolerates malformed JSON columns", () => {
    const stored = insertDraft(db, 1, makeDraft());
    const row = db.prepare("SELECT * FROM drafts WHERE id = ?").get(stored.id) as DraftRow;
    expect(toDraftRecord({ ...row, slides: '{"a":1}', hashtags: '[1, "#ok"]' })).toMatchObject({
      slides: [],
      hashtags: ["#ok"],
    });
  });
});
