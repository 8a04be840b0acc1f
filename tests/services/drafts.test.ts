import { describe, it, expect, beforeEach } from "vitest";
import type Database from "better-sqlite3";
import { getNewsById, insertNewsIfAbsent, listDrafts } from "../../src/db";
import {
  DraftNotFoundError,
  InvalidDraftEditError,
  InvalidStatusTransitionError,
  NewsNotFoundError,
} from "../../src/lib/errors";
import { draftSeed, VARIANT_STRIDE } from "../../src/lib/seed";
import {
  canTransition,
  createVariants,
  editDraft,
  generatePrimaryDraft,
  remainingVariantSlots,
  transitionDraft,
} from "../../src/services/drafts";
import { createTestDb, makeNewsItem } from "../fixtures";

const URL = "https://example.com/hipotecas";

describe("draft service", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    insertNewsIfAbsent(db, makeNewsItem({ url: URL }));
    return () => db.close();
  });

  describe("generatePrimaryDraft", () => {
    it("creates the primary draft with the brand of the news domain", () => {
      const { draft, regenerated } = generatePrimaryDraft(db, 1);
      expect(regenerated).toBe(false);
      expect(draft.brand).toBe("althara");
      expect(draft.seed).toBe(draftSeed(URL));
      expect(draft.variantOfId).toBeNull();
      expect(draft.tone).toBe("neutral");
    });

    it("regenerates in place and resets the status", () => {
      const first = generatePrimaryDraft(db, 1).draft;
      transitionDraft(db, first.id, "NEEDS_REVIEW");

      const { draft, regenerated } = generatePrimaryDraft(db, 1, { tone: "formal" });
      expect(regenerated).toBe(true);
      expect(draft.id).toBe(first.id);
      expect(draft.status).toBe("DRAFT");
      expect(draft.tone).toBe("formal");
      expect(draft.caption).toBe(first.caption);
      expect(listDrafts(db)).toHaveLength(1);
    });

    it("fails for a missing news item", () => {
      expect(() => generatePrimaryDraft(db, 99)).toThrow(NewsNotFoundError);
    });
  });

  describe("createVariants", () => {
    it("creates the primary first and continues the seed sequence", () => {
      const variants = createVariants(db, 1, 3);
      const primary = listDrafts(db, { newsId: 1 })[0];
      const base = draftSeed(URL);

      expect(primary.variantOfId).toBeNull();
      expect(variants.map((v) => v.variantOfId)).toEqual([primary.id, primary.id, primary.id]);
      expect(variants.map((v) => v.seed)).toEqual([
        base + VARIANT_STRIDE,
        base + 2 * VARIANT_STRIDE,
        base + 3 * VARIANT_STRIDE,
      ]);

      const more = createVariants(db, 1, 2);
      expect(more.map((v) => v.seed)).toEqual([base + 4 * VARIANT_STRIDE, base + 5 * VARIANT_STRIDE]);
    });

    it("never repeats a hook/CTA pair across the item", () => {
      createVariants(db, 1, 4);
      createVariants(db, 1, 7);
      const drafts = listDrafts(db, { newsId: 1 });
      expect(drafts).toHaveLength(12);
      expect(new Set(drafts.map((d) => `${d.hook}|${d.cta}`)).size).toBe(12);
      expect(remainingVariantSlots(db, 1)).toBe(0);
    });

    it("rejects counts beyond the remaining slots", () => {
      expect(remainingVariantSlots(db, 1)).toBe(11);
      createVariants(db, 1, 3);
      expect(remainingVariantSlots(db, 1)).toBe(8);
      expect(() => createVariants(db, 1, 9)).toThrow(
        "Variant count must be an integer between 1 and 8 for news 1, got 9"
      );
      expect(() => createVariants(db, 1, 0)).toThrow(RangeError);
      expect(listDrafts(db, { newsId: 1 })).toHaveLength(4);
    });
  });

  describe("status transitions", () => {
    it("only moves forward and publishes from APPROVED", () => {
      expect(canTransition("DRAFT", "NEEDS_REVIEW")).toBe(true);
      expect(canTransition("DRAFT", "APPROVED")).toBe(true);
      expect(canTransition("DRAFT", "PUBLISHED")).toBe(false);
      expect(canTransition("NEEDS_REVIEW", "PUBLISHED")).toBe(false);
      expect(canTransition("APPROVED", "PUBLISHED")).toBe(true);
      expect(canTransition("APPROVED", "DRAFT")).toBe(false);
      expect(canTransition("DRAFT", "DRAFT")).toBe(false);
    });

    it("marks the news item used when publishing", () => {
      const { draft } = generatePrimaryDraft(db, 1);
      transitionDraft(db, draft.id, "APPROVED");
      expect(getNewsById(db, 1)?.used_in_social).toBe(0);

      const published = transitionDraft(db, draft.id, "PUBLISHED");
      expect(published.status).toBe("PUBLISHED");
      expect(getNewsById(db, 1)?.used_in_social).toBe(1);
    });

    it("rejects invalid moves and unknown drafts", () => {
      const { draft } = generatePrimaryDraft(db, 1);
      expect(() => transitionDraft(db, draft.id, "PUBLISHED")).toThrow(InvalidStatusTransitionError);
      expect(() => transitionDraft(db, draft.id, "PUBLISHED")).toThrow(
        "Cannot move a draft from DRAFT to PUBLISHED."
      );
      expect(() => transitionDraft(db, 99, "APPROVED")).toThrow(DraftNotFoundError);
    });
  });

  describe("editDraft", () => {
    it("updates the given fields and keeps the rest", () => {
      const first = generatePrimaryDraft(db, 1).draft;
      transitionDraft(db, first.id, "NEEDS_REVIEW");

      const edited = editDraft(db, first.id, {
        caption: "Texto revisado.",
        hashtags: ["#vivienda", "#hipotecas"],
        editorNotes: "Revisar la cifra.",
        slideBodies: new Map([[1, "Contexto revisado."]]),
      });

      expect(edited.caption).toBe("Texto revisado.");
      expect(edited.hashtags).toEqual(["#vivienda", "#hipotecas"]);
      expect(edited.editorNotes).toBe("Revisar la cifra.");
      expect(edited.slides[0]).toEqual(first.slides[0]);
      expect(edited.slides[1]).toEqual({ title: "Contexto", body: "Contexto revisado." });
      expect(edited.hook).toBe(first.hook);
      expect(edited.status).toBe("NEEDS_REVIEW");
    });

    it("keeps editor notes when the draft is regenerated", () => {
      const first = generatePrimaryDraft(db, 1).draft;
      editDraft(db, first.id, { editorNotes: "Pendiente de fuente." });
      const { draft } = generatePrimaryDraft(db, 1);
      expect(draft.editorNotes).toBe("Pendiente de fuente.");
    });

    it("clears notes with null", () => {
      const first = generatePrimaryDraft(db, 1).draft;
      editDraft(db, first.id, { editorNotes: "Nota." });
      expect(editDraft(db, first.id, { editorNotes: null }).editorNotes).toBeNull();
    });

    it("enforces the brand limits", () => {
      const { id } = generatePrimaryDraft(db, 1).draft;
      expect(() => editDraft(db, id, { caption: "x".repeat(901) })).toThrow(
        "Cannot edit draft 1: caption has 901 characters, the limit is 900."
      );
      expect(() => editDraft(db, id, { slideBodies: new Map([[0, "y".repeat(111)]]) })).toThrow(
        "Cannot edit draft 1: slide 1 has 111 characters, the limit is 110."
      );
      expect(() => editDraft(db, id, { slideBodies: new Map([[3, "Cuarta."]]) })).toThrow(
        "Cannot edit draft 1: there is no slide 4."
      );
      expect(() => editDraft(db, id, { hashtags: ["#vivienda", "mercado"] })).toThrow(
        'Cannot edit draft 1: "mercado" is not a hashtag.'
      );
      const tooMany = Array.from({ length: 13 }, (_, i) => `#tag${i}`);
      expect(() => editDraft(db, id, { hashtags: tooMany })).toThrow(
        "Cannot edit draft 1: at most 12 hashtags are allowed."
      );
      expect(() => editDraft(db, id, { hook: "  " })).toThrow(
        "Cannot edit draft 1: hook must not be empty."
      );
      expect(() => editDraft(db, id, {})).toThrow("Cannot edit draft 1: no fields to update.");
    });

    it("refuses published and unknown drafts", () => {
      const { id } = generatePrimaryDraft(db, 1).draft;
      transitionDraft(db, id, "APPROVED");
      transitionDraft(db, id, "PUBLISHED");
      expect(() => editDraft(db, id, { caption: "Tarde." })).toThrow(InvalidDraftEditError);
      expect(() => editDraft(db, id, { caption: "Tarde." })).toThrow(
        "Cannot edit draft 1: it is already PUBLISHED."
      );
      expect(() => editDraft(db, 99, { caption: "Nada." })).toThrow(DraftNotFoundError);
    });
  });
});
