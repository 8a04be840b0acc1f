/**
 * Draft lifecycle against the database: generate, regenerate, variants,
 * field edits and status transitions.
 */

import type Database from "better-sqlite3";
import { DRAFT_STATUSES, type DraftSource, type DraftStatus } from "../contracts";
import {
  getDraftById,
  getNewsById,
  getPrimaryDraft,
  insertDraft,
  listVariants,
  markNewsUsedInSocial,
  replaceDraftContent,
  updateDraftFields,
  updateDraftStatus,
  type DraftFieldUpdate,
  type DraftRecord,
  type NewsRow,
} from "../db";
import {
  DraftNotFoundError,
  InvalidDraftEditError,
  InvalidStatusTransitionError,
  NewsNotFoundError,
} from "../lib/errors";
import { draftSeed, variantSeed } from "../lib/seed";
import { generateDraft } from "../social/draftWriter";
import { getBrand, getBrandForDomain } from "../social/registry";
import { generateVariants, variantCapacity } from "../social/variants";

export interface GenerateOptions {
  tone?: string;
  language?: string;
}

export function toDraftSource(row: NewsRow): DraftSource {
  return {
    title: row.title,
    rawSummary: row.raw_summary,
    category: row.category,
    source: row.source,
    url: row.url,
  };
}

function requireNews(db: Database.Database, newsId: number): NewsRow {
  const news = getNewsById(db, newsId);
  if (!news) throw new NewsNotFoundError(newsId);
  return news;
}

/**
 * Creates the primary draft of a news item, or overwrites it in place when
 * one exists. A regenerated draft starts over at DRAFT.
 */
export function generatePrimaryDraft(
  db: Database.Database,
  newsId: number,
  options: GenerateOptions = {}
): { draft: DraftRecord; regenerated: boolean } {
  const news = requireNews(db, newsId);
  const draft = generateDraft(toDraftSource(news), getBrandForDomain(news.domain), {
    seed: draftSeed(news.url),
    tone: options.tone,
    language: options.language,
  });

  const existing = getPrimaryDraft(db, newsId);
  if (existing) {
    replaceDraftContent(db, existing.id, draft);
    const updated = getDraftById(db, existing.id);
    if (!updated) throw new DraftNotFoundError(existing.id);
    return { draft: updated, regenerated: true };
  }
  return { draft: insertDraft(db, newsId, draft), regenerated: false };
}

/** How many more variants a news item's primary draft can take. */
export function remainingVariantSlots(db: Database.Database, newsId: number): number {
  const news = requireNews(db, newsId);
  const primary = getPrimaryDraft(db, newsId);
  const taken = primary ? listVariants(db, primary.id).length : 0;
  // One cell of the hook/CTA grid belongs to the primary draft.
  return variantCapacity(getBrandForDomain(news.domain)) - 1 - taken;
}

/**
 * Inserts `count` variant drafts pointing at the primary draft, creating the
 * primary first when missing. Variant seeds continue after the ones already
 * stored, so no two drafts of an item share a hook/CTA pair.
 */
export function createVariants(
  db: Database.Database,
  newsId: number,
  count: number,
  options: GenerateOptions = {}
): DraftRecord[] {
  const news = requireNews(db, newsId);
  const brand = getBrandForDomain(news.domain);

  return db.transaction(() => {
    const primary = getPrimaryDraft(db, newsId) ?? generatePrimaryDraft(db, newsId, options).draft;
    const taken = listVariants(db, primary.id).length;
    const available = variantCapacity(brand) - 1 - taken;
    if (!Number.isInteger(count) || count < 1 || count > available) {
      throw new RangeError(
        `Variant count must be an integer between 1 and ${available} for news ${newsId}, got ${count}`
      );
    }

    const drafts = generateVariants(toDraftSource(news), brand, count, {
      baseSeed: variantSeed(draftSeed(news.url), 1 + taken),
      tone: options.tone,
      language: options.language,
    });
    return drafts.map((draft) => insertDraft(db, newsId, draft, primary.id));
  })();
}

export interface DraftEdit extends Omit<DraftFieldUpdate, "slides"> {
  /** Replacement slide bodies keyed by position (0-2); titles are kept. */
  slideBodies?: ReadonlyMap<number, string>;
}

function requireText(draftId: number, field: string, value: string | undefined): void {
  if (value !== undefined && !value.trim()) {
    throw new InvalidDraftEditError(draftId, `${field} must not be empty.`);
  }
}

/**
 * Updates reviewer-editable fields of a draft within the brand's limits.
 * Published drafts are final. Status is left as it is.
 */
export function editDraft(db: Database.Database, draftId: number, edit: DraftEdit): DraftRecord {
  const draft = getDraftById(db, draftId);
  if (!draft) throw new DraftNotFoundError(draftId);
  if (draft.status === "PUBLISHED") {
    throw new InvalidDraftEditError(draftId, "it is already PUBLISHED.");
  }

  const { spec } = getBrand(draft.brand);
  const { slideBodies, ...fields } = edit;

  requireText(draftId, "hook", fields.hook);
  requireText(draftId, "caption", fields.caption);
  requireText(draftId, "cta", fields.cta);
  if (fields.caption !== undefined && fields.caption.length > spec.captionMaxLength) {
    throw new InvalidDraftEditError(
      draftId,
      `caption has ${fields.caption.length} characters, the limit is ${spec.captionMaxLength}.`
    );
  }
  if (fields.hashtags !== undefined) {
    const bad = fields.hashtags.find((tag) => !/^#\S+$/.test(tag));
    if (bad !== undefined) {
      throw new InvalidDraftEditError(draftId, `"${bad}" is not a hashtag.`);
    }
    const max = spec.templates.hashtags.max;
    if (fields.hashtags.length > max) {
      throw new InvalidDraftEditError(draftId, `at most ${max} hashtags are allowed.`);
    }
  }

  const update: DraftFieldUpdate = { ...fields };
  if (slideBodies !== undefined && slideBodies.size > 0) {
    const slides = draft.slides.map((slide) => ({ ...slide }));
    for (const [index, body] of slideBodies) {
      if (!Number.isInteger(index) || index < 0 || index >= slides.length) {
        throw new InvalidDraftEditError(draftId, `there is no slide ${index + 1}.`);
      }
      requireText(draftId, `slide ${index + 1}`, body);
      if (body.length > spec.slides.maxLength) {
        throw new InvalidDraftEditError(
          draftId,
          `slide ${index + 1} has ${body.length} characters, the limit is ${spec.slides.maxLength}.`
        );
      }
      slides[index].body = body;
    }
    update.slides = slides;
  }

  if (!updateDraftFields(db, draftId, update)) {
    throw new InvalidDraftEditError(draftId, "no fields to update.");
  }
  const updated = getDraftById(db, draftId);
  if (!updated) throw new DraftNotFoundError(draftId);
  return updated;
}

/**
 * Statuses only move forward, and only an APPROVED draft can be published.
 */
export function canTransition(from: DraftStatus, to: DraftStatus): boolean {
  if (to === "PUBLISHED") return from === "APPROVED";
  return DRAFT_STATUSES.indexOf(to) > DRAFT_STATUSES.indexOf(from);
}

/** Moves a draft to `to`; publishing also marks its news item as used. */
export function transitionDraft(
  db: Database.Database,
  draftId: number,
  to: DraftStatus
): DraftRecord {
  return db.transaction(() => {
    const draft = getDraftById(db, draftId);
    if (!draft) throw new DraftNotFoundError(draftId);
    if (!canTransition(draft.status, to)) {
      throw new InvalidStatusTransitionError(draft.status, to);
    }

    updateDraftStatus(db, draftId, to);
    if (to === "PUBLISHED") {
      markNewsUsedInSocial(db, draft.newsId);
    }

    const updated = getDraftById(db, draftId);
    if (!updated) throw new DraftNotFoundError(draftId);
    return updated;
  })();
}
