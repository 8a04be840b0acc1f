import type { Domain, DraftStatus, Slide } from "../contracts";

/** Database row for a news item */
export interface NewsRow {
  id: number;
  title: string;
  source: string;
  url: string;
  domain: Domain;
  category: string | null;
  raw_summary: string | null;
  published_at: string;
  tags: string | null;
  relevance_score: number | null;
  used_in_social: number;
  brand_summary: string | null;
  created_at: string;
}

/** Database row for a draft; slides and hashtags are JSON text */
export interface DraftRow {
  id: number;
  news_id: number;
  variant_of_id: number | null;
  brand: string;
  category: string;
  seed: number;
  hook: string;
  slides: string;
  caption: string;
  hashtags: string;
  cta: string;
  source_line: string;
  disclaimer: string;
  tone: string;
  language: string;
  status: DraftStatus;
  editor_notes: string | null;
  created_at: string;
  updated_at: string;
}

/** A stored draft with its JSON columns decoded */
export interface DraftRecord {
  id: number;
  newsId: number;
  variantOfId: number | null;
  brand: string;
  category: string;
  seed: number;
  hook: string;
  slides: Slide[];
  caption: string;
  hashtags: string[];
  cta: string;
  sourceLine: string;
  disclaimer: string;
  tone: string;
  language: string;
  status: DraftStatus;
  editorNotes: string | null;
  createdAt: string;
  updatedAt: string;
}

/** Editable draft fields; omitted fields keep their stored value. */
export interface DraftFieldUpdate {
  hook?: string;
  slides?: Slide[];
  caption?: string;
  hashtags?: string[];
  cta?: string;
  sourceLine?: string;
  disclaimer?: string;
  tone?: string;
  language?: string;
  editorNotes?: string | null;
}

export interface DraftFilters {
  status?: DraftStatus | readonly DraftStatus[];
  domain?: Domain;
  brand?: string;
  newsId?: number;
}

export interface NewsFilters {
  domain?: Domain;
  limit?: number;
  /** Only items without a stored brand summary. */
  missingSummary?: boolean;
}
