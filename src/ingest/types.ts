import type { FeedSource } from "../contracts";

/** One feed entry, normalized across RSS and Atom. */
export interface FeedEntry {
  title?: string;
  link?: string;
  /** Short text: summary or description. */
  summary?: string;
  /** Full body when the feed carries one (content:encoded, Atom content). */
  content?: string;
  published?: Date;
}

export interface FeedFetcher {
  fetchFeed(source: FeedSource): Promise<FeedEntry[]>;
}

/** Resolves to the article's readable text, or null on any failure. */
export interface ArticleFetcher {
  fetchArticle(url: string): Promise<string | null>;
}

export interface HttpOptions {
  timeoutMs: number;
  userAgent?: string;
}

export const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; newsdeck/0.1)";
