/**
 * Ingestion coordinator.
 *
 * Sources are read concurrently and independently; their staged items are
 * committed together in one transaction, in configuration order, so a url
 * offered by two sources is stored once under the first.
 */

import type Database from "better-sqlite3";
import type {
  Domain,
  FeedSource,
  GuardrailConfig,
  IngestSummary,
  NewsItem,
  TechCategory,
} from "../contracts";
import { insertNewsIfAbsent, newsUrlExists } from "../db";
import { loadClassifier, loadGuardrailConfig, isTechCategory } from "../lib/taxonomy";
import { cleanText } from "../lib/textClean";
import type { CategoryClassifier } from "../pipeline/classify";
import { passesGuardrails } from "../pipeline/guardrail";
import { computeRelevanceScore, extractTags, MIN_RELEVANCE_SCORE } from "../pipeline/techScoring";
import type { ArticleFetcher, FeedEntry, FeedFetcher } from "./types";

/** Feed content shorter than this (once cleaned) is not trusted as the article body. */
export const MIN_CONTENT_CHARS = 200;

export interface DomainRules {
  classifier: CategoryClassifier<string>;
  guardrails: GuardrailConfig;
}

export interface IngestDeps {
  feeds: FeedFetcher;
  articles: ArticleFetcher;
  /** Fallback publication date for entries without one. */
  now?: () => Date;
  rules?: (domain: Domain) => DomainRules;
}

export interface IngestOptions {
  sources: readonly FeedSource[];
  maxItemsPerSource: number;
  /** Only run sources of this domain. */
  domain?: Domain;
}

function defaultRules(domain: Domain): DomainRules {
  return { classifier: loadClassifier(domain), guardrails: loadGuardrailConfig(domain) };
}

/**
 * Full text for a real-estate entry: feed content when substantial, else
 * the scraped article, else the feed summary.
 */
async function resolveContent(
  entry: FeedEntry,
  link: string,
  summary: string | null,
  articles: ArticleFetcher
): Promise<string | null> {
  const content = cleanText(entry.content);
  if (content.length >= MIN_CONTENT_CHARS) return content;

  const scraped = await articles.fetchArticle(link);
  if (scraped) return scraped;

  return summary;
}

function techScoring(
  title: string,
  summary: string | null,
  category: string
): { tags: string | null; score: number } | null {
  const techCategory: TechCategory = isTechCategory(category) ? category : "OTHER_TECH";
  const score = computeRelevanceScore(title, summary, techCategory);
  if (score < MIN_RELEVANCE_SCORE) return null;
  const tags = extractTags(title, summary);
  return { tags: tags.length > 0 ? tags.join(",") : null, score };
}

/**
 * Walks one source's entries and returns the items to store.
 * The per-source cap counts entries that pass the early guardrail.
 */
export async function collectFromSource(
  db: Database.Database,
  source: FeedSource,
  deps: IngestDeps,
  maxItems: number
): Promise<NewsItem[]> {
  const { classifier, guardrails } = (deps.rules ?? defaultRules)(source.domain);
  const now = deps.now ?? (() => new Date());
  const entries = await deps.feeds.fetchFeed(source);

  const staged: NewsItem[] = [];
  let relevant = 0;

  for (const entry of entries) {
    if (relevant >= maxItems) break;

    const title = cleanText(entry.title);
    const link = entry.link?.trim() ?? "";
    if (!title || !link) continue;

    const summary = cleanText(entry.summary) || null;
    if (!passesGuardrails(title, guardrails, { summary, url: link })) continue;
    relevant++;

    let rawSummary = summary;
    if (source.domain === "real_estate") {
      rawSummary = await resolveContent(entry, link, summary, deps.articles);
      if (!passesGuardrails(title, guardrails, { summary: rawSummary, url: link })) continue;
    }

    const category = classifier.classify(title, rawSummary);

    let tags: string | null = null;
    let relevanceScore: number | null = null;
    if (source.domain === "tech") {
      const scored = techScoring(title, rawSummary, category);
      if (!scored) continue;
      tags = scored.tags;
      relevanceScore = scored.score;
    }

    if (newsUrlExists(db, link) || staged.some((s) => s.url === link)) continue;

    staged.push({
      title,
      rawSummary,
      category,
      source: source.source,
      url: link,
      domain: source.domain,
      publishedAt: entry.published ?? now(),
      tags,
      relevanceScore,
    });
  }
  return staged;
}

/**
 * Runs every configured source and stores what they yield.
 * A failing source reports 0 and leaves the others untouched.
 */
export async function runIngestion(
  db: Database.Database,
  deps: IngestDeps,
  options: IngestOptions
): Promise<IngestSummary> {
  const sources = options.domain
    ? options.sources.filter((s) => s.domain === options.domain)
    : options.sources;

  const collected = await Promise.all(
    sources.map(async (source) => {
      try {
        return await collectFromSource(db, source, deps, options.maxItemsPerSource);
      } catch (err) {
        console.error(`[ingest] ${source.name} failed: ${(err as Error).message}`);
        return [];
      }
    })
  );

  const summary: IngestSummary = {};
  db.transaction(() => {
    sources.forEach((source, i) => {
      const inserted = collected[i].filter((item) => insertNewsIfAbsent(db, item)).length;
      summary[source.name] = (summary[source.name] ?? 0) + inserted;
    });
  })();

  for (const [name, count] of Object.entries(summary)) {
    console.log(`[ingest] ${name}: ${count} inserted`);
  }
  return summary;
}
