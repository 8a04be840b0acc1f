import Parser from "rss-parser";
import type { FeedSource } from "../contracts";
import { DEFAULT_USER_AGENT, type FeedEntry, type FeedFetcher, type HttpOptions } from "./types";

interface ItemExtras {
  description?: string;
  updated?: string;
  "content:encoded"?: string;
}

const parser = new Parser<Record<string, unknown>, ItemExtras>({
  customFields: { item: ["description", "updated"] },
});

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

function parseDate(...candidates: Array<string | undefined>): Date | undefined {
  for (const candidate of candidates) {
    if (!candidate) continue;
    const date = new Date(candidate);
    if (!Number.isNaN(date.getTime())) return date;
  }
  return undefined;
}

/**
 * Parses RSS or Atom XML into normalized entries.
 *
 * RSS puts `description` in `content` and keeps `content:encoded` apart;
 * Atom has `summary` and `content`. Both end up as summary/content here.
 */
export async function parseFeedXml(xml: string): Promise<FeedEntry[]> {
  const feed = await parser.parseString(xml);
  return feed.items.map((item) => {
    const encoded = nonEmpty(item["content:encoded"]);
    const summary =
      nonEmpty(item.summary) ?? nonEmpty(item.description) ?? (encoded ? nonEmpty(item.content) : undefined);
    const content = encoded ?? (nonEmpty(item.summary) ? nonEmpty(item.content) : undefined);
    return {
      title: nonEmpty(item.title),
      link: nonEmpty(item.link),
      summary,
      content,
      published: parseDate(item.isoDate, item.pubDate, item.updated),
    };
  });
}

/** Fetches feeds over HTTP with a bounded timeout and parses them. */
export function createRssFeedFetcher(options: HttpOptions): FeedFetcher {
  return {
    async fetchFeed(source: FeedSource): Promise<FeedEntry[]> {
      const response = await fetch(source.url, {
        headers: { "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT },
        signal: AbortSignal.timeout(options.timeoutMs),
        redirect: "follow",
      });
      if (!response.ok) {
        throw new Error(`Feed ${source.name} returned HTTP ${response.status}`);
      }
      return parseFeedXml(await response.text());
    },
  };
}
