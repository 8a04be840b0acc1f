/**
 * Article body scraping for items whose feed carries no full content.
 */

import { cleanText, decodeBytes } from "../lib/textClean";
import { DEFAULT_USER_AGENT, type ArticleFetcher, type HttpOptions } from "./types";

export const MAX_ARTICLE_CHARS = 5000;
/** Extracted text at or below this length counts as no article. */
const MIN_ARTICLE_CHARS = 50;

const NOISE_ELEMENTS = ["script", "style", "nav", "header", "footer", "aside", "iframe", "noscript"];

function removeElements(html: string, tag: string): string {
  return html.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?</${tag}\\s*>`, "gi"), " ");
}

function innerOf(html: string, tag: string): string | null {
  const match = html.match(new RegExp(`<${tag}\\b[^>]*>([\\s\\S]*?)</${tag}\\s*>`, "i"));
  return match ? match[1] : null;
}

/**
 * Readable text of an HTML page: noise elements removed, the first
 * `<article>` preferred over `<body>`, capped at MAX_ARTICLE_CHARS.
 */
export function extractArticleText(html: string): string | null {
  let page = html.replace(/<!--[\s\S]*?-->/g, " ");
  for (const tag of NOISE_ELEMENTS) {
    page = removeElements(page, tag);
  }

  const region = innerOf(page, "article") ?? innerOf(page, "body") ?? page;
  // Tags become spaces between paragraphs.
  const text = cleanText(region.replace(/<[^>]+>/g, " "));
  const capped = text.length > MAX_ARTICLE_CHARS ? `${text.slice(0, MAX_ARTICLE_CHARS)}...` : text;
  return capped.length > MIN_ARTICLE_CHARS ? capped : null;
}

export function createHttpArticleFetcher(options: HttpOptions): ArticleFetcher {
  return {
    async fetchArticle(url: string): Promise<string | null> {
      try {
        const response = await fetch(url, {
          headers: { "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT },
          signal: AbortSignal.timeout(options.timeoutMs),
          redirect: "follow",
        });
        if (!response.ok) return null;
        return extractArticleText(decodeBytes(new Uint8Array(await response.arrayBuffer())));
      } catch (err) {
        console.warn(`[ingest] Article fetch failed for ${url}: ${(err as Error).message}`);
        return null;
      }
    },
  };
}
