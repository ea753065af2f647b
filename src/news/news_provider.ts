/**
 * Per-symbol news from quote RSS feeds.
 *
 * Articles are handed over as raw records ({ title, description, url,
 * publishedAt, source, symbol }); the retrieval adapter decides which field
 * carries the body text.
 */
import { getLogger } from "@src/util/logger";
import { fail, ok, type Result } from "@src/util/result";
import type { RawDocument } from "@src/retrieval";
import { parseFeed, type FeedItem } from "./rss";

export interface NewsProvider {
  fetchArticles(symbols: string[]): Promise<Result<RawDocument[]>>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_FEED_URL_TEMPLATE =
  "https://feeds.finance.yahoo.com/rss/2.0/headline?s={symbol}&region=US&lang=en-US";

export interface RssNewsProviderOptions {
  /** Feed URL with a `{symbol}` placeholder. */
  feedUrlTemplate?: string;
  /** Only the first N symbols get a feed request. */
  maxSymbols?: number;
  /** Max articles after dedupe. */
  limit?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
}

interface FeedOutcome {
  symbol: string;
  url: string;
  items: FeedItem[] | undefined;
}

export function buildFeedUrl(template: string, symbol: string): string {
  return template.replace(/\{symbol\}/g, encodeURIComponent(symbol));
}

export function createRssNewsProvider(
  options: RssNewsProviderOptions = {}
): NewsProvider {
  const logger = getLogger("news/news_provider");
  const template = options.feedUrlTemplate ?? DEFAULT_FEED_URL_TEMPLATE;
  const maxSymbols = options.maxSymbols ?? 2;
  const limit = options.limit ?? 20;
  const timeoutMs = options.timeoutMs ?? 8000;
  const fetchFn: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));

  async function fetchFeed(symbol: string): Promise<FeedOutcome> {
    const url = buildFeedUrl(template, symbol);
    try {
      const res = await fetchFn(url, {
        signal: AbortSignal.timeout(timeoutMs),
        headers: {
          Accept: "application/rss+xml,application/atom+xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.9",
        },
      });
      if (!res.ok) {
        logger.warn({ symbol, url, status: res.status }, "feed request failed");
        return { symbol, url, items: undefined };
      }
      return { symbol, url, items: parseFeed(await res.text()) };
    } catch (err) {
      logger.warn({ symbol, url, err }, "feed request errored");
      return { symbol, url, items: undefined };
    }
  }

  return {
    async fetchArticles(symbols) {
      const targets = symbols.slice(0, Math.max(0, maxSymbols));
      if (targets.length === 0) return ok([]);

      const outcomes = await Promise.all(targets.map(fetchFeed));
      if (outcomes.every(o => o.items === undefined)) {
        return fail(`all ${outcomes.length} news feeds failed`);
      }

      const seenUrl = new Set<string>();
      const seenTitle = new Set<string>();
      const articles: RawDocument[] = [];
      let fetched = 0;
      for (const { symbol, url, items } of outcomes) {
        for (const item of items ?? []) {
          fetched++;
          const urlKey = item.url?.trim();
          const titleKey = item.title.trim().toLowerCase();
          if (
            (urlKey && seenUrl.has(urlKey)) ||
            (titleKey && seenTitle.has(titleKey))
          )
            continue;
          if (urlKey) seenUrl.add(urlKey);
          if (titleKey) seenTitle.add(titleKey);
          articles.push({
            title: item.title,
            description: item.description,
            url: item.url,
            publishedAt: item.publishedAt,
            source: hostOf(url),
            symbol,
          });
        }
      }

      const capped = articles.slice(0, Math.max(0, limit));
      logger.debug(
        { feeds: outcomes.length, fetched, kept: capped.length },
        "news articles fetched"
      );
      return ok(capped);
    },
  };
}

function hostOf(url: string): string {
  return url.replace(/^https?:\/\//i, "").split("/")[0] || "RSS";
}
