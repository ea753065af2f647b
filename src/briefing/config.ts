import { z } from "zod";
import { DEFAULT_FEED_URL_TEMPLATE } from "@src/news/news_provider";
import { getNumber, getString } from "@src/util/env";

const BriefingConfigSchema = z.object({
  contextK: z.number().int().positive().max(20),
  aum: z.number().positive(),
  marketDataWindowDays: z.number().int().positive().max(365),
  news: z.object({
    feedUrlTemplate: z
      .string()
      .url()
      .refine(v => v.includes("{symbol}"), "must contain {symbol}"),
    limit: z.number().int().positive().max(50),
    maxSymbols: z.number().int().min(0).max(10),
    timeoutMs: z.number().int().min(500).max(30_000),
  }),
});

export type BriefingConfig = z.infer<typeof BriefingConfigSchema>;

/**
 * Reads the brief pipeline settings from the environment.
 * Throws when a value is malformed or out of range.
 */
export function loadBriefingConfig(): BriefingConfig {
  return BriefingConfigSchema.parse({
    contextK: getNumber("BRIEF_CONTEXT_K", 3),
    aum: getNumber("PORTFOLIO_AUM", 1_000_000),
    marketDataWindowDays: getNumber("MARKET_DATA_WINDOW_DAYS", 30),
    news: {
      feedUrlTemplate: getString(
        "NEWS_FEED_URL_TEMPLATE",
        DEFAULT_FEED_URL_TEMPLATE
      ),
      limit: getNumber("NEWS_LIMIT", 20),
      maxSymbols: getNumber("NEWS_MAX_SYMBOLS", 2),
      timeoutMs: getNumber("NEWS_TIMEOUT_MS", 8000),
    },
  });
}
