/**
 * Market brief workflow:
 * symbols -> prices -> news -> index + retrieve -> exposure -> earnings -> narrative.
 *
 * Collaborators report failures as Result values; each failure is recorded in
 * `errors` and the brief is still produced.
 */
import {
  analyzeExposure,
  buildPortfolioWeights,
  totalExposure,
} from "@src/analysis/exposure";
import type { EarningsProvider } from "@src/market/earnings_provider";
import type {
  MarketDataProvider,
  PriceHistory,
} from "@src/market/market_data_provider";
import { resolveSymbols } from "@src/market/symbols";
import type { NewsProvider } from "@src/news/news_provider";
import {
  createRetrievalContext,
  retrieve,
  type ScoredResult,
} from "@src/retrieval";
import { getLogger } from "@src/util/logger";
import { renderTemplateBrief, type NarrativeGenerator } from "./narrative";
import type { EarningsBySymbol, MarketBrief } from "./types";

export interface MarketBriefRequest {
  query: string;
  /** Comma-separated symbols; overrides the ones found in the query. */
  symbols?: string;
}

export interface MarketBriefSettings {
  contextK: number;
  aum: number;
  marketDataWindowDays: number;
}

export interface MarketBriefDependencies {
  marketData: MarketDataProvider;
  news: NewsProvider;
  earnings: EarningsProvider;
  narrative: NarrativeGenerator;
  settings: MarketBriefSettings;
  now?: () => Date;
}

export interface MarketContext {
  query: string;
  symbols: string[];
  context: ScoredResult[];
  prices: PriceHistory;
  errors: string[];
}

/**
 * Symbols, price history and the news snippets most relevant to the query.
 * A fresh retrieval context is built per call.
 */
export async function retrieveMarketContext(
  request: MarketBriefRequest,
  deps: Pick<MarketBriefDependencies, "marketData" | "news" | "settings">
): Promise<MarketContext> {
  const logger = getLogger("briefing/generate_market_brief");
  const { query } = request;
  const symbols = resolveSymbols(query, request.symbols);
  const errors: string[] = [];

  const [prices, news] = await Promise.all([
    deps.marketData.getPriceHistory(symbols, {
      days: deps.settings.marketDataWindowDays,
    }),
    deps.news.fetchArticles(symbols),
  ]);

  for (const [symbol, res] of Object.entries(prices)) {
    if (!res.ok) errors.push(`market_data ${symbol}: ${res.error}`);
  }
  if (!news.ok) errors.push(`news: ${news.error}`);

  const retrieval = createRetrievalContext(news.ok ? news.data : []);
  const context = retrieve(retrieval, query, deps.settings.contextK);

  logger.debug(
    {
      symbols,
      corpusSize: retrieval.size,
      contextCount: context.length,
      errors,
    },
    "market context prepared"
  );
  return { query, symbols, context, prices, errors };
}

export async function generateMarketBrief(
  request: MarketBriefRequest,
  deps: MarketBriefDependencies
): Promise<MarketBrief> {
  const logger = getLogger("briefing/generate_market_brief");
  const now = deps.now ?? (() => new Date());

  const { query, symbols, context, prices, errors } =
    await retrieveMarketContext(request, deps);

  const positions = analyzeExposure(buildPortfolioWeights(symbols), prices, {
    aum: deps.settings.aum,
  });

  const earningsEntries = await Promise.all(
    symbols.map(
      async symbol => [symbol, await deps.earnings.getEarnings(symbol)] as const
    )
  );
  const earnings: EarningsBySymbol = Object.fromEntries(earningsEntries);
  for (const [symbol, res] of earningsEntries) {
    if (!res.ok) errors.push(`earnings ${symbol}: ${res.error}`);
  }

  const narrativeInput = {
    query,
    symbols,
    context,
    exposure: positions,
    earnings,
  };
  const generated = await deps.narrative.generate(narrativeInput);
  if (!generated.ok) errors.push(`narrative: ${generated.error}`);
  const narrative = generated.ok
    ? { ...generated.data, source: "llm" as const }
    : { ...renderTemplateBrief(narrativeInput), source: "template" as const };

  logger.info(
    {
      symbols,
      contextCount: context.length,
      narrativeSource: narrative.source,
      errorCount: errors.length,
    },
    "market brief generated"
  );

  return {
    query,
    symbols,
    context,
    exposure: { positions, totals: totalExposure(positions) },
    earnings,
    narrative,
    errors,
    generatedAt: now().toISOString(),
  };
}
