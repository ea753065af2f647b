import { createAiClient } from "@src/ai/client";
import { createCompanyEarningsProvider } from "@src/market/earnings_provider";
import { createDynamoMarketDataProvider } from "@src/market/market_data_provider";
import { createRssNewsProvider } from "@src/news/news_provider";
import { DynamoTable, getDynamoTableName } from "@src/util/dynamodb";
import { loadBriefingConfig, type BriefingConfig } from "./config";
import type { MarketBriefDependencies } from "./generate_market_brief";
import { createLlmNarrativeGenerator } from "./narrative";

/**
 * Production wiring: DynamoDB for prices and earnings, RSS for news and the
 * configured model for narratives.
 */
export function createMarketBriefDependencies(
  config: BriefingConfig = loadBriefingConfig()
): MarketBriefDependencies {
  return {
    marketData: createDynamoMarketDataProvider({
      tableName: getDynamoTableName(DynamoTable.StockData),
      defaultDays: config.marketDataWindowDays,
    }),
    news: createRssNewsProvider(config.news),
    earnings: createCompanyEarningsProvider({
      tableName: getDynamoTableName(DynamoTable.Company),
    }),
    narrative: createLlmNarrativeGenerator(createAiClient()),
    settings: {
      contextK: config.contextK,
      aum: config.aum,
      marketDataWindowDays: config.marketDataWindowDays,
    },
  };
}
