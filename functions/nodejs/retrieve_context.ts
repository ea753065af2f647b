// Lambda handler returning the news context and price history behind a brief.
//
// Endpoint: GET /retrieve
// Inputs (query params):
//   - query: string (required)
//   - symbols: optional comma-separated tickers
import { createMarketBriefDependencies } from "@src/briefing/dependencies";
import {
  retrieveMarketContext,
  type MarketBriefDependencies,
} from "@src/briefing/generate_market_brief";
import { withRequestContext } from "@src/util/logger";
import { json, readBriefParams, type ApiEvent, type LambdaContext } from "./http";

type RetrieveDependencies = Pick<
  MarketBriefDependencies,
  "marketData" | "news" | "settings"
>;

export function createHandler(loadDependencies: () => RetrieveDependencies) {
  let deps: RetrieveDependencies | undefined;

  return async (event: ApiEvent, context: LambdaContext = {}) => {
    const logger = withRequestContext("functions/retrieve_context", context);
    try {
      const { query, symbols } = readBriefParams(event);
      if (!query) return json(400, { error: "query is required" });

      deps ??= loadDependencies();
      const result = await retrieveMarketContext({ query, symbols }, deps);
      return json(200, result);
    } catch (err) {
      logger.error({ err }, "retrieve_context failed");
      return json(500, { error: "Internal server error" });
    }
  };
}

export const handler = createHandler(createMarketBriefDependencies);
