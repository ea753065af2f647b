// Lambda handler for the narrative market brief.
//
// Endpoint: GET /brief
// Inputs (query params):
//   - query: string (required) free-text question
//   - symbols: optional comma-separated tickers; otherwise taken from the query
// Env:
//   - see src/briefing/config.ts and src/ai/config.ts
import { createMarketBriefDependencies } from "@src/briefing/dependencies";
import {
  generateMarketBrief,
  type MarketBriefDependencies,
} from "@src/briefing/generate_market_brief";
import { withRequestContext } from "@src/util/logger";
import { json, readBriefParams, type ApiEvent, type LambdaContext } from "./http";

export function createHandler(
  loadDependencies: () => MarketBriefDependencies
) {
  let deps: MarketBriefDependencies | undefined;

  return async (event: ApiEvent, context: LambdaContext = {}) => {
    const logger = withRequestContext("functions/get_market_brief", context);
    try {
      const { query, symbols } = readBriefParams(event);
      if (!query) return json(400, { error: "query is required" });

      deps ??= loadDependencies();
      const brief = await generateMarketBrief({ query, symbols }, deps);
      return json(200, brief);
    } catch (err) {
      logger.error({ err }, "get_market_brief failed");
      return json(500, { error: "Internal server error" });
    }
  };
}

export const handler = createHandler(createMarketBriefDependencies);
