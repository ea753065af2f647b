/**
 * Closing-price history per symbol, read from the StockData table.
 */
import { getLogger } from "@src/util/logger";
import { errorMessage, fail, ok, type Result } from "@src/util/result";
import { TimeseriesRepository, type PricePoint } from "./db/timeseries_repository";

export type PriceHistory = Record<string, Result<PricePoint[]>>;

export interface PriceHistoryOptions {
  /** Window length ending today (UTC); ignored when from/to are both given. */
  days?: number;
  from?: string; // YYYY-MM-DD
  to?: string; // YYYY-MM-DD
}

export interface MarketDataProvider {
  getPriceHistory(
    symbols: string[],
    options?: PriceHistoryOptions
  ): Promise<PriceHistory>;
}

interface PriceRepository {
  queryBySymbolDateRange(params: {
    code: string;
    fromDate: string;
    toDate: string;
  }): Promise<PricePoint[]>;
}

export interface DynamoMarketDataProviderOptions {
  tableName: string;
  defaultDays?: number;
  repository?: PriceRepository;
}

/**
 * One query per symbol. Results are cached per provider instance by
 * symbol and date range; failures are not cached.
 */
export function createDynamoMarketDataProvider(
  options: DynamoMarketDataProviderOptions
): MarketDataProvider {
  const logger = getLogger("market/market_data_provider");
  const repo =
    options.repository ??
    new TimeseriesRepository({ tableName: options.tableName });
  const cache = new Map<string, PricePoint[]>();

  async function loadSymbol(
    code: string,
    from: string,
    to: string
  ): Promise<Result<PricePoint[]>> {
    const key = `${code}|${from}|${to}`;
    const cached = cache.get(key);
    if (cached) return ok(cached);
    try {
      const points = await repo.queryBySymbolDateRange({
        code,
        fromDate: from,
        toDate: to,
      });
      cache.set(key, points);
      return ok(points);
    } catch (err) {
      logger.error({ symbol: code, err }, "price history query failed");
      return fail(errorMessage(err));
    }
  }

  return {
    async getPriceHistory(symbols, opts = {}) {
      const { from, to } = resolveDateRange(
        opts.from,
        opts.to,
        opts.days ?? options.defaultDays ?? 30
      );
      const entries = await Promise.all(
        symbols.map(
          async symbol => [symbol, await loadSymbol(symbol, from, to)] as const
        )
      );
      logger.debug({ symbols, from, to }, "price history loaded");
      return Object.fromEntries(entries);
    },
  };
}

export function resolveDateRange(
  from?: string,
  to?: string,
  days: number = 30
): { from: string; to: string } {
  if (from && to) return { from, to };
  const end = new Date();
  const start = new Date(end);
  start.setUTCDate(end.getUTCDate() - Math.max(0, days - 1));
  return { from: formatDate(start), to: formatDate(end) };
}

function formatDate(d: Date): string {
  const y = d.getUTCFullYear();
  const m = String(d.getUTCMonth() + 1).padStart(2, "0");
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${y}-${m}-${day}`;
}
