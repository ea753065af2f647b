/**
 * Portfolio exposure for the symbols of a brief.
 *
 * A position whose price cannot be determined carries an explicit
 * "unavailable" quote; no placeholder price is ever substituted.
 */
import type { PricePoint } from "@src/market/db/timeseries_repository";
import type { PriceHistory } from "@src/market/market_data_provider";
import { getLogger } from "@src/util/logger";

export const DEFAULT_AUM = 1_000_000;

export type PriceQuote =
  | { status: "available"; price: number; asOfDate: string }
  | { status: "unavailable"; reason: string };

export interface ExposurePosition {
  symbol: string;
  weight: number;
  value: number;
  quote: PriceQuote;
}

export interface ExposureTotals {
  weight: number;
  value: number;
  pricedPositions: number;
}

/**
 * Weights start at 15% and step down 2% per symbol, floored at 5%.
 */
export function buildPortfolioWeights(symbols: string[]): Map<string, number> {
  const weights = new Map<string, number>();
  symbols.forEach((symbol, i) => {
    const weight = Math.max(0.05, 0.15 - i * 0.02);
    weights.set(symbol, Math.round(weight * 10_000) / 10_000);
  });
  return weights;
}

export function latestQuote(
  points: PricePoint[] | undefined
): PriceQuote {
  if (!points || points.length === 0) {
    return { status: "unavailable", reason: "no price history" };
  }
  // Oldest first; walk back to the newest point that has a close
  for (let i = points.length - 1; i >= 0; i--) {
    const point = points[i];
    if (point && point.close !== undefined) {
      return { status: "available", price: point.close, asOfDate: point.date };
    }
  }
  return { status: "unavailable", reason: "no closing price" };
}

export function analyzeExposure(
  weights: Map<string, number>,
  history: PriceHistory,
  options: { aum?: number } = {}
): ExposurePosition[] {
  const logger = getLogger("analysis/exposure");
  const aum = options.aum ?? DEFAULT_AUM;

  const positions: ExposurePosition[] = [];
  for (const [symbol, weight] of weights) {
    const series = history[symbol];
    const quote: PriceQuote = !series
      ? { status: "unavailable", reason: "symbol not in market data" }
      : series.ok
        ? latestQuote(series.data)
        : { status: "unavailable", reason: series.error };
    if (quote.status === "unavailable") {
      logger.warn({ symbol, reason: quote.reason }, "price unavailable");
    }
    positions.push({ symbol, weight, value: roundTo(weight * aum, 2), quote });
  }

  logger.debug(
    { positions: positions.length, aum },
    "exposure analysis complete"
  );
  return positions;
}

export function totalExposure(positions: ExposurePosition[]): ExposureTotals {
  return positions.reduce<ExposureTotals>(
    (acc, p) => ({
      weight: roundTo(acc.weight + p.weight, 4),
      value: roundTo(acc.value + p.value, 2),
      pricedPositions:
        acc.pricedPositions + (p.quote.status === "available" ? 1 : 0),
    }),
    { weight: 0, value: 0, pricedPositions: 0 }
  );
}

function roundTo(value: number, precision: number): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}
