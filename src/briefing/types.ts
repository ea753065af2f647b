/**
 * Domain types for the market brief.
 */
import type { ExposurePosition, ExposureTotals } from "@src/analysis/exposure";
import type { EarningsRecord } from "@src/market/earnings_provider";
import type { ScoredResult } from "@src/retrieval";
import type { Result } from "@src/util/result";

export type EarningsBySymbol = Record<string, Result<EarningsRecord[]>>;

export interface NarrativeInput {
  query: string;
  symbols: string[];
  context: ScoredResult[];
  exposure: ExposurePosition[];
  earnings: EarningsBySymbol;
}

export interface Narrative {
  title: string;
  content: string;
}

export interface MarketBrief {
  query: string;
  symbols: string[];
  context: ScoredResult[];
  exposure: {
    positions: ExposurePosition[];
    totals: ExposureTotals;
  };
  earnings: EarningsBySymbol;
  narrative: Narrative & { source: "llm" | "template" };
  /** One "<step>: <message>" entry per collaborator that failed. */
  errors: string[];
  generatedAt: string;
}
