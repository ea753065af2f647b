import type { AiClient } from "@src/ai/client";
import { companyNameFor } from "@src/market/symbols";
import { getLogger } from "@src/util/logger";
import { errorMessage, fail, ok, type Result } from "@src/util/result";
import { buildSystemPrompt, buildUserPrompt, NarrativeSchema } from "./prompts";
import type { Narrative, NarrativeInput } from "./types";

export interface NarrativeGenerator {
  generate(input: NarrativeInput): Promise<Result<Narrative>>;
}

export function createLlmNarrativeGenerator(ai: AiClient): NarrativeGenerator {
  const logger = getLogger("briefing/narrative");
  return {
    async generate(input) {
      const startedAt = Date.now();
      try {
        const narrative = await ai.generateJson({
          system: buildSystemPrompt(),
          prompt: buildUserPrompt(input),
          schema: NarrativeSchema,
        });
        logger.info(
          { elapsedMs: Date.now() - startedAt },
          "narrative generated"
        );
        return ok(narrative);
      } catch (err) {
        logger.error({ err }, "narrative generation failed");
        return fail(errorMessage(err));
      }
    },
  };
}

/**
 * Deterministic brief used when no model output is available. Missing
 * prices and earnings are spelled out as unavailable.
 */
export function renderTemplateBrief(input: NarrativeInput): Narrative {
  const label = (symbol: string) => `${companyNameFor(symbol)} (${symbol})`;
  const lines: string[] = [
    `Analysis of ${input.symbols.map(label).join(", ")}.`,
    "",
    "Portfolio Exposure:",
  ];

  for (const p of input.exposure) {
    const price =
      p.quote.status === "available"
        ? `last close $${p.quote.price.toFixed(2)} on ${p.quote.asOfDate}`
        : "price unavailable";
    lines.push(
      `- ${label(p.symbol)}: ${(p.weight * 100).toFixed(1)}% ($${formatThousands(p.value)}), ${price}`
    );
  }

  lines.push("", "Context:");
  if (input.context.length === 0) {
    lines.push("- No relevant news found.");
  } else {
    for (const c of input.context) lines.push(`- ${c.text}`);
  }

  lines.push("", "Earnings:");
  for (const symbol of input.symbols) {
    const res = input.earnings[symbol];
    const latest = res?.ok ? res.data[res.data.length - 1] : undefined;
    lines.push(
      latest
        ? `- ${label(symbol)}: ${latest.earnings} for ${latest.period}`
        : `- ${label(symbol)}: earnings unavailable`
    );
  }

  return { title: `Market Brief: ${input.query}`, content: lines.join("\n") };
}

function formatThousands(value: number): string {
  return Math.round(value)
    .toString()
    .replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}
