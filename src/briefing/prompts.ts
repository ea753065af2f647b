import { z } from "zod";
import type { NarrativeInput } from "./types";

export const NarrativeSchema = z.object({
  title: z.string().min(1).describe("Short, factual brief title"),
  content: z
    .string()
    .min(1)
    .describe(
      "Brief body in Markdown: context highlights, portfolio exposure, earnings"
    ),
});

export function buildSystemPrompt(): string {
  return [
    "You are a financial analyst writing a short spoken-style market brief.",
    "Use only the figures present in the provided JSON.",
    'If a price or earnings entry is marked unavailable, say so; never estimate it.',
    "Only output valid JSON that matches the provided schema.",
  ].join("\n");
}

export function buildUserPrompt(input: NarrativeInput): string {
  const earnings = Object.fromEntries(
    Object.entries(input.earnings).map(([symbol, res]) => [
      symbol,
      res.ok ? res.data : { unavailable: res.error },
    ])
  );
  return [
    `Question: ${input.query}`,
    `Symbols: ${input.symbols.join(", ")}`,
    "Relevant news context:",
    JSON.stringify(input.context.map(c => c.text)),
    "Portfolio exposure:",
    JSON.stringify(input.exposure),
    "Earnings:",
    JSON.stringify(earnings),
    "Return JSON only.",
  ].join("\n");
}
