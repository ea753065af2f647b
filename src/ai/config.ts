import { z } from "zod";
import { getString, lookupEnvVar } from "../util/env";

export const AiProviderSchema = z.enum(["openai", "google"]);
export type AiProvider = z.infer<typeof AiProviderSchema>;

const DEFAULT_MODEL: Record<AiProvider, string> = {
  openai: "gpt-4o-mini",
  google: "gemini-2.5-flash",
};

export interface AiConfig {
  provider: AiProvider;
  model: string;
  apiKey: string | undefined;
}

export function loadAiConfig(): AiConfig {
  const provider = AiProviderSchema.parse(getString("MODEL_PROVIDER", "openai"));
  const model = getString("MODEL_NAME", DEFAULT_MODEL[provider]);
  const apiKey =
    provider === "openai"
      ? lookupEnvVar("OPENAI_API_KEY")
      : lookupEnvVar("GOOGLE_GENERATIVE_AI_API_KEY");
  return { provider, model, apiKey };
}
