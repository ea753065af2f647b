import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import { generateObject, type LanguageModel } from "ai";
import { z } from "zod";
import { loadAiConfig, type AiConfig } from "./config";

export interface GenerateJsonParams<TSchema extends z.ZodTypeAny> {
  system: string;
  prompt: string;
  schema: TSchema;
}

export interface AiClient {
  generateJson<TSchema extends z.ZodTypeAny>(
    params: GenerateJsonParams<TSchema>
  ): Promise<z.infer<TSchema>>;
}

function resolveModel(cfg: AiConfig): LanguageModel {
  switch (cfg.provider) {
    case "openai":
      return createOpenAI({ apiKey: cfg.apiKey })(cfg.model);
    case "google":
      return createGoogleGenerativeAI({ apiKey: cfg.apiKey })(cfg.model);
  }
}

export function createAiClient(cfg: AiConfig = loadAiConfig()): AiClient {
  const model = resolveModel(cfg);
  return {
    async generateJson({ system, prompt, schema }) {
      const { object } = await generateObject({ model, system, prompt, schema });
      // Re-validate: the SDK result is typed loosely for generic schemas
      return schema.parse(object);
    },
  };
}
