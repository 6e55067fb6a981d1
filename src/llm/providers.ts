import { anthropic } from "@ai-sdk/anthropic";
import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { mistral } from "@ai-sdk/mistral";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { AppConfig } from "../config";

const ollama = createOllama({
  baseURL: process.env["OLLAMA_BASE_URL"] ?? "http://localhost:11434/api",
});

const lmstudio = createOpenAICompatible({
  name: "lmstudio",
  baseURL: process.env["LMSTUDIO_BASE_URL"] ?? "http://localhost:1234/v1",
});

export type ProviderName = AppConfig["llm"]["provider"];

export function getModel(provider: ProviderName, modelId: string): LanguageModel {
  switch (provider) {
    case "anthropic":
      return anthropic(modelId);
    case "openai":
      return openai(modelId);
    case "gemini":
      return google(modelId);
    case "mistral":
      return mistral(modelId);
    case "ollama":
      return ollama(modelId);
    case "lmstudio":
      return lmstudio(modelId);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`unknown provider: ${String(_exhaustive)}`);
    }
  }
}

/** Language model selected by the `llm` config section. */
export function createLlmClient(config: Pick<AppConfig, "llm">): LanguageModel {
  return getModel(config.llm.provider, config.llm.model);
}
