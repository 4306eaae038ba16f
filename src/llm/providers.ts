import { anthropic, createAnthropic } from "@ai-sdk/anthropic";
import { openai, createOpenAI } from "@ai-sdk/openai";
import { google, createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { AppConfig } from "../config";

export type ProviderName = AppConfig["llm"]["provider"];

export type ModelSelection = Pick<AppConfig["llm"], "provider" | "model" | "baseUrl">;

const OLLAMA_DEFAULT_URL = "http://localhost:11434/api";
const LMSTUDIO_DEFAULT_URL = "http://localhost:1234/v1";

/**
 * Resolves the model that writes channel summaries. Hosted providers read
 * their API key from their own environment variable; `baseUrl` points any
 * provider at a proxy or a self-hosted endpoint.
 */
export function getModel({ provider, model, baseUrl }: ModelSelection): LanguageModel {
  switch (provider) {
    case "anthropic":
      return baseUrl ? createAnthropic({ baseURL: baseUrl })(model) : anthropic(model);
    case "openai":
      return baseUrl ? createOpenAI({ baseURL: baseUrl })(model) : openai(model);
    case "gemini":
      return baseUrl ? createGoogleGenerativeAI({ baseURL: baseUrl })(model) : google(model);
    case "ollama":
      return createOllama({
        baseURL: baseUrl ?? process.env["OLLAMA_BASE_URL"] ?? OLLAMA_DEFAULT_URL,
      })(model);
    case "lmstudio":
      return createOpenAICompatible({
        name: "lmstudio",
        baseURL: baseUrl ?? process.env["LMSTUDIO_BASE_URL"] ?? LMSTUDIO_DEFAULT_URL,
      })(model);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`unsupported summarization provider: ${String(_exhaustive)}`);
    }
  }
}
