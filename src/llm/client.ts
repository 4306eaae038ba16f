import type { LanguageModel } from "ai";
import type { AppConfig } from "../config";
import { getModel } from "./providers";

/**
 * A resolved model plus the call settings every summarization request uses.
 */
export type LlmClient = Readonly<{
  model: LanguageModel;
  modelId: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}>;

export function createLlmClient(llm: AppConfig["llm"]): LlmClient {
  return {
    model: getModel(llm),
    modelId: llm.model,
    temperature: llm.temperature,
    maxOutputTokens: llm.maxOutputTokens,
    timeoutMs: llm.timeoutSeconds * 1000,
  };
}
