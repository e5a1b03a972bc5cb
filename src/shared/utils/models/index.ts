import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { AppSettings, ModelProvider } from "../../config/settings";
import { claudeBase } from "./anthropic";
import { gptBase } from "./openai";
import { geminiBase } from "./vertexai";

/**
 * Chat model for one provider. The key for that provider must be set.
 */
export function createChatModel(
  provider: ModelProvider,
  llm: AppSettings["llm"],
  options: { model?: string; temperature?: number } = {}
): BaseChatModel {
  switch (provider) {
    case "openai":
      return gptBase({ apiKey: llm.openAIApiKey, ...options });
    case "anthropic":
      return claudeBase({ apiKey: llm.anthropicApiKey, ...options });
    case "vertexai":
      return geminiBase({ credentialsPath: llm.googleCredentials, ...options });
  }
}
