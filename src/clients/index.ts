import { ConfigurationError } from "../research/errors";
import type { ResearchServices } from "../research/services";
import type { AppSettings } from "../shared/config/settings";
import { createChatModel } from "../shared/utils/models";
import { ChatStructuredModel } from "./chat-structured-model";
import { PioneerEntityClient } from "./pioneer-entities";
import { RekaVisionClient } from "./reka-vision";
import { createTavilyNewsProvider } from "./tavily-news";

export { ChatStructuredModel } from "./chat-structured-model";
export { PioneerEntityClient, flattenEntities } from "./pioneer-entities";
export { RekaVisionClient } from "./reka-vision";
export { TavilyNewsProvider, createTavilyNewsProvider } from "./tavily-news";

function required(value: string | undefined, name: string): string {
  if (!value) throw new ConfigurationError(`${name} environment variable is not set.`);
  return value;
}

/**
 * Build the production collaborators from settings. The video service is
 * left out when video is disabled.
 */
export function createDefaultServices(settings: AppSettings): ResearchServices {
  const { llm } = settings;

  const services: ResearchServices = {
    reasoningModel: new ChatStructuredModel(createChatModel(llm.provider, llm, { model: llm.reasoningModel })),
    writerModel: new ChatStructuredModel(createChatModel(llm.provider, llm, { model: llm.writerModel })),
    news: createTavilyNewsProvider(required(settings.tavilyApiKey, "TAVILY_API_KEY")),
    entities: new PioneerEntityClient({
      apiKey: required(settings.pioneer.apiKey, "PIONEER_API_KEY"),
      modelId: required(settings.pioneer.modelId, "PIONEER_ENRICHER_MODEL_ID"),
      apiUrl: settings.pioneer.apiUrl,
    }),
  };

  if (settings.pipeline.enableVideo) {
    services.video = new RekaVisionClient({
      apiKey: required(settings.reka.apiKey, "REKA_API_KEY"),
      baseUrl: settings.reka.baseUrl,
      indexTimeoutMs: settings.reka.indexTimeoutMs,
      pollIntervalMs: settings.reka.pollIntervalMs,
    });
  }
  return services;
}
