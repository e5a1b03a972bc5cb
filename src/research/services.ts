import type { LangGraphRunnableConfig } from "@langchain/langgraph";
import type { z } from "zod";
import { ConfigurationError } from "./errors";
import type { EntityMention } from "./types";

/**
 * RUNTIME SERVICES - external collaborators injected per run
 *
 * None of these live in the graph state. They travel in
 * config.configurable.research, so every run (and every test) supplies its
 * own instances and nothing is shared between concurrent runs.
 */

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Language model returning a schema-conformant object.
 */
export interface StructuredModel {
  generate<T extends Record<string, unknown>>(
    schema: z.ZodType<T>,
    prompt: string,
    options?: CallOptions
  ): Promise<T>;
}

export type SearchDepth = "basic" | "advanced";

export interface NewsSearchOptions extends CallOptions {
  maxResults: number;
  depth: SearchDepth;
  startDate?: string;
  endDate?: string;
  includeDomains?: string[];
}

export interface SearchHit {
  url: string;
  title: string;
  content: string;
  publishedDate: string;
}

export interface ExtractedPage {
  url: string;
  rawContent: string;
}

export interface ExtractionBatch {
  results: ExtractedPage[];
  failedUrls: string[];
}

export interface NewsSearchProvider {
  search(query: string, options: NewsSearchOptions): Promise<SearchHit[]>;
  extract(urls: string[], options?: CallOptions): Promise<ExtractionBatch>;
}

export interface EntityExtractor {
  extract(text: string, labels: readonly string[], options?: CallOptions): Promise<EntityMention[]>;
}

export interface VideoQuestion {
  url: string;
  name: string;
  question: string;
}

/**
 * Indexes a video, answers one question about it and releases it again.
 */
export interface VideoUnderstanding {
  analyze(request: VideoQuestion, options?: CallOptions): Promise<string>;
}

export interface ResearchServices {
  /** Planning and evaluation calls. */
  reasoningModel: StructuredModel;
  /** Final report. */
  writerModel: StructuredModel;
  news: NewsSearchProvider;
  entities: EntityExtractor;
  /** Absent when no video service is configured; the branch then finds nothing. */
  video?: VideoUnderstanding;
}

/**
 * Pipeline policy knobs read by the stages and the router.
 */
export interface PipelineSettings {
  maxSearchIterations: number;
  enableVideo: boolean;
  maxVideos: number;
  maxVideosPerTopic: number;
  /** Queries tried when topic queries find no video. "{objective}" is substituted. */
  videoFallbackQueries: string[];
  /** Allowlist for the topic searches; empty means any domain. */
  searchIncludeDomains: string[];
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  maxSearchIterations: 2,
  enableVideo: true,
  maxVideos: 5,
  maxVideosPerTopic: 2,
  videoFallbackQueries: ["{objective} video", "{objective} news YouTube"],
  searchIncludeDomains: [],
};

export interface ResearchRuntime {
  services: ResearchServices;
  settings: PipelineSettings;
}

function isResearchRuntime(value: unknown): value is ResearchRuntime {
  return (
    typeof value === "object" &&
    value !== null &&
    "services" in value &&
    "settings" in value &&
    typeof value.services === "object" &&
    typeof value.settings === "object"
  );
}

export function getRuntime(config: LangGraphRunnableConfig): ResearchRuntime {
  const runtime: unknown = config.configurable?.research;
  if (!isResearchRuntime(runtime)) {
    throw new ConfigurationError("Research runtime missing from config.configurable.research");
  }
  return runtime;
}
