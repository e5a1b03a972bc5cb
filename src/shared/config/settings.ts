import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../../research/errors";
import type { PipelineSettings } from "../../research/services";

dotenv.config();

const csv = (separator: string) =>
  z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(separator)
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value ? ["true", "1", "yes"].includes(value.trim().toLowerCase()) : fallback));

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

/**
 * Environment schema. Everything has a default except the API keys, which
 * are checked when the service that needs them is created.
 */
export const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(["openai", "anthropic", "vertexai"]).default("openai"),
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  GOOGLE_APPLICATION_CREDENTIALS: optionalString,
  REASONING_MODEL: optionalString,
  WRITER_MODEL: optionalString,

  TAVILY_API_KEY: optionalString,
  SEARCH_INCLUDE_DOMAINS: csv(","),

  PIONEER_API_KEY: optionalString,
  PIONEER_API_URL: optionalString,
  PIONEER_ENRICHER_MODEL_ID: optionalString,

  REKA_API_KEY: optionalString,
  REKA_BASE_URL: optionalString,
  ENABLE_VIDEO: flag(true),
  MAX_VIDEOS: z.coerce.number().int().positive().default(5),
  MAX_VIDEOS_PER_TOPIC: z.coerce.number().int().positive().default(2),
  VIDEO_FALLBACK_QUERIES: z
    .string()
    .default("{objective} video|{objective} news YouTube")
    .transform((value) =>
      value
        .split("|")
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    ),
  VIDEO_INDEX_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  VIDEO_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),

  MAX_SEARCH_ITERATIONS: z.coerce.number().int().min(1).max(10).default(2),
  RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  REPORTS_DIR: z.string().default("reports"),
});

export type ModelProvider = z.infer<typeof EnvSchema>["LLM_PROVIDER"];

export interface AppSettings {
  llm: {
    provider: ModelProvider;
    reasoningModel?: string;
    writerModel?: string;
    openAIApiKey?: string;
    anthropicApiKey?: string;
    googleCredentials?: string;
  };
  tavilyApiKey?: string;
  pioneer: { apiKey?: string; apiUrl?: string; modelId?: string };
  reka: { apiKey?: string; baseUrl?: string; indexTimeoutMs: number; pollIntervalMs: number };
  pipeline: PipelineSettings;
  runTimeoutMs: number;
  reportsDir: string;
}

/**
 * Read settings from an environment map (process.env by default).
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  const e = parsed.data;

  return {
    llm: {
      provider: e.LLM_PROVIDER,
      reasoningModel: e.REASONING_MODEL,
      writerModel: e.WRITER_MODEL,
      openAIApiKey: e.OPENAI_API_KEY,
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      googleCredentials: e.GOOGLE_APPLICATION_CREDENTIALS,
    },
    tavilyApiKey: e.TAVILY_API_KEY,
    pioneer: { apiKey: e.PIONEER_API_KEY, apiUrl: e.PIONEER_API_URL, modelId: e.PIONEER_ENRICHER_MODEL_ID },
    reka: {
      apiKey: e.REKA_API_KEY,
      baseUrl: e.REKA_BASE_URL,
      indexTimeoutMs: e.VIDEO_INDEX_TIMEOUT_MS,
      pollIntervalMs: e.VIDEO_POLL_INTERVAL_MS,
    },
    pipeline: {
      maxSearchIterations: e.MAX_SEARCH_ITERATIONS,
      enableVideo: e.ENABLE_VIDEO,
      maxVideos: e.MAX_VIDEOS,
      maxVideosPerTopic: e.MAX_VIDEOS_PER_TOPIC,
      videoFallbackQueries: e.VIDEO_FALLBACK_QUERIES,
      searchIncludeDomains: e.SEARCH_INCLUDE_DOMAINS,
    },
    runTimeoutMs: e.RUN_TIMEOUT_MS,
    reportsDir: e.REPORTS_DIR,
  };
}
