import { afterEach, describe, expect, it, vi } from "vitest";
import { ChatAnthropic } from "@langchain/anthropic";
import { ChatOpenAI } from "@langchain/openai";
import { RekaVisionClient, createDefaultServices } from "../../src/clients";
import { ConfigurationError } from "../../src/research/errors";
import { loadSettings } from "../../src/shared/config/settings";
import { createChatModel } from "../../src/shared/utils/models";
import { geminiFields } from "../../src/shared/utils/models/vertexai";
import { parsePeriod } from "../../src/shared/utils/period";

const KEYS = {
  OPENAI_API_KEY: "test-secret",
  TAVILY_API_KEY: "test-secret",
  PIONEER_API_KEY: "test-secret",
  PIONEER_ENRICHER_MODEL_ID: "model-1",
  REKA_API_KEY: "test-secret",
};

describe("loadSettings", () => {
  it("fills in defaults", () => {
    const settings = loadSettings({});

    expect(settings.llm.provider).toBe("openai");
    expect(settings.llm.openAIApiKey).toBeUndefined();
    expect(settings.pipeline).toEqual({
      maxSearchIterations: 2,
      enableVideo: true,
      maxVideos: 5,
      maxVideosPerTopic: 2,
      videoFallbackQueries: ["{objective} video", "{objective} news YouTube"],
      searchIncludeDomains: [],
    });
    expect(settings.reka.indexTimeoutMs).toBe(300_000);
    expect(settings.reka.pollIntervalMs).toBe(10_000);
    expect(settings.runTimeoutMs).toBe(600_000);
    expect(settings.reportsDir).toBe("reports");
  });

  it("parses lists, numbers and flags", () => {
    const settings = loadSettings({
      LLM_PROVIDER: "anthropic",
      ANTHROPIC_API_KEY: "  test-secret  ",
      SEARCH_INCLUDE_DOMAINS: "reuters.com, apnews.com,,",
      ENABLE_VIDEO: "No",
      MAX_VIDEOS: "3",
      MAX_SEARCH_ITERATIONS: "4",
      VIDEO_FALLBACK_QUERIES: "{objective} clip | ",
    });

    expect(settings.llm.provider).toBe("anthropic");
    expect(settings.llm.anthropicApiKey).toBe("test-secret");
    expect(settings.pipeline.searchIncludeDomains).toEqual(["reuters.com", "apnews.com"]);
    expect(settings.pipeline.enableVideo).toBe(false);
    expect(settings.pipeline.maxVideos).toBe(3);
    expect(settings.pipeline.maxSearchIterations).toBe(4);
    expect(settings.pipeline.videoFallbackQueries).toEqual(["{objective} clip"]);
  });

  it("rejects values out of range", () => {
    expect(() => loadSettings({ MAX_SEARCH_ITERATIONS: "0" })).toThrow(ConfigurationError);
    expect(() => loadSettings({ LLM_PROVIDER: "mystery" })).toThrow(/^Invalid environment: LLM_PROVIDER: /);
  });
});

describe("parsePeriod", () => {
  it("accepts the usual separators", () => {
    const expected = { startDate: "2026-02-01", endDate: "2026-02-07" };
    expect(parsePeriod("2026-02-01 to 2026-02-07")).toEqual(expected);
    expect(parsePeriod("2026-02-01 - 2026-02-07")).toEqual(expected);
    expect(parsePeriod("  2026-02-01   2026-02-07 ")).toEqual(expected);
  });

  it("needs two dates", () => {
    expect(parsePeriod("2026-02-01")).toBeNull();
    expect(parsePeriod("")).toBeNull();
  });
});

describe("createChatModel", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("builds the configured provider's model", () => {
    const openai = createChatModel("openai", { provider: "openai", openAIApiKey: "test-secret" }, { model: "gpt-4o-mini" });
    const anthropic = createChatModel("anthropic", { provider: "anthropic", anthropicApiKey: "test-secret" });

    expect(openai).toBeInstanceOf(ChatOpenAI);
    expect(anthropic).toBeInstanceOf(ChatAnthropic);
  });

  it("fails when the provider's key is missing", () => {
    vi.stubEnv("OPENAI_API_KEY", "");
    vi.stubEnv("GOOGLE_APPLICATION_CREDENTIALS", "");

    expect(() => createChatModel("openai", { provider: "openai" })).toThrow(
      "OPENAI_API_KEY environment variable is not set."
    );
    expect(() => createChatModel("vertexai", { provider: "vertexai" })).toThrow(ConfigurationError);
  });
});

describe("geminiFields", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("hands the configured key file to google-auth", () => {
    vi.stubEnv("GOOGLE_APPLICATION_CREDENTIALS", "");

    expect(geminiFields({ credentialsPath: "/keys/test-key.json" })).toMatchObject({
      model: "gemini-2.5-pro",
      authOptions: { keyFilename: "/keys/test-key.json" },
    });
  });

  it("falls back to the environment", () => {
    vi.stubEnv("GOOGLE_APPLICATION_CREDENTIALS", "/keys/env-key.json");

    expect(geminiFields()).toMatchObject({ authOptions: { keyFilename: "/keys/env-key.json" } });
  });
});

describe("createDefaultServices", () => {
  it("adds the video service only when video is enabled", () => {
    expect(createDefaultServices(loadSettings(KEYS)).video).toBeInstanceOf(RekaVisionClient);
    expect(createDefaultServices(loadSettings({ ...KEYS, ENABLE_VIDEO: "false" })).video).toBeUndefined();
  });

  it("names the first missing key", () => {
    const { TAVILY_API_KEY: _omitted, ...rest } = KEYS;

    expect(() => createDefaultServices(loadSettings(rest))).toThrow("TAVILY_API_KEY environment variable is not set.");
  });
});
