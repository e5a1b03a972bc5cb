import { describe, expect, it } from "vitest";
import {
  InvalidRequestError,
  ResearchAbortedError,
  ResearchTimeoutError,
  StageError,
} from "../../src/research/errors";
import { ResearchProgressHandler, type ProgressEvent } from "../../src/research/progress-handler";
import { runResearch } from "../../src/research/run";
import type { NewsSearchOptions, SearchHit } from "../../src/research/services";
import type { NewsDigest } from "../../src/research/types";
import { abortable } from "../../src/shared/utils/abort";
import {
  FakeEntityExtractor,
  FakeNewsProvider,
  FakeVideoService,
  ScriptedModel,
  hit,
  makeServices,
} from "../_fakes/services";

const REQUEST = { objective: "Floods", startDate: "2026-02-01", endDate: "2026-02-07" };

const DIGEST: NewsDigest = {
  sections: [{ title: "Rivers rise", article: "Three towns flooded.", sources: ["https://news.test/a"], visualInsights: [] }],
};

function field(data: unknown, key: string): unknown {
  return typeof data === "object" && data !== null ? Reflect.get(data, key) : undefined;
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Search stand-in: a news page per topic, a YouTube clip per video query. */
function newsAndClips(query: string): SearchHit[] {
  const [subject] = query.split(" ");
  if (query.endsWith("video YouTube")) return [hit(`https://youtu.be/${subject}`, `Clip ${subject}`)];
  return [hit(`https://news.test/${subject}`, `Story ${subject}`)];
}

function twoPassScenario(delays: { entities?: number; video?: number } = {}) {
  const reasoningModel = new ScriptedModel([
    { topics: [" a ", "b"], reasoning: "two angles" },
    { isSufficient: false, missingTopics: ["c"], reasoning: "thin" },
    { isSufficient: false, missingTopics: ["d"], reasoning: "still thin" },
  ]);
  const writerModel = new ScriptedModel([DIGEST]);
  const news = new FakeNewsProvider(newsAndClips);
  const entities = new FakeEntityExtractor(async () => {
    if (delays.entities) await wait(delays.entities);
    return [{ label: "ORGANIZATION", text: "Acme" }];
  });
  const video = new FakeVideoService(async (request) => {
    if (delays.video) await wait(delays.video);
    return `Analysis of ${request.url}`;
  });

  return { reasoningModel, writerModel, news, entities, video, services: { reasoningModel, writerModel, news, entities, video } };
}

describe("runResearch", () => {
  it("loops once on an insufficient verdict, then finalizes at the bound", async () => {
    const scenario = twoPassScenario();

    const { digest, state } = await runResearch(REQUEST, { services: scenario.services });

    expect(digest).toEqual(DIGEST);
    expect(state.searchIterations).toBe(2);
    expect(state.topics).toEqual(["c"]);
    expect(state.rawContent.map((entry) => entry.topic)).toEqual(["a", "b", "c"]);
    expect(state.rawContent[2].sources).toEqual([
      {
        url: "https://news.test/c",
        title: "Story c",
        content: "Full text of https://news.test/c",
        publishedDate: "",
        entities: { ORGANIZATION: ["Acme"] },
      },
    ]);
    expect(state.evaluation).toEqual({ isSufficient: true, missingTopics: ["d"], reasoning: "still thin" });

    expect(state.videoSources.map((video) => video.url)).toEqual([
      "https://www.youtube.com/watch?v=a",
      "https://www.youtube.com/watch?v=b",
      "https://www.youtube.com/watch?v=c",
    ]);
    expect(state.visualAnalysis.map((insight) => insight.analysis)).toEqual([
      "Analysis of https://www.youtube.com/watch?v=a",
      "Analysis of https://www.youtube.com/watch?v=b",
      "Analysis of https://www.youtube.com/watch?v=c",
    ]);

    expect(scenario.reasoningModel.remaining).toBe(0);
    expect(scenario.writerModel.prompts).toHaveLength(1);
    expect(scenario.news.searches.map((call) => call.query)).toEqual([
      "Floods news 2026-02-01 to 2026-02-07",
      "a news 2026-02-01 2026-02-07",
      "b news 2026-02-01 2026-02-07",
      "a video YouTube",
      "b video YouTube",
      "c news 2026-02-01 2026-02-07",
      "c video YouTube",
    ]);
  });

  it("stops after one pass on a sufficient verdict", async () => {
    const reasoningModel = new ScriptedModel([
      { topics: ["a"], reasoning: "one angle" },
      { isSufficient: true, missingTopics: [], reasoning: "enough" },
    ]);
    const writerModel = new ScriptedModel([DIGEST]);

    const { state } = await runResearch(REQUEST, {
      services: makeServices({ reasoningModel, writerModel, news: new FakeNewsProvider(newsAndClips) }),
    });

    expect(state.searchIterations).toBe(1);
    expect(state.videoSources).toEqual([]);
    expect(state.digest).toEqual(DIGEST);
  });

  it("merges the same state whichever parallel branch finishes first", async () => {
    const slowEntities = twoPassScenario({ entities: 30 });
    const slowVideo = twoPassScenario({ video: 30 });

    const first = await runResearch(REQUEST, { services: slowEntities.services });
    const second = await runResearch(REQUEST, { services: slowVideo.services });

    // every pass sends all sources to enrich: 2 in the first, 3 in the second
    expect(slowEntities.entities.texts).toHaveLength(5);
    expect(slowVideo.video.requests).toHaveLength(3);
    expect(first.state.rawContent[0].sources[0].entities).toEqual({ ORGANIZATION: ["Acme"] });
    expect(second.state.rawContent).toEqual(first.state.rawContent);
    expect(second.state.videoSources).toEqual(first.state.videoSources);
    expect(second.state.visualAnalysis).toEqual(first.state.visualAnalysis);
  });

  it("reports stage progress and routing decisions", async () => {
    const events: ProgressEvent[] = [];
    const handler = new ResearchProgressHandler({ print: false, onEvent: (event) => events.push(event) });

    await runResearch(REQUEST, { services: twoPassScenario().services, callbacks: [handler] });

    const started = events
      .filter((event) => event.eventName === "stage_started")
      .map((event) => field(event.data, "stage"));
    const decisions = events
      .filter((event) => event.eventName === "route_decided")
      .map((event) => field(event.data, "decision"));

    expect(started.slice(0, 2)).toEqual(["explore", "plan"]);
    expect(started.filter((stage) => stage === "evaluate")).toHaveLength(2);
    expect(started.filter((stage) => stage === "video_search")).toHaveLength(2);
    expect(started.at(-1)).toBe("finalize");
    expect(decisions).toEqual(["continue", "finalize"]);
  });

  it("names the stage that failed", async () => {
    const reasoningModel = new ScriptedModel([new Error("model down")]);

    const error = await runResearch(REQUEST, { services: makeServices({ reasoningModel }) }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageError);
    expect(error).toMatchObject({ stage: "plan", code: "stage_failed", message: 'Stage "plan" failed: model down' });
  });

  it("rejects an invalid request before calling anything", async () => {
    const news = new FakeNewsProvider();

    const error = await runResearch(
      { objective: "  ", startDate: "2026-02-07", endDate: "2026-02-01" },
      { services: makeServices({ news }) }
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidRequestError);
    expect(error).toMatchObject({
      code: "invalid_request",
      issues: expect.arrayContaining(["objective: objective is required"]),
    });
    expect(news.searches).toEqual([]);
  });

  it("rejects a date that is not on the calendar", async () => {
    const news = new FakeNewsProvider();

    const error = await runResearch(
      { objective: "EV market", startDate: "2026-02-30", endDate: "2026-03-05" },
      { services: makeServices({ news }) }
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidRequestError);
    expect(error).toMatchObject({ issues: ["startDate: expected a real calendar date"] });
    expect(news.searches).toEqual([]);
  });

  it("times out a run that does not finish in its budget", async () => {
    const news = new FakeNewsProvider((_query: string, options: NewsSearchOptions) =>
      abortable(new Promise<SearchHit[]>(() => undefined), options.signal)
    );

    const error = await runResearch(REQUEST, { services: makeServices({ news }), timeoutMs: 50 }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ResearchTimeoutError);
    expect(error).toMatchObject({ code: "timeout", timeoutMs: 50 });
  });

  it("reports a caller cancellation as aborted", async () => {
    const controller = new AbortController();
    const news = new FakeNewsProvider((_query: string, options: NewsSearchOptions) => {
      controller.abort();
      return abortable(new Promise<SearchHit[]>(() => undefined), options.signal);
    });

    const error = await runResearch(REQUEST, { services: makeServices({ news }), signal: controller.signal }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ResearchAbortedError);
    expect(error).toMatchObject({ code: "aborted" });
  });

  it("skips the video branch when video is disabled", async () => {
    const scenario = twoPassScenario();

    const { state } = await runResearch(REQUEST, {
      services: scenario.services,
      settings: { enableVideo: false },
    });

    expect(state.videoSources).toEqual([]);
    expect(state.visualAnalysis).toEqual([]);
    expect(scenario.video.requests).toEqual([]);
  });
});
