import { describe, expect, it } from "vitest";
import { UnknownStateFieldError } from "../../src/research/errors";
import {
  FIELD_RULES,
  appendList,
  createInitialState,
  isResearchField,
  mergeAll,
  mergeState,
  replaceAll,
  type ResearchState,
  type ResearchUpdate,
} from "../../src/research/states";
import type { TopicContent, VideoSource } from "../../src/research/types";

const topic = (name: string): TopicContent => ({ topic: name, sources: [] });

const video = (id: string): VideoSource => ({
  url: `https://www.youtube.com/watch?v=${id}`,
  title: id,
  snippet: "",
  source: "youtube",
});

function baseState(): ResearchState {
  return createInitialState({
    objective: "X",
    context: "",
    startDate: "2026-02-01",
    endDate: "2026-02-07",
  });
}

describe("createInitialState", () => {
  it("starts with empty collections and no digest", () => {
    const state = baseState();
    expect(state.rawContent).toEqual([]);
    expect(state.videoSources).toEqual([]);
    expect(state.visualAnalysis).toEqual([]);
    expect(state.searchIterations).toBe(0);
    expect(state.evaluation).toBeNull();
    expect(state.digest).toBeNull();
  });
});

describe("mergeState", () => {
  it("leaves absent fields untouched", () => {
    const state = { ...baseState(), topics: ["a"] };
    const next = mergeState(state, {});
    expect(next).toEqual(state);
  });

  it("replaces overwrite fields", () => {
    const state = { ...baseState(), topics: ["a", "b"] };
    const next = mergeState(state, { topics: ["c"], searchIterations: 2 });
    expect(next.topics).toEqual(["c"]);
    expect(next.searchIterations).toBe(2);
  });

  it("appends accumulate fields after the current entries", () => {
    const state = { ...baseState(), rawContent: [topic("a"), topic("b")] };
    const next = mergeState(state, { rawContent: [topic("c")] });
    expect(next.rawContent.map((entry) => entry.topic)).toEqual(["a", "b", "c"]);
  });

  it("swaps the whole list for a replaceAll update", () => {
    const state = { ...baseState(), rawContent: [topic("a"), topic("b")] };
    const next = mergeState(state, { rawContent: replaceAll([topic("z")]) });
    expect(next.rawContent.map((entry) => entry.topic)).toEqual(["z"]);
  });

  it("does not mutate its arguments", () => {
    const state = { ...baseState(), videoSources: [video("one")] };
    const update: ResearchUpdate = { videoSources: [video("two")] };
    mergeState(state, update);
    expect(state.videoSources).toHaveLength(1);
    expect(update.videoSources).toHaveLength(1);
  });

  it("rejects fields that are not part of the state", () => {
    const update = { topics: ["a"], notes: "free text" };
    expect(() => mergeState(baseState(), update)).toThrow(UnknownStateFieldError);
    expect(() => mergeState(baseState(), update)).toThrow('Unknown research state field "notes"');
  });
});

describe("mergeAll", () => {
  it("applies updates in the order given", () => {
    const state = { ...baseState(), videoSources: [video("old")] };
    const sequential: ResearchUpdate = { rawContent: [topic("a")] };
    const parallel: ResearchUpdate = { videoSources: [video("new")], visualAnalysis: [] };

    const forward = mergeAll(state, [sequential, parallel]);
    const backward = mergeAll(state, [parallel, sequential]);

    // Disjoint fields: the result does not depend on arrival order
    expect(forward).toEqual(backward);
    expect(forward.videoSources.map((v) => v.title)).toEqual(["old", "new"]);
  });

  it("keeps both sides' entries in order when they write the same list", () => {
    const next = mergeAll(baseState(), [{ rawContent: [topic("a"), topic("b")] }, { rawContent: [topic("c")] }]);
    expect(next.rawContent.map((entry) => entry.topic)).toEqual(["a", "b", "c"]);
  });
});

describe("appendList", () => {
  it("is associative", () => {
    const a = [1];
    const b = [2, 3];
    const c = [4];
    expect(appendList(appendList(a, b), c)).toEqual(appendList(a, appendList(b, c)));
  });
});

describe("FIELD_RULES", () => {
  it("marks exactly the three accumulate fields as append", () => {
    const appendFields = Object.entries(FIELD_RULES)
      .filter(([, rule]) => rule === "append")
      .map(([field]) => field);
    expect(appendFields).toEqual(["rawContent", "videoSources", "visualAnalysis"]);
  });

  it("recognises state fields", () => {
    expect(isResearchField("digest")).toBe(true);
    expect(isResearchField("toString")).toBe(false);
  });
});
