import { END, START, StateGraph } from "@langchain/langgraph";
import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  StageContractError,
  StageError,
  UnknownStateFieldError,
} from "../../src/research/errors";
import { assertStageWrites, defineStage, toGraphNode, toStageError, type StageDefinition } from "../../src/research/stage";
import { ResearchStateAnnotation, createInitialState, type ResearchField } from "../../src/research/states";
import { StageName } from "../../src/research/types";
import { makeServices, makeSettings } from "../_fakes/services";

const REQUEST = { objective: "Floods", context: "", startDate: "2026-02-01", endDate: "2026-02-07" };

function singleStageGraph<R extends ResearchField, W extends ResearchField>(stage: StageDefinition<R, W>) {
  return new StateGraph(ResearchStateAnnotation)
    .addNode(StageName.PLAN, toGraphNode(stage))
    .addEdge(START, StageName.PLAN)
    .addEdge(StageName.PLAN, END)
    .compile();
}

const runtime = { configurable: { research: { services: makeServices(), settings: makeSettings() } } };

describe("assertStageWrites", () => {
  it("accepts the fields a stage owns", () => {
    expect(() => assertStageWrites("plan", new Set(["topics", "planningReasoning"]), { topics: [] })).not.toThrow();
  });

  it("rejects a state field owned by another stage", () => {
    expect(() => assertStageWrites("plan", new Set(["topics"]), { topics: [], digest: null })).toThrow(
      new StageContractError("plan", "digest")
    );
  });

  it("rejects a key that is not a state field", () => {
    expect(() => assertStageWrites("plan", new Set(["topics"]), { bogus: 1 })).toThrow(UnknownStateFieldError);
  });
});

describe("toStageError", () => {
  it("wraps once", () => {
    const inner = toStageError("video_search", new Error("boom"));

    expect(inner.message).toBe('Stage "video_search" failed: boom');
    expect(toStageError("video_branch", inner)).toBe(inner);
  });
});

describe("toGraphNode", () => {
  it("hands the stage a frozen view and merges its update", async () => {
    const stage = defineStage({
      name: StageName.PLAN,
      reads: ["objective"],
      writes: ["topics"],
      async run(view) {
        return { topics: [`${view.objective} frozen=${Object.isFrozen(view)}`] };
      },
    });

    const state = await singleStageGraph(stage).invoke(createInitialState(REQUEST), runtime);

    expect(state.topics).toEqual(["Floods frozen=true"]);
  });

  it("wraps a stage failure with the stage name", async () => {
    const cause = new Error("boom");
    const stage = defineStage({
      name: StageName.PLAN,
      reads: ["objective"],
      writes: ["topics"],
      async run(): Promise<{ topics: string[] }> {
        throw cause;
      },
    });

    const error = await singleStageGraph(stage)
      .invoke(createInitialState(REQUEST), runtime)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StageError);
    expect(error).toMatchObject({ stage: "plan", cause });
  });

  it("needs the runtime in the config", async () => {
    const stage = defineStage({
      name: StageName.PLAN,
      reads: ["objective"],
      writes: ["topics"],
      async run() {
        return { topics: [] };
      },
    });

    await expect(singleStageGraph(stage).invoke(createInitialState(REQUEST))).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});
