import { dispatchCustomEvent } from "@langchain/core/callbacks/dispatch";
import type { LangGraphRunnableConfig } from "@langchain/langgraph";
import { StageContractError, StageError, UnknownStateFieldError, describeError } from "./errors";
import { getRuntime, type PipelineSettings, type ResearchServices } from "./services";
import { isResearchField, type ResearchField, type ResearchState, type ResearchUpdate } from "./states";
import type { StageName } from "./types";

/**
 * Stage plumbing
 *
 * A stage only sees the fields it reads (a frozen view) and may only return
 * the fields it writes. It never picks the next node; the graph does that.
 */

export type StageView<R extends ResearchField> = Readonly<Pick<ResearchState, R>>;

export interface StageContext {
  services: ResearchServices;
  settings: PipelineSettings;
  signal?: AbortSignal;
}

export interface StageDefinition<R extends ResearchField, W extends ResearchField> {
  name: StageName;
  reads: readonly R[];
  writes: readonly W[];
  run(view: StageView<R>, context: StageContext): Promise<Pick<ResearchUpdate, W>>;
}

export function defineStage<R extends ResearchField, W extends ResearchField>(
  definition: StageDefinition<R, W>
): StageDefinition<R, W> {
  return definition;
}

export enum ProgressEventType {
  STAGE_STARTED = "stage_started",
  STAGE_COMPLETED = "stage_completed",
  STAGE_FAILED = "stage_failed",
  ROUTE_DECIDED = "route_decided",
}

/**
 * Reject keys that are not state fields, then keys this stage does not own.
 */
export function assertStageWrites(stage: string, writes: ReadonlySet<string>, update: object): void {
  for (const key of Object.keys(update)) {
    if (!isResearchField(key)) {
      throw new UnknownStateFieldError(key);
    }
    if (!writes.has(key)) {
      throw new StageContractError(stage, key);
    }
  }
}

export function toStageError(stage: string, error: unknown): StageError {
  return error instanceof StageError ? error : new StageError(stage, error);
}

/**
 * Turn a stage definition into a LangGraph node.
 *
 * The node pulls services from config.configurable, hands the stage the
 * run's AbortSignal, checks the returned keys and reports progress through
 * custom events.
 */
export function toGraphNode<R extends ResearchField, W extends ResearchField>(stage: StageDefinition<R, W>) {
  const allowedWrites: ReadonlySet<string> = new Set<string>(stage.writes);

  return async (
    state: Pick<ResearchState, R>,
    config: LangGraphRunnableConfig
  ): Promise<Pick<ResearchUpdate, W>> => {
    const startedAt = Date.now();
    const { services, settings } = getRuntime(config);

    await dispatchCustomEvent(
      ProgressEventType.STAGE_STARTED,
      { stage: stage.name, reads: [...stage.reads] },
      config
    );

    try {
      const view: StageView<R> = Object.freeze({ ...state });
      const update = await stage.run(view, { services, settings, signal: config.signal });
      assertStageWrites(stage.name, allowedWrites, update);

      await dispatchCustomEvent(
        ProgressEventType.STAGE_COMPLETED,
        { stage: stage.name, fields: Object.keys(update), durationMs: Date.now() - startedAt },
        config
      );
      return update;
    } catch (error) {
      await dispatchCustomEvent(
        ProgressEventType.STAGE_FAILED,
        { stage: stage.name, error: describeError(error), durationMs: Date.now() - startedAt },
        config
      );
      throw toStageError(stage.name, error);
    }
  };
}
