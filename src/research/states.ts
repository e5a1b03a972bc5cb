import { Annotation } from "@langchain/langgraph";
import { UnknownStateFieldError } from "./errors";
import type {
  Evaluation,
  ExplorationResult,
  NewsDigest,
  ResearchRequest,
  TopicContent,
  VideoSource,
  VisualInsight,
} from "./types";

/**
 * State Management for the Research Graph
 *
 * Every field has one merge rule. "replace" fields are overwritten by the
 * update's value; "append" fields concatenate the update after the current
 * list, keeping both sides in their original order. An append field can still
 * be overwritten wholesale when the update is wrapped in replaceAll().
 *
 * The LangGraph channel reducers below and mergeState() implement the same
 * rules, so what the graph does after a node is exactly what mergeState does.
 */

export type MergeRule = "replace" | "append";

export interface ReplaceAll<T> {
  kind: "replace_all";
  items: T[];
}

/**
 * Update value accepted by an append field: a plain list is appended,
 * replaceAll(list) swaps the whole list.
 */
export type ListUpdate<T> = T[] | ReplaceAll<T>;

export function replaceAll<T>(items: T[]): ReplaceAll<T> {
  return { kind: "replace_all", items };
}

function overwrite<T>(_current: T, update: T): T {
  return update;
}

export function appendList<T>(current: T[], update: ListUpdate<T>): T[] {
  if ("kind" in update) {
    return [...update.items];
  }
  return [...current, ...update];
}

/**
 * Research State - the single record threaded through every stage
 */
export const ResearchStateAnnotation = Annotation.Root({
  // === RUN INPUT ===
  // Set once by createInitialState and never written by a stage

  objective: Annotation<string>({ reducer: overwrite, default: () => "" }),
  context: Annotation<string>({ reducer: overwrite, default: () => "" }),
  startDate: Annotation<string>({ reducer: overwrite, default: () => "" }),
  endDate: Annotation<string>({ reducer: overwrite, default: () => "" }),

  // === EXPLORATION & PLANNING ===

  explorationResults: Annotation<ExplorationResult[]>({ reducer: overwrite, default: () => [] }),
  topics: Annotation<string[]>({ reducer: overwrite, default: () => [] }),
  planningReasoning: Annotation<string>({ reducer: overwrite, default: () => "" }),

  // === COLLECTED CONTENT ===
  // Grows with every search pass; extract and enrich rewrite it with replaceAll

  rawContent: Annotation<TopicContent[], ListUpdate<TopicContent>>({
    reducer: appendList,
    default: () => [],
  }),

  // === EVALUATION LOOP ===

  evaluation: Annotation<Evaluation | null>({ reducer: overwrite, default: () => null }),
  searchIterations: Annotation<number>({ reducer: overwrite, default: () => 0 }),

  // === VIDEO BRANCH ===
  // Written by the branch that runs next to enrich

  videoSources: Annotation<VideoSource[], ListUpdate<VideoSource>>({
    reducer: appendList,
    default: () => [],
  }),
  visualAnalysis: Annotation<VisualInsight[], ListUpdate<VisualInsight>>({
    reducer: appendList,
    default: () => [],
  }),

  // === OUTPUT ===

  digest: Annotation<NewsDigest | null>({ reducer: overwrite, default: () => null }),
});

export type ResearchState = typeof ResearchStateAnnotation.State;
export type ResearchUpdate = typeof ResearchStateAnnotation.Update;
export type ResearchField = keyof ResearchState;

export const FIELD_RULES = {
  objective: "replace",
  context: "replace",
  startDate: "replace",
  endDate: "replace",
  explorationResults: "replace",
  topics: "replace",
  planningReasoning: "replace",
  rawContent: "append",
  evaluation: "replace",
  searchIterations: "replace",
  videoSources: "append",
  visualAnalysis: "append",
  digest: "replace",
} as const satisfies Record<ResearchField, MergeRule>;

export function isResearchField(key: string): key is ResearchField {
  return Object.prototype.hasOwnProperty.call(FIELD_RULES, key);
}

export function assertKnownFields(update: object): void {
  for (const key of Object.keys(update)) {
    if (!isResearchField(key)) {
      throw new UnknownStateFieldError(key);
    }
  }
}

export function createInitialState(request: ResearchRequest): ResearchState {
  return {
    objective: request.objective,
    context: request.context,
    startDate: request.startDate,
    endDate: request.endDate,
    explorationResults: [],
    topics: [],
    planningReasoning: "",
    rawContent: [],
    evaluation: null,
    searchIterations: 0,
    videoSources: [],
    visualAnalysis: [],
    digest: null,
  };
}

function pick<T>(update: T | undefined, current: T): T {
  return update === undefined ? current : update;
}

function pickList<T>(update: ListUpdate<T> | undefined, current: T[]): T[] {
  return update === undefined ? current : appendList(current, update);
}

/**
 * Apply a partial update to a state snapshot and return the next snapshot.
 *
 * Absent keys leave the field untouched. Neither argument is mutated.
 */
export function mergeState(current: ResearchState, update: ResearchUpdate): ResearchState {
  assertKnownFields(update);

  return {
    objective: pick(update.objective, current.objective),
    context: pick(update.context, current.context),
    startDate: pick(update.startDate, current.startDate),
    endDate: pick(update.endDate, current.endDate),
    explorationResults: pick(update.explorationResults, current.explorationResults),
    topics: pick(update.topics, current.topics),
    planningReasoning: pick(update.planningReasoning, current.planningReasoning),
    rawContent: pickList(update.rawContent, current.rawContent),
    evaluation: pick(update.evaluation, current.evaluation),
    searchIterations: pick(update.searchIterations, current.searchIterations),
    videoSources: pickList(update.videoSources, current.videoSources),
    visualAnalysis: pickList(update.visualAnalysis, current.visualAnalysis),
    digest: pick(update.digest, current.digest),
  };
}

/**
 * Fold several updates onto a snapshot in the order given.
 *
 * Used where two independent branches join: the sequential branch's update is
 * passed first, so its list entries precede the parallel branch's.
 */
export function mergeAll(current: ResearchState, updates: ResearchUpdate[]): ResearchState {
  return updates.reduce(mergeState, current);
}

/**
 * Video Branch State - private state of the video sub-graph
 *
 * The branch starts from a fresh copy of objective and topics each pass, so
 * its lists only ever hold what this pass found. The parent appends them.
 */
export const VideoBranchState = Annotation.Root({
  objective: Annotation<string>({ reducer: overwrite, default: () => "" }),
  topics: Annotation<string[]>({ reducer: overwrite, default: () => [] }),
  videoSources: Annotation<VideoSource[], ListUpdate<VideoSource>>({
    reducer: appendList,
    default: () => [],
  }),
  visualAnalysis: Annotation<VisualInsight[], ListUpdate<VisualInsight>>({
    reducer: appendList,
    default: () => [],
  }),
});
