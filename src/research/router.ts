import { dispatchCustomEvent } from "@langchain/core/callbacks/dispatch";
import type { LangGraphRunnableConfig } from "@langchain/langgraph";
import { getRuntime } from "./services";
import { ProgressEventType } from "./stage";
import type { ResearchState } from "./states";
import type { Evaluation } from "./types";

export type RouteDecision = "continue" | "finalize";

/**
 * The only branch point of the graph.
 *
 * Finalize when there is no verdict, when the verdict is sufficient, or when
 * the iteration bound is reached; otherwise go round the loop once more.
 */
export function routeAfterEvaluation(
  evaluation: Evaluation | null,
  searchIterations: number,
  maxSearchIterations: number
): RouteDecision {
  if (!evaluation) return "finalize";
  if (evaluation.isSufficient) return "finalize";
  if (searchIterations >= maxSearchIterations) return "finalize";
  return "continue";
}

/**
 * Conditional-edge function used by the master graph.
 */
export async function routeResearch(
  state: Pick<ResearchState, "evaluation" | "searchIterations">,
  config: LangGraphRunnableConfig
): Promise<RouteDecision> {
  const { settings } = getRuntime(config);
  const decision = routeAfterEvaluation(state.evaluation, state.searchIterations, settings.maxSearchIterations);

  console.log(
    decision === "continue"
      ? `🔁 Coverage insufficient, searching again (iteration ${state.searchIterations}/${settings.maxSearchIterations})`
      : `🏁 Finalizing after ${state.searchIterations} search iteration(s)`
  );

  await dispatchCustomEvent(
    ProgressEventType.ROUTE_DECIDED,
    { decision, searchIterations: state.searchIterations, maxSearchIterations: settings.maxSearchIterations },
    config
  );
  return decision;
}
