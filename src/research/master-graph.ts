import { END, START, StateGraph } from "@langchain/langgraph";
import { routeResearch } from "./router";
import { toGraphNode } from "./stage";
import { enrichStage } from "./stages/enrich";
import { evaluateStage } from "./stages/evaluate";
import { exploreStage } from "./stages/explore";
import { extractStage } from "./stages/extract";
import { finalizeStage } from "./stages/finalize";
import { planStage } from "./stages/plan";
import { retryUpdateStage } from "./stages/retry-update";
import { searchStage } from "./stages/search";
import { ResearchStateAnnotation } from "./states";
import { StageName } from "./types";
import { VIDEO_BRANCH, createVideoBranchNode } from "./video-subgraph";

/**
 * Master Research Graph
 *
 * ```
 *   START → explore → plan → search → extract ─┬→ enrich ───────┬→ evaluate
 *                              ↑                └→ video_branch ─┘     │
 *                              │                                      │
 *                        retry_update ←──── continue ─────────────────┤
 *                                                                     │
 *                                          finalize ←──── finalize ───┘ → END
 * ```
 *
 * enrich and video_branch start together once extract is done. evaluate waits
 * for both (array edge). They write disjoint fields and LangGraph applies a
 * superstep's writes only after all of its tasks finish, so the merged state
 * never depends on which branch returned first.
 */
export function createResearchGraph() {
  return new StateGraph(ResearchStateAnnotation)
    .addNode(StageName.EXPLORE, toGraphNode(exploreStage))
    .addNode(StageName.PLAN, toGraphNode(planStage))
    .addNode(StageName.SEARCH, toGraphNode(searchStage))
    .addNode(StageName.EXTRACT, toGraphNode(extractStage))
    .addNode(StageName.ENRICH, toGraphNode(enrichStage))
    .addNode(VIDEO_BRANCH, createVideoBranchNode())
    .addNode(StageName.EVALUATE, toGraphNode(evaluateStage))
    .addNode(StageName.RETRY_UPDATE, toGraphNode(retryUpdateStage))
    .addNode(StageName.FINALIZE, toGraphNode(finalizeStage))

    .addEdge(START, StageName.EXPLORE)
    .addEdge(StageName.EXPLORE, StageName.PLAN)
    .addEdge(StageName.PLAN, StageName.SEARCH)
    .addEdge(StageName.SEARCH, StageName.EXTRACT)

    // Fan-out
    .addEdge(StageName.EXTRACT, StageName.ENRICH)
    .addEdge(StageName.EXTRACT, VIDEO_BRANCH)

    // Fan-in: evaluate runs once, after both
    .addEdge([StageName.ENRICH, VIDEO_BRANCH], StageName.EVALUATE)

    .addConditionalEdges(StageName.EVALUATE, routeResearch, {
      continue: StageName.RETRY_UPDATE,
      finalize: StageName.FINALIZE,
    })
    .addEdge(StageName.RETRY_UPDATE, StageName.SEARCH)
    .addEdge(StageName.FINALIZE, END)
    .compile();
}

export type ResearchGraph = ReturnType<typeof createResearchGraph>;

/**
 * Supersteps per run: explore, plan, then per pass search, extract, the
 * enrich/video step, evaluate and retry_update, plus finalize and slack.
 */
export function recursionLimitFor(maxSearchIterations: number): number {
  return 5 * maxSearchIterations + 5;
}
