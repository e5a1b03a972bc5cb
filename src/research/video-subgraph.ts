import { END, START, StateGraph, type LangGraphRunnableConfig } from "@langchain/langgraph";
import { toGraphNode } from "./stage";
import { videoAnalyzeStage } from "./stages/video-analyze";
import { videoSearchStage } from "./stages/video-search";
import { VideoBranchState, type ResearchState, type ResearchUpdate } from "./states";
import { StageName } from "./types";

export const VIDEO_BRANCH = "video_branch";

/**
 * Video Branch Sub-graph
 *
 *   START → video_search → video_analyze → END
 *
 * Runs beside enrich after every extract. It has its own state so it shares
 * nothing mutable with the enrich path.
 */
export function createVideoBranch() {
  return new StateGraph(VideoBranchState)
    .addNode(StageName.VIDEO_SEARCH, toGraphNode(videoSearchStage))
    .addNode(StageName.VIDEO_ANALYZE, toGraphNode(videoAnalyzeStage))
    .addEdge(START, StageName.VIDEO_SEARCH)
    .addEdge(StageName.VIDEO_SEARCH, StageName.VIDEO_ANALYZE)
    .addEdge(StageName.VIDEO_ANALYZE, END)
    .compile();
}

/**
 * Parent-graph node that runs the branch on a fresh copy of objective and
 * topics and hands back only what this pass found, for the parent to append.
 */
export function createVideoBranchNode() {
  const branch = createVideoBranch();

  return async (
    state: Pick<ResearchState, "objective" | "topics">,
    config: LangGraphRunnableConfig
  ): Promise<Pick<ResearchUpdate, "videoSources" | "visualAnalysis">> => {
    const result = await branch.invoke({ objective: state.objective, topics: state.topics }, config);
    return { videoSources: result.videoSources, visualAnalysis: result.visualAnalysis };
  };
}
