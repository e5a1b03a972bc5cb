import { defineStage } from "../stage";
import { StageName, type ExplorationResult } from "../types";

export const EXPLORE_MAX_RESULTS = 10;
export const EXPLORE_SNIPPET_LENGTH = 500;

/**
 * Explore Stage - one broad query to see what the period's news looks like
 */
export const exploreStage = defineStage({
  name: StageName.EXPLORE,
  reads: ["objective", "startDate", "endDate"],
  writes: ["explorationResults"],
  async run(view, { services, signal }) {
    const query = `${view.objective} news ${view.startDate} to ${view.endDate}`;
    console.log(`🔭 Exploring: "${query}"`);

    const hits = await services.news.search(query, {
      maxResults: EXPLORE_MAX_RESULTS,
      depth: "advanced",
      startDate: view.startDate,
      endDate: view.endDate,
      signal,
    });

    const explorationResults: ExplorationResult[] = hits.map((hit) => ({
      title: hit.title,
      url: hit.url,
      snippet: hit.content.slice(0, EXPLORE_SNIPPET_LENGTH),
    }));

    console.log(`   Found ${explorationResults.length} headline(s)`);
    return { explorationResults };
  },
});
