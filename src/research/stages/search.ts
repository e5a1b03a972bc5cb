import { defineStage } from "../stage";
import { StageName, type SourceRecord, type TopicContent } from "../types";

export const SEARCH_MAX_RESULTS = 5;

/**
 * Search Stage - one news query per topic, appended to the collected content
 *
 * Every topic gets an entry, even one without hits, so the number of entries
 * added per pass always equals the number of topics searched. A failing query
 * fails the stage.
 */
export const searchStage = defineStage({
  name: StageName.SEARCH,
  reads: ["topics", "startDate", "endDate", "rawContent", "searchIterations"],
  writes: ["rawContent", "searchIterations"],
  async run(view, { services, settings, signal }) {
    const iteration = view.searchIterations + 1;
    console.log(`🔎 Search pass ${iteration}: ${view.topics.length} topic(s), ${view.rawContent.length} already collected`);

    const rawContent: TopicContent[] = [];
    for (const topic of view.topics) {
      const hits = await services.news.search(`${topic} news ${view.startDate} ${view.endDate}`, {
        maxResults: SEARCH_MAX_RESULTS,
        depth: "advanced",
        startDate: view.startDate,
        endDate: view.endDate,
        includeDomains: settings.searchIncludeDomains.length ? settings.searchIncludeDomains : undefined,
        signal,
      });

      const sources: SourceRecord[] = hits.map((hit) => ({
        url: hit.url,
        title: hit.title,
        content: hit.content,
        publishedDate: hit.publishedDate,
        entities: {},
      }));
      console.log(`   "${topic}": ${sources.length} source(s)`);
      rawContent.push({ topic, sources });
    }

    return { rawContent, searchIterations: iteration };
  },
});
