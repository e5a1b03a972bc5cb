import { isAbortError } from "../../shared/utils/abort";
import { describeError } from "../errors";
import { defineStage } from "../stage";
import { replaceAll } from "../states";
import { StageName, type TopicContent } from "../types";

export const EXTRACT_CONTENT_LENGTH = 3000;

/**
 * Extract Stage - swap search snippets for full article text
 *
 * One batch call per topic. URLs the provider reports as failed are dropped
 * from that topic; a batch call that throws leaves the topic as it was.
 */
export const extractStage = defineStage({
  name: StageName.EXTRACT,
  reads: ["rawContent"],
  writes: ["rawContent"],
  async run(view, { services, signal }) {
    console.log(`📄 Extracting full text for ${view.rawContent.length} topic(s)`);

    const rawContent: TopicContent[] = [];
    for (const entry of view.rawContent) {
      if (entry.sources.length === 0) {
        rawContent.push(entry);
        continue;
      }

      try {
        const batch = await services.news.extract(
          entry.sources.map((source) => source.url),
          { signal }
        );
        const fullText = new Map(batch.results.map((page) => [page.url, page.rawContent]));
        const failed = new Set(batch.failedUrls);

        const sources = entry.sources
          .filter((source) => !failed.has(source.url))
          .map((source) => {
            const text = fullText.get(source.url);
            return text ? { ...source, content: text.slice(0, EXTRACT_CONTENT_LENGTH) } : source;
          });

        if (failed.size > 0) {
          console.log(`   "${entry.topic}": dropped ${entry.sources.length - sources.length} failed URL(s)`);
        }
        rawContent.push({ topic: entry.topic, sources });
      } catch (error) {
        if (isAbortError(error, signal)) throw error;
        console.log(`   ⚠️ Extraction failed for "${entry.topic}": ${describeError(error)}`);
        rawContent.push(entry);
      }
    }

    return { rawContent: replaceAll(rawContent) };
  },
});
